import * as z from "zod/v4";

/**
 * Wire form of a stored user. Field names are case-sensitive and match the
 * index mapping. `CreatedAt` stays as RFC3339 text so that precision and
 * offset survive a round trip.
 */
export const UserDocumentSchema = z.object({
  ID: z.number().int(),
  CreatedAt: z.iso.datetime({ offset: true }),
  Username: z.string()
});

export type UserDocument = z.infer<typeof UserDocumentSchema>;

/** A value of the `sort` array the engine returns for each hit. */
export type SortKey = number | string;

/** Absent means "start at the beginning"; `0` is a real sort value. */
export type Cursor = SortKey | undefined;

export type Page = {
  documents: UserDocument[];
  /** Exact match count reported by the engine; may exceed the page size. */
  total: number;
  cursor: Cursor;
  /** True when a hit failed to decode and the rest of the page was dropped. */
  truncated: boolean;
  /** Hits the engine returned in this page, decoded or not. */
  returned: number;
  attempted: number;
  decoded: number;
};

export function emptyPage(): Page {
  return { documents: [], total: 0, cursor: undefined, truncated: false, returned: 0, attempted: 0, decoded: 0 };
}

export type DecodeResult =
  | { ok: true; document: UserDocument }
  | { ok: false; error: z.ZodError | SyntaxError };

export function newUserDocument(id: number, username: string, createdAt: Date = new Date()): UserDocument {
  return { ID: id, CreatedAt: createdAt.toISOString(), Username: username };
}

export function encodeUserDocument(doc: UserDocument): string {
  return JSON.stringify({ ID: doc.ID, CreatedAt: doc.CreatedAt, Username: doc.Username });
}

/** Validates an already-parsed JSON node. */
export function projectUserDocument(node: unknown): DecodeResult {
  const parsed = UserDocumentSchema.safeParse(node);
  return parsed.success ? { ok: true, document: parsed.data } : { ok: false, error: parsed.error };
}

export function decodeUserDocument(json: string): DecodeResult {
  let node: unknown;
  try {
    node = JSON.parse(json);
  } catch (error) {
    if (error instanceof SyntaxError) return { ok: false, error };
    throw error;
  }
  return projectUserDocument(node);
}
