import type { SortKey } from "../documents/document.js";

export type PageToken = {
  after: SortKey;
};

export function encodePageToken(token: PageToken): string {
  const json = JSON.stringify(token);
  return Buffer.from(json, "utf-8").toString("base64url");
}

export function decodePageToken(token: string): PageToken {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, "base64url").toString("utf-8"));
  } catch {
    throw new Error("Invalid cursor");
  }
  if (!raw || typeof raw !== "object" || !("after" in raw)) throw new Error("Invalid cursor");
  const after = raw.after;
  if (typeof after === "number" && Number.isFinite(after)) return { after };
  if (typeof after === "string") return { after };
  throw new Error("Invalid cursor");
}
