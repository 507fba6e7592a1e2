import type { Logger } from "pino";
import * as z from "zod/v4";
import { EnvelopeDecodeError } from "../engine/errors.js";
import { emptyPage, projectUserDocument, type Page, type SortKey, type UserDocument } from "./document.js";

const CountSchema = z.number().int().min(0);

const TotalSchema = z.object({
  hits: z.object({
    total: z.object({ value: CountSchema })
  })
});

const HitListSchema = z.object({
  hits: z.object({
    hits: z.array(z.unknown())
  })
});

const SortKeySchema = z.union([z.number(), z.string()]);

const SortedHitSchema = z.object({
  sort: z.array(z.unknown()).min(1)
});

function firstIssue(error: z.ZodError): { path: string; message: string } {
  const issue = error.issues[0];
  if (!issue) return { path: "$", message: "invalid value" };
  return { path: issue.path.map(String).join(".") || "$", message: issue.message };
}

export function readSortKey(hit: unknown): SortKey | undefined {
  const parsed = SortedHitSchema.safeParse(hit);
  if (!parsed.success) return undefined;
  const key = SortKeySchema.safeParse(parsed.data.sort[0]);
  return key.success ? key.data : undefined;
}

function readSource(hit: unknown): unknown {
  if (hit && typeof hit === "object" && "_source" in hit) return hit._source;
  return undefined;
}

/**
 * Turns a raw `_search` body into a page of users.
 *
 * The envelope is checked strictly. Hits are projected one at a time; the
 * first hit that does not validate is logged, the rest of the page is
 * dropped and the page comes back with `truncated: true`. The cursor is
 * always the sort key of the last hit the engine returned, so a caller
 * paging by cursor moves past a bad hit instead of re-reading it. A
 * non-empty page whose last hit carries no sort value is rejected.
 */
export function decodeSearchResponse(text: string, params: { index: string; logger: Logger }): Page {
  let root: unknown;
  try {
    root = JSON.parse(text);
  } catch (error) {
    throw new EnvelopeDecodeError(params.index, "$", "body is not JSON", { cause: error });
  }

  const totalResult = TotalSchema.safeParse(root);
  if (!totalResult.success) {
    const issue = firstIssue(totalResult.error);
    throw new EnvelopeDecodeError(params.index, "hits.total.value", issue.message, { cause: totalResult.error });
  }
  const total = totalResult.data.hits.total.value;

  if (total === 0) return emptyPage();

  const listResult = HitListSchema.safeParse(root);
  if (!listResult.success) {
    const issue = firstIssue(listResult.error);
    throw new EnvelopeDecodeError(params.index, "hits.hits", issue.message, { cause: listResult.error });
  }
  const hits = listResult.data.hits.hits;

  const cursor = readSortKey(hits.at(-1));
  if (hits.length > 0 && cursor === undefined) {
    throw new EnvelopeDecodeError(
      params.index,
      `hits.hits.${hits.length - 1}.sort`,
      "last hit has no sort value to continue from"
    );
  }

  const documents: UserDocument[] = [];
  let attempted = 0;

  for (const [hitIndex, hit] of hits.entries()) {
    attempted++;
    const result = projectUserDocument(readSource(hit));
    if (!result.ok) {
      params.logger.error(
        { index: params.index, hitIndex, hits: hits.length, error: result.error },
        "document decode failed, truncating page"
      );
      break;
    }
    documents.push(result.document);
  }

  return {
    documents,
    total,
    cursor,
    truncated: documents.length < hits.length,
    returned: hits.length,
    attempted,
    decoded: documents.length
  };
}
