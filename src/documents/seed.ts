import type { Logger } from "pino";
import type { DocumentClient } from "./client.js";
import { newUserDocument } from "./document.js";

export class SeedError extends Error {
  override readonly name = "SeedError";

  constructor(
    readonly stored: number,
    options: { cause: unknown }
  ) {
    super(`seeding stopped after ${stored} documents`, options);
  }
}

/**
 * Stores `count` users with consecutive IDs, one request each. The first
 * failed store ends the run.
 */
export async function seedUsers(
  client: Pick<DocumentClient, "storeDocument">,
  params: {
    count: number;
    index?: string;
    startId?: number;
    createdAt?: Date;
    signal?: AbortSignal;
    logger?: Logger;
  }
): Promise<number> {
  const startId = params.startId ?? 0;
  const createdAt = params.createdAt ?? new Date();

  let stored = 0;
  for (let i = 0; i < params.count; i++) {
    const doc = newUserDocument(startId + i, `user ${startId + i}`, createdAt);
    try {
      params.signal?.throwIfAborted();
      await client.storeDocument(doc, { index: params.index, signal: params.signal });
    } catch (error) {
      params.logger?.error({ id: doc.ID, stored, error }, "failed to store");
      throw new SeedError(stored, { cause: error });
    }
    stored++;
    if (stored % 1_000 === 0) params.logger?.info({ stored }, "seeding progress");
  }
  return stored;
}
