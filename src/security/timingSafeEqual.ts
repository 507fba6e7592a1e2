import { createHash, timingSafeEqual } from "node:crypto";

/** Compares digests so that neither length nor content leaks through timing. */
export function safeEqual(expected: string, actual: string): boolean {
  const a = createHash("sha256").update(expected).digest();
  const b = createHash("sha256").update(actual).digest();
  return timingSafeEqual(a, b);
}
