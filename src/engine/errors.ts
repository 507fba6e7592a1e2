export type EngineOperation = "search" | "store" | "create_index";

export type TransportFailure = "network" | "timeout" | "aborted";

/** The request never produced an HTTP response. */
export class TransportError extends Error {
  override readonly name = "TransportError";

  constructor(
    readonly reason: TransportFailure,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`engine request ${reason}: ${url}`, options);
  }
}

/** Non-2xx status with a JSON error body. */
export class EngineResponseError extends Error {
  override readonly name = "EngineResponseError";

  constructor(
    readonly operation: EngineOperation,
    readonly index: string,
    readonly status: number,
    readonly detail: unknown
  ) {
    super(`${operation} on "${index}" failed with status ${status}: ${describeDetail(detail)}`);
  }
}

/** Non-2xx status whose body could not be parsed as JSON. */
export class EngineErrorBodyDecodeError extends Error {
  override readonly name = "EngineErrorBodyDecodeError";

  constructor(
    readonly operation: EngineOperation,
    readonly index: string,
    readonly status: number,
    readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} on "${index}" failed with status ${status} and an unreadable error body`, options);
  }
}

/** A 2xx search body that is not the expected envelope. */
export class EnvelopeDecodeError extends Error {
  override readonly name = "EnvelopeDecodeError";

  constructor(
    readonly index: string,
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`invalid search response from "${index}" at ${path}: ${message}`, options);
  }
}

function describeDetail(detail: unknown): string {
  if (detail && typeof detail === "object" && "error" in detail) {
    const error = detail.error;
    if (typeof error === "string") return error;
    if (error && typeof error === "object") {
      const type = "type" in error && typeof error.type === "string" ? error.type : undefined;
      const reason = "reason" in error && typeof error.reason === "string" ? error.reason : undefined;
      if (type || reason) return [type, reason].filter(Boolean).join(": ");
    }
  }
  return JSON.stringify(detail);
}
