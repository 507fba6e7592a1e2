import { TransportError } from "./errors.js";

export type EngineRequest = {
  method: "GET" | "POST" | "PUT";
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  signal?: AbortSignal;
};

export type EngineResponse = {
  status: number;
  url: string;
  text: string;
};

export type EngineTransportOptions = {
  hosts: string[];
  timeoutMs: number;
  username?: string;
  password?: string;
  apiKey?: string;
  disableCompression?: boolean;
  userAgent?: string;
};

/**
 * Thin HTTP layer over the engine's REST API. One request per call, no
 * retries; hosts are used round-robin.
 */
export class EngineTransport {
  private nextHost = 0;

  constructor(private readonly options: EngineTransportOptions) {
    if (options.hosts.length === 0) {
      throw new Error("EngineTransport needs at least one host");
    }
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  async request(req: EngineRequest): Promise<EngineResponse> {
    const url = this.buildUrl(req);

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    const onAbort = () => controller.abort();
    if (req.signal?.aborted) {
      clearTimeout(timeout);
      throw new TransportError("aborted", url.toString(), { cause: req.signal.reason });
    }
    req.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const res = await fetch(url, {
        method: req.method,
        signal: controller.signal,
        headers: this.headers(req.body !== undefined),
        body: req.body === undefined ? undefined : JSON.stringify(req.body)
      });
      const text = await res.text();
      return { status: res.status, url: url.toString(), text };
    } catch (error) {
      if (req.signal?.aborted) {
        throw new TransportError("aborted", url.toString(), { cause: error });
      }
      if (timedOut) {
        throw new TransportError("timeout", url.toString(), { cause: error });
      }
      throw new TransportError("network", url.toString(), { cause: error });
    } finally {
      clearTimeout(timeout);
      req.signal?.removeEventListener("abort", onAbort);
    }
  }

  private buildUrl(req: EngineRequest): URL {
    const host = this.options.hosts[this.nextHost] ?? "";
    this.nextHost = (this.nextHost + 1) % this.options.hosts.length;

    const base = host.endsWith("/") ? host : `${host}/`;
    const url = new URL(req.path.replace(/^\/+/, ""), base);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url;
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": this.options.userAgent ?? "docs-paginator/0.1"
    };
    if (hasBody) headers["content-type"] = "application/json";
    if (this.options.disableCompression) headers["accept-encoding"] = "identity";

    if (this.options.apiKey) {
      headers.authorization = `ApiKey ${this.options.apiKey}`;
    } else if (this.options.username && this.options.password !== undefined) {
      const credentials = Buffer.from(`${this.options.username}:${this.options.password}`).toString("base64");
      headers.authorization = `Basic ${credentials}`;
    }
    return headers;
  }
}
