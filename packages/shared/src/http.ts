import { AuthenticationError, ParseError, TransportError } from "./errors.ts";

export interface HttpOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  /** Per-request timeout. No timeout when omitted. */
  timeoutMs?: number;
}

export interface RequestOptions {
  method?: string;
  params?: Record<string, string | undefined>;
}

export class HttpClient {
  private readonly session = new AbortController();

  constructor(private opts: HttpOptions) {}

  get closed(): boolean {
    return this.session.signal.aborted;
  }

  /** Abort in-flight requests; every later request fails with TransportError. */
  close(): void {
    if (!this.closed) this.session.abort();
  }

  url(path: string, params?: Record<string, string | undefined>): string {
    let url = `${this.opts.baseUrl}${path}`;
    if (params) {
      const searchParams = new URLSearchParams();
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined && value !== "") {
          searchParams.set(key, value);
        }
      }
      const qs = searchParams.toString();
      if (qs) url += `?${qs}`;
    }
    return url;
  }

  async request<T = unknown>(
    path: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const { method = "GET", params } = options;
    if (this.closed) {
      throw new TransportError(`HTTP session closed: ${method} ${path}`);
    }

    const headers: Record<string, string> = { ...this.opts.headers };
    const { signal, dispose } = this.requestSignal();
    const init: RequestInit = { method, headers, signal };

    let res: Response;
    try {
      res = await fetch(this.url(path, params), init);
    } catch (e: unknown) {
      const reason = signal.aborted && !this.closed ? "timed out" : (e as Error).message;
      throw new TransportError(`${method} ${path} failed: ${reason}`, undefined, { path });
    } finally {
      dispose();
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthenticationError(
        `HTTP ${res.status} ${method} ${path}: token rejected, extract a new one`,
        res.status,
        { path },
      );
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new TransportError(`HTTP ${res.status} ${method} ${path}: ${text}`, res.status, { path });
    }

    const text = await res.text();
    try {
      return JSON.parse(text) as T;
    } catch {
      throw new ParseError(path, "body", "is not valid JSON");
    }
  }

  async get<T = unknown>(path: string, params?: Record<string, string | undefined>): Promise<T> {
    return this.request<T>(path, { params });
  }

  private requestSignal(): { signal: AbortSignal; dispose: () => void } {
    const timeoutMs = this.opts.timeoutMs;
    if (timeoutMs === undefined) {
      return { signal: this.session.signal, dispose: () => {} };
    }

    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.session.signal.addEventListener("abort", onClose);
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        this.session.signal.removeEventListener("abort", onClose);
      },
    };
  }
}
