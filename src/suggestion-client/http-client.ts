export interface HttpClientOptions {
  baseUrl: string;
  apiKey?: string;
  defaultTimeoutMs?: number;
}

export interface RequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  body?: unknown;
  timeoutMs?: number;
  requestId: string;
  /** Caller's cancellation; aborts the in-flight fetch. */
  signal?: AbortSignal;
}

export interface HttpResponse<T> {
  ok: boolean;
  status: number;
  data: T;
  requestId: string;
}

export class HttpClientError extends Error {
  constructor(
    message: string,
    public status: number,
    public requestId: string,
  ) {
    super(message);
    this.name = 'HttpClientError';
  }
}

/**
 * JSON-over-HTTP client for the locator suggestion service.
 * Uses native fetch() (Node 20+). Every request carries its requestId.
 */
export class HttpClient {
  private baseUrl: string;
  private apiKey?: string;
  private defaultTimeoutMs: number;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30000;
  }

  async request<T>(options: RequestOptions): Promise<HttpResponse<T>> {
    const { method, path, body, requestId, signal } = options;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Request-Id': requestId,
    };

    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      const data = (await response.json()) as T;

      if (!response.ok) {
        throw new HttpClientError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          requestId,
        );
      }

      return {
        ok: true,
        status: response.status,
        data,
        requestId,
      };
    } catch (error) {
      if (error instanceof HttpClientError) throw error;

      if (error instanceof Error && error.name === 'AbortError') {
        throw new HttpClientError(
          signal?.aborted ? 'Request aborted by caller' : `Request timed out after ${timeoutMs}ms`,
          0,
          requestId,
        );
      }

      throw new HttpClientError(
        error instanceof Error ? error.message : String(error),
        0,
        requestId,
      );
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  async get<T>(
    path: string,
    requestId: string,
    timeoutMs?: number,
    signal?: AbortSignal,
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ method: 'GET', path, requestId, timeoutMs, signal });
  }

  async post<T>(
    path: string,
    body: unknown,
    requestId: string,
    timeoutMs?: number,
    signal?: AbortSignal,
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ method: 'POST', path, body, requestId, timeoutMs, signal });
  }
}
