import type { z } from 'zod';

export interface HttpClientOptions {
  baseUrl: string;
  apiKey?: string;
  defaultTimeoutMs?: number;
}

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface RequestOptions<T> {
  method: 'POST' | 'PUT';
  path: string;
  /** JSON-encoded unless it is already bytes */
  body?: unknown;
  contentType?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  requestId: string;
  schema: ResponseSchema<T>;
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

interface EncodedBody {
  payload: BodyInit | undefined;
  contentType: string;
}

function encodeBody(body: unknown): EncodedBody {
  if (Buffer.isBuffer(body)) {
    return { payload: new Uint8Array(body), contentType: 'application/octet-stream' };
  }
  return { payload: body === undefined ? undefined : JSON.stringify(body), contentType: 'application/json' };
}

function toClientError(error: unknown, requestId: string, timeoutMs: number): HttpClientError {
  if (error instanceof HttpClientError) return error;
  if (error instanceof Error && error.name === 'AbortError') {
    return new HttpClientError(`Request timed out after ${timeoutMs}ms`, 0, requestId);
  }
  return new HttpClientError(error instanceof Error ? error.message : String(error), 0, requestId);
}

/**
 * JSON-over-HTTP client on native fetch(). Every request carries an
 * X-Request-Id so the receiving side can deduplicate retries, and every
 * response body is validated before it is returned.
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

  async request<T>(options: RequestOptions<T>): Promise<HttpResponse<T>> {
    const { requestId, schema } = options;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const { payload, contentType } = encodeBody(options.body);

    const headers: Record<string, string> = {
      'Content-Type': options.contentType ?? contentType,
      'X-Request-Id': requestId,
      ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
      ...options.headers,
    };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${options.path}`, {
        method: options.method,
        headers,
        body: payload,
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new HttpClientError(`HTTP ${response.status}: ${response.statusText}`, response.status, requestId);
      }

      // 204 and friends: validate an empty object
      const text = await response.text();
      return {
        ok: true,
        status: response.status,
        data: schema.parse(text ? JSON.parse(text) : {}),
        requestId,
      };
    } catch (error) {
      throw toClientError(error, requestId, timeoutMs);
    } finally {
      clearTimeout(timer);
    }
  }

  async post<T>(path: string, body: unknown, requestId: string, schema: ResponseSchema<T>): Promise<HttpResponse<T>> {
    return this.request({ method: 'POST', path, body, requestId, schema });
  }

  async put<T>(path: string, body: unknown, requestId: string, schema: ResponseSchema<T>): Promise<HttpResponse<T>> {
    return this.request({ method: 'PUT', path, body, requestId, schema });
  }
}
