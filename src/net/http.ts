import { request } from 'undici';
import type { z } from 'zod';
import { NetworkError, ResponseValidationError, UnsupportedError } from '../errors.js';

export interface HttpResponse {
  readonly status: number;
  readonly body: unknown;
}

export interface HttpRequest {
  readonly method: 'GET' | 'POST' | 'DELETE';
  readonly url: string;
  readonly headers?: Record<string, string>;
  readonly body?: string;
  readonly timeoutMs: number;
}

/** 전송 함수. 기본은 sendRequest, 테스트에서 교체 */
export type HttpSend = (req: HttpRequest) => Promise<HttpResponse>;

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

const TIMEOUT_CODES = new Set(['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * undici 단일 요청. 재시도는 호출부의 RetryPolicy 담당.
 * 전송 오류/타임아웃 → NetworkError(retryable)
 * 본문이 JSON이 아니면 문자열 그대로 body에 담는다.
 */
export async function sendRequest(req: HttpRequest): Promise<HttpResponse> {
  try {
    const res = await request(req.url, {
      method: req.method,
      headers: { Accept: 'application/json', ...req.headers },
      body: req.body,
      bodyTimeout: req.timeoutMs,
      headersTimeout: req.timeoutMs,
    });
    const text = await res.body.text();
    let body: unknown = text;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }
    return { status: res.statusCode, body };
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : '';
    const timeout = TIMEOUT_CODES.has(code) || (err instanceof Error && err.name === 'TimeoutError');
    throw new NetworkError(timeout ? `timeout: ${req.url}` : `request failed: ${req.url}`, {
      retryable: true,
      cause: err,
    });
  }
}

/**
 * 2xx가 아니면 NetworkError (429/5xx만 재시도 가능),
 * 400/404는 unsupportedOn4xx가 켜져 있으면 UnsupportedError
 */
export function ensureOk(endpoint: string, res: HttpResponse, opts: { unsupportedOn4xx?: boolean } = {}): void {
  if (res.status >= 200 && res.status < 300) return;
  if (opts.unsupportedOn4xx && (res.status === 400 || res.status === 404)) {
    throw new UnsupportedError(`${endpoint}: HTTP ${res.status}`);
  }
  throw new NetworkError(`${endpoint}: HTTP ${res.status}`, {
    status: res.status,
    retryable: isRetryableStatus(res.status),
  });
}

export function parseBody<T>(endpoint: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(body);
  if (result.success) return result.data;
  throw new ResponseValidationError(endpoint, result.error.message);
}
