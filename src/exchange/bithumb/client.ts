import type { z } from 'zod';
import type { Logger } from '../../logger.js';
import { AppError, NetworkError } from '../../errors.js';
import { sendRequest, ensureOk, parseBody, type HttpResponse, type HttpSend } from '../../net/http.js';
import {
  createBithumbJwt,
  sha512QueryString,
  sha512QueryStringFromBody,
  type BithumbCredentials,
} from './auth.js';
import { errorBodySchema } from './schemas.js';

const DEFAULT_TIMEOUT_MS = 10_000;

export interface BithumbClientOptions {
  readonly baseUrl: string;
  readonly credentials?: BithumbCredentials;
  readonly timeoutMs?: number;
  readonly log: Logger;
  readonly http?: HttpSend;
}

/** 401/403: 키 설정 오류. 재시도하지 않는다 */
export class BithumbAuthError extends AppError {
  readonly status: number;

  constructor(status: number, hint: string) {
    super('BITHUMB_AUTH', `Bithumb private API auth error: ${status}. ${hint}`);
    this.status = status;
  }
}

/**
 * 빗썸 v1 REST 클라이언트 (단일 요청)
 * 재시도는 호출부의 RetryPolicy가 담당하고, 여기서는 응답 분류와 zod 검증만.
 */
export class BithumbClient {
  private readonly opts: BithumbClientOptions;
  private readonly http: HttpSend;

  constructor(opts: BithumbClientOptions) {
    this.opts = opts;
    this.http = opts.http ?? sendRequest;
  }

  get hasCredentials(): boolean {
    const c = this.opts.credentials;
    return Boolean(c && c.accessKey && c.secretKey);
  }

  async publicGet<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = new URL(path, this.opts.baseUrl);
    for (const [k, v] of Object.entries(query)) url.searchParams.set(k, v);
    const res = await this.http({ method: 'GET', url: url.toString(), timeoutMs: this.timeout });
    if (res.status < 200 || res.status >= 300) {
      this.opts.log.warn({ status: res.status, path, body: res.body }, 'Public request failed');
    }
    ensureOk(path, res);
    return parseBody(path, res.body, schema);
  }

  /**
   * Private 요청: Authorization: Bearer <JWT>, 매 요청 새 JWT
   * 2xx가 아니면 응답 본문 그대로 돌려준다 (주문 거절 사유 해석은 호출부)
   */
  async privateRequest(
    path: string,
    options: { method: 'GET' | 'POST'; query?: Record<string, string>; body?: Record<string, string> },
  ): Promise<HttpResponse> {
    const creds = this.opts.credentials;
    if (!creds || !this.hasCredentials) {
      throw new BithumbAuthError(0, 'BITHUMB_ACCESS_KEY / BITHUMB_SECRET_KEY not set');
    }

    const url = new URL(path, this.opts.baseUrl);
    const query = options.query ?? {};
    // query_hash와 URL 파라미터 순서를 맞추기 위해 정렬
    const sorted = Object.entries(query).sort((a, b) => a[0].localeCompare(b[0]));
    for (const [k, v] of sorted) url.searchParams.set(k, v);

    const hasBody = options.body !== undefined && Object.keys(options.body).length > 0;
    const queryHash = options.body && hasBody
      ? sha512QueryStringFromBody(options.body)
      : sorted.length > 0
        ? sha512QueryString(query)
        : undefined;
    const token = await createBithumbJwt(creds, { queryHash });

    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    if (hasBody) headers['Content-Type'] = 'application/json; charset=utf-8';

    const res = await this.http({
      method: options.method,
      url: url.toString(),
      headers,
      body: hasBody ? JSON.stringify(options.body) : undefined,
      timeoutMs: this.timeout,
    });

    if (res.status === 401 || res.status === 403) {
      const err = errorBodySchema.safeParse(res.body);
      const name = err.success ? err.data.error.name : undefined;
      const hint =
        name === 'invalid_query_payload'
          ? 'query_hash mismatch (check parameter order/format)'
          : name === 'jwt_verification'
            ? 'JWT signature rejected (check secret key format)'
            : (err.success ? err.data.error.message : undefined) ?? 'check API key, secret and query_hash';
      this.opts.log.error({ status: res.status, path, errorName: name }, 'Private API auth error');
      throw new BithumbAuthError(res.status, hint);
    }
    if (res.status === 429 || res.status >= 500) {
      throw new NetworkError(`${path}: HTTP ${res.status}`, { status: res.status, retryable: true });
    }
    return res;
  }

  private get timeout(): number {
    return this.opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }
}

/** { error: { message } } 에서 사유 추출 */
export function describeErrorBody(body: unknown): string {
  const parsed = errorBodySchema.safeParse(body);
  if (parsed.success) {
    const { name, message } = parsed.data.error;
    return [name, message].filter((v) => v !== undefined).join(': ') || 'unknown error';
  }
  return typeof body === 'string' ? body : JSON.stringify(body);
}
