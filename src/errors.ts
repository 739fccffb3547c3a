/**
 * 애플리케이션 에러 계층
 * code로 분류하고, retryable은 RetryPolicy 기본 판정에 쓰인다.
 */
export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 설정 누락/형식 오류: 기동 시 즉시 실패 */
export class ConfigError extends AppError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('CONFIG_INVALID', `Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

/** 피드/거래소 통신 실패 (타임아웃, 429, 5xx, 연결 오류) */
export class NetworkError extends AppError {
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(message: string, opts: { status?: number | null; retryable?: boolean; cause?: unknown } = {}) {
    super('NETWORK', message, { cause: opts.cause });
    this.status = opts.status ?? null;
    this.retryable = opts.retryable ?? true;
  }
}

/** 엔드포인트가 해당 자산/기간을 지원하지 않음 (예: OHLC 없음) */
export class UnsupportedError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UNSUPPORTED', message, options);
  }
}

/** 응답 스키마 불일치 */
export class ResponseValidationError extends AppError {
  readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super('RESPONSE_INVALID', `${endpoint}: ${message}`);
    this.endpoint = endpoint;
  }
}

/** 주문 거부/실패 */
export class OrderError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ORDER_FAILED', message, options);
  }
}

/** 상태 파일이 존재하지만 읽을 수 없음 */
export class StateFileError extends AppError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('STATE_FILE', `${path}: ${message}`, options);
    this.path = path;
  }
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof NetworkError && err.retryable;
}
