import * as jose from 'jose';
import { createHash, randomUUID } from 'node:crypto';

export interface BithumbCredentials {
  readonly accessKey: string;
  readonly secretKey: string;
  /** true면 Secret을 문자열 그대로(UTF-8) 서명에 사용 */
  readonly secretRaw?: boolean;
}

/**
 * 빗썸 Secret Key는 base64 문자열로 발급되는 경우가 많아 디코딩 후 서명.
 * 401 jwt_verification 이 나면 secretRaw=true로 시도.
 */
function secretKeyBytes(secretKey: string, raw: boolean): Uint8Array {
  const trimmed = secretKey.trim();
  if (!raw && /^[A-Za-z0-9+/]+=*$/.test(trimmed) && trimmed.length >= 32) {
    const decoded = Buffer.from(trimmed, 'base64');
    if (decoded.length > 0) return new Uint8Array(decoded);
  }
  return new TextEncoder().encode(secretKey);
}

/**
 * Private API JWT (HS256)
 * 파라미터가 있으면 query_hash(SHA512) + query_hash_alg 필수
 */
export async function createBithumbJwt(
  creds: BithumbCredentials,
  options: { queryHash?: string; now?: number } = {},
): Promise<string> {
  const payload: Record<string, string | number> = {
    access_key: creds.accessKey,
    nonce: randomUUID(),
    timestamp: options.now ?? Date.now(),
  };
  if (options.queryHash) {
    payload.query_hash = options.queryHash;
    payload.query_hash_alg = 'SHA512';
  }
  return await new jose.SignJWT(payload)
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .sign(secretKeyBytes(creds.secretKey, creds.secretRaw === true));
}

/** 정렬된 키 query string → SHA512 (GET 쿼리용) */
export function sha512QueryString(params: Record<string, string>): string {
  const qs = Object.keys(params)
    .sort()
    .map((k) => `${k}=${params[k] ?? ''}`)
    .join('&');
  return createHash('sha512').update(qs).digest('hex');
}

/** 키 삽입 순서 유지 → SHA512 (POST body용, JSON 키 순서와 같아야 함) */
export function sha512QueryStringFromBody(body: Record<string, string>): string {
  const qs = Object.entries(body)
    .map(([k, v]) => `${k}=${v}`)
    .join('&');
  return createHash('sha512').update(qs).digest('hex');
}
