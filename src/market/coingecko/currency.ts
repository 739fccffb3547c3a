// CoinGecko가 직접 지원하지 않는 스테이블코인 호가 → usd
const STABLECOIN_TO_USD = new Set(['usdc', 'usdt', 'busd', 'tusd', 'usdd', 'dai']);

export function normalizeVsCurrency(v: string): string {
  const s = v.trim().toLowerCase();
  if (!s) return 'usd';
  return STABLECOIN_TO_USD.has(s) ? 'usd' : s;
}
