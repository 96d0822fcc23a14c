/**
 * Canned Tushare HTTP responses for a stubbed global fetch
 */

export const DAILY_FIELDS = ['ts_code', 'trade_date', 'open', 'high', 'low', 'close', 'vol', 'amount'];

export function reply(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export function page(items: unknown[][], hasMore = false, fields: string[] = DAILY_FIELDS) {
  return { code: 0, msg: '', data: { fields, items, has_more: hasMore } };
}
