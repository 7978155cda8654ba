/**
 * Catalog logger.
 *
 * One JSON line per event, tagged `svc: gift-catalog-server`. Catalog writes
 * log as `{ productId, op, event }` (see `orchestrator/context.ts`); set
 * `LOG_PRETTY=1` for coloured output during `npm run dev`.
 */
import { pino } from 'pino';

const two = (n: number): string => String(n).padStart(2, '0');

// Local time as `dd.mm.yy-hh:mm:ss`, returned as a JSON fragment for pino.
function catalogTime(): string {
  const now = new Date();
  const day = [now.getDate(), now.getMonth() + 1, now.getFullYear() % 100].map(two).join('.');
  const clock = [now.getHours(), now.getMinutes(), now.getSeconds()].map(two).join(':');
  return `,"time":"${day}-${clock}"`;
}

export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  timestamp: catalogTime,
  transport: process.env.LOG_PRETTY ? { target: 'pino-pretty' } : undefined,
  base: { svc: 'gift-catalog-server' },
});
