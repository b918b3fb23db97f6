/**
 * Component-scoped debug logging
 *
 * Activated by CITYVOTES_DEBUG=1. Values longer than 100 characters are
 * truncated so whole minutes documents never end up in the log.
 */

export type DebugLog = (msg: string, data?: Record<string, unknown>) => void;

export function isDebugEnabled(): boolean {
  return process.env['CITYVOTES_DEBUG'] === '1';
}

function formatData(data?: Record<string, unknown>): string {
  if (!data) return '';
  const pairs = Object.entries(data)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => {
      const str = typeof v === 'string' ? v : JSON.stringify(v);
      return `${k}=${str.length > 100 ? str.slice(0, 97) + '...' : str}`;
    });
  return pairs.length > 0 ? ` (${pairs.join(', ')})` : '';
}

export function createDebugLog(component: string): DebugLog {
  return (msg, data) => {
    if (!isDebugEnabled()) return;
    const timestamp = new Date().toTimeString().slice(0, 8);
    console.log(`[${timestamp}] [DEBUG] [${component}] ${msg}${formatData(data)}`);
  };
}

export function warn(component: string, msg: string, data?: Record<string, unknown>): void {
  console.warn(`[${component}] ${msg}${formatData(data)}`);
}
