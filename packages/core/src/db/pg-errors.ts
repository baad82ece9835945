/**
 * Helpers for reading `pg` driver errors.
 */

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET', 'EHOSTUNREACH', 'EAI_AGAIN']);

// 08: connection exception, 28: invalid authorization, 3D: invalid catalog name
const CONNECTION_SQLSTATE_CLASSES = ['08', '28', '3D'];

// 57P01 admin_shutdown, 57P02 crash_shutdown, 57P03 cannot_connect_now
const CONNECTION_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

export const QUERY_CANCELED = '57014';

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isConnectionFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (code) {
    if (NETWORK_CODES.has(code) || CONNECTION_SQLSTATES.has(code)) return true;
    if (code.length === 5 && CONNECTION_SQLSTATE_CLASSES.includes(code.slice(0, 2))) return true;
  }
  return /timeout exceeded when trying to connect|Connection terminated/i.test(errorMessage(err));
}
