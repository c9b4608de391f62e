// apps/api/src/shared/retry.ts
import { isApiError } from "../common/errors";

/**
 * Re-run a read-modify-write when the commit lost a version race.
 * Every attempt re-reads, so the last error is only rethrown after `attempts` tries.
 */
export async function retryOnConflict<T>(fn: () => Promise<T>, attempts = 3): Promise<T> {
  let lastErr: unknown;
  for (let i = 0; i < attempts; i++) {
    try {
      return await fn();
    } catch (err) {
      if (!isApiError(err) || err.code !== "Conflict") throw err;
      lastErr = err;
    }
  }
  throw lastErr;
}
