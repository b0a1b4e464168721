/**
 * HTTP status helpers for googleapis / gaxios errors.
 *
 * gaxios puts the status on `status` (v6+) or `response.status`; older
 * googleapis surfaces it on a numeric `code`. Everything that needs to branch
 * on a status goes through httpStatusOf().
 */

export function httpStatusOf(err: unknown): number | undefined {
  if (err === null || typeof err !== 'object') return undefined;

  if ('status' in err && typeof err.status === 'number') return err.status;

  if ('response' in err && err.response !== null && typeof err.response === 'object') {
    const response = err.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }

  if ('code' in err && typeof err.code === 'number') return err.code;

  return undefined;
}

export function isUnauthorizedError(err: unknown): boolean {
  return httpStatusOf(err) === 401;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
