/**
 * Google auth barrel: per-run session and gaxios error helpers.
 */

export { AuthSession, AuthSessionError } from './auth-session.js';
export { httpStatusOf, isUnauthorizedError, errorMessage } from './errors.js';
