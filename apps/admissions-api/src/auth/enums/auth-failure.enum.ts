/**
 * Why AuthService refused a login or a protected request.
 *
 * Decision path for one request:
 *   no header            → MISSING_TOKEN
 *   header, no "Bearer " → MALFORMED_HEADER
 *   decode               → INVALID_TOKEN | TOKEN_EXPIRED
 *   subject lookup       → UNKNOWN_SUBJECT | authorized
 *
 * The reason is for logs and tests only; every variant reaches the client
 * as the same 401 response.
 */
export enum AuthFailure {
  /** Username/password pair does not match the credential table */
  INVALID_CREDENTIALS = 'invalid_credentials',

  /** Authorization header absent or empty */
  MISSING_TOKEN = 'missing_token',

  /** Authorization header does not use the "Bearer " scheme */
  MALFORMED_HEADER = 'malformed_header',

  /** Token is not a well-formed JWT or its signature does not verify */
  INVALID_TOKEN = 'invalid_token',

  /** Token verified but its expiry has passed */
  TOKEN_EXPIRED = 'token_expired',

  /** Token subject is no longer in the credential table */
  UNKNOWN_SUBJECT = 'unknown_subject',
}
