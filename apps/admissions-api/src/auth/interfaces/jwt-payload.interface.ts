/**
 * JWT claims signed into every access token.
 *
 * Times are JWT NumericDate values (whole seconds since the epoch).
 */
export interface JwtPayload {
  /** Username the token was issued to */
  sub: string;

  /** Issued-at time */
  iat: number;

  /** Expiry time; the token is rejected once the clock reaches it */
  exp: number;
}
