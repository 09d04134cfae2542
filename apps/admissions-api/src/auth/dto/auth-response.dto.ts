/**
 * Response body for a successful POST /login.
 *
 * Field names follow the OAuth2 token response (RFC 6749 §5.1).
 */
export class AuthResponseDto {
  access_token: string;
  token_type: 'bearer';

  constructor(accessToken: string) {
    this.access_token = accessToken;
    this.token_type = 'bearer';
  }
}
