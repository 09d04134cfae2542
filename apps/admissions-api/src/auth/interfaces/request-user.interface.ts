/**
 * Shape of request.user after JwtAuthGuard accepted the token.
 * Read in handlers through the @CurrentUser() decorator.
 */
export interface RequestUser {
  username: string;
}
