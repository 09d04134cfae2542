/** Verified contents of an access token */
export interface Claims {
  readonly subject: string;
  readonly expiresAt: Date;
}
