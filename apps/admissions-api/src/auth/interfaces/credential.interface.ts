/** One entry of the fixed credential table */
export interface Credential {
  readonly username: string;
  readonly password: string;
}
