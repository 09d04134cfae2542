/** Outcome of a failed TokenCodec.decode() */
export enum TokenDecodeFailure {
  MALFORMED = 'malformed',
  SIGNATURE_INVALID = 'signature_invalid',
  EXPIRED = 'expired',
}
