export { AuthFailure } from './auth-failure.enum';
export { TokenDecodeFailure } from './token-decode-failure.enum';
