export { InvalidCredentialsException } from './invalid-credentials.exception';
export { AuthenticationFailedException } from './authentication-failed.exception';
