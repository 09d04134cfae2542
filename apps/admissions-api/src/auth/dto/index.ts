export { LoginDto } from './login.dto';
export { AuthResponseDto } from './auth-response.dto';
