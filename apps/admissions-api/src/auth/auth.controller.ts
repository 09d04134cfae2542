import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import { AuthResponseDto, LoginDto } from './dto';
import { InvalidCredentialsException } from './exceptions';

/**
 * AuthController — token issuance.
 *
 * Routes:
 * - POST /login → exchange username/password for a bearer token (public)
 */
@Controller()
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 200 OK with access token
   * @throws 401 Unauthorized if credentials are invalid
   * @throws 422 Unprocessable Entity if a field is missing
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto): AuthResponseDto {
    const result = this.authService.login(dto.username, dto.password);

    if (!result.ok) {
      throw new InvalidCredentialsException();
    }

    return new AuthResponseDto(result.value);
  }
}
