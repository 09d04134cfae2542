import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for POST /login.
 *
 * Only presence and type are checked here; whether the pair is valid is
 * AuthService's decision.
 */
export class LoginDto {
  @IsString()
  @IsNotEmpty({ message: 'username is required' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'password is required' })
  password!: string;
}
