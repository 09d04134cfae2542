import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule, JwtModuleOptions } from '@nestjs/jwt';
import { AuthController } from './auth.controller';
import { loadAuthOptions } from './auth.config';
import { AUTH_OPTIONS, CLOCK, CREDENTIALS } from './auth.constants';
import { AuthService } from './auth.service';
import { systemClock } from './clock';
import { CredentialStore } from './credential-store.service';
import { DEFAULT_CREDENTIALS } from './credentials';
import { TokenCodec } from './token-codec.service';

/**
 * AuthModule — encapsulates all authentication concerns.
 *
 * Provides:
 * - TokenCodec: JWT signing/verification with the configured secret
 * - CredentialStore: the fixed credential table
 * - AuthService: login + authorize decisions
 * - POST /login
 *
 * Feature modules that protect routes with JwtAuthGuard import this module
 * for AuthService.
 *
 * The token settings are validated while the module is built; a missing
 * JWT_SECRET stops the application from starting.
 */
@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService): JwtModuleOptions => {
        const { secret, algorithm } = loadAuthOptions(configService);

        return {
          secret,
          signOptions: { algorithm },
          verifyOptions: { algorithms: [algorithm] },
        };
      },
    }),
  ],
  controllers: [AuthController],
  providers: [
    {
      provide: AUTH_OPTIONS,
      inject: [ConfigService],
      useFactory: loadAuthOptions,
    },
    { provide: CREDENTIALS, useValue: DEFAULT_CREDENTIALS },
    { provide: CLOCK, useValue: systemClock },
    CredentialStore,
    TokenCodec,
    AuthService,
  ],
  exports: [AuthService],
})
export class AuthModule {}
