export type { Credential } from './credential.interface';
export type { JwtPayload } from './jwt-payload.interface';
export type { Claims } from './claims.interface';
export type { RequestUser } from './request-user.interface';
