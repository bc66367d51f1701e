export type { PasswordHasher } from './password-hasher.js';
export { BcryptPasswordHasher, DEFAULT_BCRYPT_ROUNDS } from './password-hasher.js';

export type { TokenClaims, IssuedToken, TokenServiceOptions } from './token-service.js';
export {
  TokenService,
  TOKEN_ALGORITHM,
  DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES,
  INVALID_TOKEN_MESSAGE,
} from './token-service.js';

export type { AuthenticatorDeps } from './authenticator.js';
export { Authenticator, parseBearerToken, INVALID_LOGIN_MESSAGE } from './authenticator.js';
