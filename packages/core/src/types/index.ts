export type {
  UserId,
  User,
  UserRecord,
  Category,
  Post,
  Comment,
  NewUser,
  PostInput,
  CommentInput,
  PostFilter,
  AccessTokenResponse,
} from './entities.js';

export type {
  ServerConfig,
  DatabaseConfig,
  AuthConfig,
  BlogApiConfig,
} from './config.js';

export type { ResourceKind, BlogError } from './errors.js';
export {
  DuplicateResourceError,
  NotFoundError,
  InvalidCredentialsError,
  StoreError,
  HashError,
} from './errors.js';
