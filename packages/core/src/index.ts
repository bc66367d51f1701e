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
  ServerConfig,
  DatabaseConfig,
  AuthConfig,
  BlogApiConfig,
  ResourceKind,
  BlogError,
} from './types/index.js';

export {
  DuplicateResourceError,
  NotFoundError,
  InvalidCredentialsError,
  StoreError,
  HashError,
} from './types/index.js';

export { loadConfig, interpolateEnvVars, ConfigError, CONFIG_FILE_NAME, DEFAULT_PORT } from './config/config-parser.js';
export type { Env } from './config/config-parser.js';

export type { BlogSchema, BlogQueryable, BlogDatabase, BlogRepositories, PostValues } from './storage/index.js';
export {
  schema,
  MEMORY_DATABASE,
  resolveSqliteFilename,
  openDatabase,
  ensureSchema,
  resetSchema,
  countRows,
  StoreSession,
  SessionFactory,
  createRepositories,
  UserRepository,
  CategoryRepository,
  PostRepository,
  CommentRepository,
} from './storage/index.js';

export type { PasswordHasher, TokenClaims, IssuedToken, TokenServiceOptions, AuthenticatorDeps } from './auth/index.js';
export {
  BcryptPasswordHasher,
  DEFAULT_BCRYPT_ROUNDS,
  TokenService,
  TOKEN_ALGORITHM,
  DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES,
  INVALID_TOKEN_MESSAGE,
  Authenticator,
  parseBearerToken,
  INVALID_LOGIN_MESSAGE,
} from './auth/index.js';

export {
  createCategory,
  listCategories,
  DUPLICATE_CATEGORY_MESSAGE,
  createPost,
  listPosts,
  getPost,
  updatePost,
  deletePost,
  POST_NOT_FOUND_MESSAGE,
  CATEGORY_NOT_FOUND_MESSAGE,
  createComment,
  listComments,
} from './blog/index.js';
