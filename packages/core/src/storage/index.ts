export * as schema from './schema.js';
export type { BlogSchema, BlogQueryable, BlogDatabase } from './database.js';
export {
  MEMORY_DATABASE,
  resolveSqliteFilename,
  openDatabase,
  ensureSchema,
  resetSchema,
  countRows,
} from './database.js';

export { StoreSession, SessionFactory } from './session.js';

export type { BlogRepositories, PostValues } from './repositories/index.js';
export {
  createRepositories,
  UserRepository,
  CategoryRepository,
  PostRepository,
  CommentRepository,
} from './repositories/index.js';
