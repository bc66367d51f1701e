#!/usr/bin/env node

import { fileURLToPath } from 'node:url';
import { bootstrapServer } from './bootstrap.js';

export { ApiServer, API_SERVER_VERSION } from './server.js';
export type { ApiServerOptions } from './server.js';

export { bootstrapServer } from './bootstrap.js';
export type { BootstrapOptions, Bootstrapped } from './bootstrap.js';

export { currentUser } from './middleware/auth.js';
export { withStoreSession } from './middleware/session.js';
export type { SessionHandler } from './middleware/session.js';

export { sendError, sendValidationError, createErrorHandler } from './http-errors.js';
export type { ErrorBody } from './http-errors.js';

export {
  credentialsSchema,
  categoryRequestSchema,
  postRequestSchema,
  commentRequestSchema,
  postListQuerySchema,
  parsePathId,
  EMPTY_FIELD_MESSAGE,
  EMPTY_COMMENT_MESSAGE,
} from './schemas.js';
export type { CredentialsRequest, CategoryRequest, PostRequest, CommentRequest } from './schemas.js';

export { formatUser, formatCategory, formatPost, formatComment } from './serializers.js';
export type { UserResponse, CategoryResponse, PostResponse, CommentResponse } from './serializers.js';

export { createUsersRouter } from './routes/users.js';
export type { UsersRouteDeps } from './routes/users.js';
export { createTokenRouter } from './routes/token.js';
export type { TokenRouteDeps } from './routes/token.js';
export { createCategoriesRouter } from './routes/categories.js';
export type { CategoriesRouteDeps } from './routes/categories.js';
export { createPostsRouter, POST_DELETED_MESSAGE } from './routes/posts.js';
export type { PostsRouteDeps } from './routes/posts.js';

export { createOpenAPISpec } from './openapi.js';
export type { OpenAPISpec } from './openapi.js';

async function main(): Promise<void> {
  const rootDir = process.argv[2] ?? process.cwd();

  const booted = await bootstrapServer({ rootDir });
  if (booted.isErr()) {
    // eslint-disable-next-line no-console
    console.error(`[api-server] ${booted.error.message}`);
    process.exit(1);
  }

  const { server } = booted.value;
  const port = await server.start();

  // eslint-disable-next-line no-console
  console.log(`[api-server] Blog API listening on http://localhost:${port}`);
  // eslint-disable-next-line no-console
  console.log(`[api-server] OpenAPI spec: http://localhost:${port}/openapi.json`);
  // eslint-disable-next-line no-console
  console.log(`[api-server] Health check: http://localhost:${port}/health`);
}

// Only run main when this module is executed directly (not imported)
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
