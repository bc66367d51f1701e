import express, { type Express } from 'express';
import { createServer, type Server as HttpServer } from 'node:http';
import {
  Authenticator,
  BcryptPasswordHasher,
  SessionFactory,
  TokenService,
  type BlogApiConfig,
  type BlogDatabase,
  type PasswordHasher,
} from '@blog-api/core';
import { createUsersRouter } from './routes/users.js';
import { createTokenRouter } from './routes/token.js';
import { createCategoriesRouter } from './routes/categories.js';
import { createPostsRouter } from './routes/posts.js';
import { createOpenAPISpec } from './openapi.js';
import { createErrorHandler } from './http-errors.js';

export const API_SERVER_VERSION = '0.1.0';

export interface ApiServerOptions {
  readonly config: BlogApiConfig;
  /** Open database with the schema in place. Closed by `close()`. */
  readonly database: BlogDatabase;
  /** Override the bcrypt hasher built from `config.auth.bcryptRounds`. */
  readonly hasher?: PasswordHasher;
  /** Clock in milliseconds for token issue and expiry. Default: `Date.now` */
  readonly now?: () => number;
}

export class ApiServer {
  private readonly app: Express;
  private readonly port: number;
  private readonly sessions: SessionFactory;
  private httpServer: HttpServer | null = null;

  constructor(options: ApiServerOptions) {
    const { config } = options;
    this.port = config.server.port;
    this.sessions = new SessionFactory(options.database);

    const authenticator = new Authenticator({
      hasher: options.hasher ?? new BcryptPasswordHasher(config.auth.bcryptRounds),
      tokens: new TokenService({
        secret: config.auth.secretKey,
        expiresInMinutes: config.auth.accessTokenExpireMinutes,
        now: options.now,
      }),
    });
    const deps = { sessions: this.sessions, authenticator };

    this.app = express();

    // --- Global Middleware ---

    // CORS
    this.app.use((req, res, next) => {
      res.setHeader('Access-Control-Allow-Origin', config.server.corsOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }
      next();
    });

    // JSON bodies everywhere; the token endpoint also takes a login form
    this.app.use(express.json());
    this.app.use(express.urlencoded({ extended: false }));

    // --- Unauthenticated Routes ---

    this.app.get('/health', (_req, res) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.get('/openapi.json', (_req, res) => {
      res.json(createOpenAPISpec(API_SERVER_VERSION));
    });

    // --- Blog Routes ---

    this.app.use('/users', createUsersRouter(deps));
    this.app.use('/token', createTokenRouter(deps));
    this.app.use('/categories', createCategoriesRouter(deps));
    this.app.use('/posts', createPostsRouter(deps));

    this.app.use(createErrorHandler());
  }

  /** Sessions acquired by in-flight requests and not yet released. */
  get openSessions(): number {
    return this.sessions.openSessions;
  }

  /**
   * Start listening on the configured port. Resolves with the bound port,
   * which differs from the configured one when that is 0.
   */
  async start(): Promise<number> {
    const server = createServer(this.app);
    this.httpServer = server;

    return new Promise<number>((resolvePromise, reject) => {
      server.on('error', reject);
      server.listen(this.port, () => {
        const address = server.address();
        resolvePromise(typeof address === 'object' && address ? address.port : this.port);
      });
    });
  }

  /**
   * Stop accepting connections, then close the database.
   */
  async close(): Promise<void> {
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolvePromise, reject) => {
        server.close((closeErr) => {
          if (closeErr) reject(closeErr);
          else resolvePromise();
        });
      });
      this.httpServer = null;
    }
    this.sessions.close();
  }

  /** Expose Express app for testing with supertest. */
  getApp(): Express {
    return this.app;
  }
}
