import type { BlogDatabase } from './database.js';
import { createRepositories, type BlogRepositories } from './repositories/index.js';

/**
 * A unit of work against the store. One is acquired per request and
 * released when the request finishes, however it finishes.
 */
export class StoreSession {
  readonly id: number;
  private released = false;
  private readonly database: BlogDatabase;
  private readonly onRelease: (session: StoreSession) => void;
  private cachedRepositories: BlogRepositories | null = null;

  constructor(id: number, database: BlogDatabase, onRelease: (session: StoreSession) => void) {
    this.id = id;
    this.database = database;
    this.onRelease = onRelease;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Repositories bound to the database, outside any transaction. */
  get repositories(): BlogRepositories {
    this.assertOpen();
    this.cachedRepositories ??= createRepositories(this.database.orm);
    return this.cachedRepositories;
  }

  /**
   * Run `work` inside a store transaction. A thrown error rolls the
   * transaction back and propagates.
   */
  transaction<T>(work: (repositories: BlogRepositories) => T): T {
    this.assertOpen();
    return this.database.orm.transaction((tx) => work(createRepositories(tx)));
  }

  /** Idempotent. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.cachedRepositories = null;
    this.onRelease(this);
  }

  private assertOpen(): void {
    if (this.released) {
      throw new Error(`Store session ${String(this.id)} used after release`);
    }
  }
}

/**
 * Hands out request-scoped sessions over one database handle. Constructed
 * once at startup and passed explicitly to whatever serves requests.
 */
export class SessionFactory {
  private readonly database: BlogDatabase;
  private readonly open = new Set<number>();
  private nextId = 1;

  constructor(database: BlogDatabase) {
    this.database = database;
  }

  /** Number of sessions acquired and not yet released. */
  get openSessions(): number {
    return this.open.size;
  }

  acquire(): StoreSession {
    const session = new StoreSession(this.nextId++, this.database, (s) => {
      this.open.delete(s.id);
    });
    this.open.add(session.id);
    return session;
  }

  /**
   * Acquire a session, run `work`, and release the session on every exit
   * path: normal return, rejected promise, or synchronous throw.
   */
  async withSession<T>(work: (session: StoreSession) => Promise<T> | T): Promise<T> {
    const session = this.acquire();
    try {
      return await work(session);
    } finally {
      session.release();
    }
  }

  /** Close the underlying database. Call once at shutdown. */
  close(): void {
    this.database.close();
  }
}
