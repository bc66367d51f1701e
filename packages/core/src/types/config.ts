export interface ServerConfig {
  port: number;
  corsOrigin: string;
}

export interface DatabaseConfig {
  /** SQLite location: `sqlite:///blog.db`, `file:blog.db`, a bare path or `:memory:`. */
  url: string;
}

export interface AuthConfig {
  secretKey: string;
  accessTokenExpireMinutes: number;
  bcryptRounds: number;
}

export interface BlogApiConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  auth: AuthConfig;
}
