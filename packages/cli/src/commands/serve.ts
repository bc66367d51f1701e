import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { bootstrapServer } from '@blog-api/api-server';

/** Port option value, or undefined when it is not a usable TCP port. */
export function parsePort(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const port = parseInt(raw, 10);
  return port >= 1 && port <= 65535 ? port : undefined;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the blog API server')
    .option('--port <port>', 'Port to listen on (overrides config)')
    .option('--root <dir>', 'Directory containing .blog-api.yaml')
    .action(async (options: { port?: string; root?: string }) => {
      let port: number | undefined;
      if (options.port !== undefined) {
        port = parsePort(options.port);
        if (port === undefined) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[blog-api] Invalid port number'));
          process.exit(1);
        }
      }

      const booted = await bootstrapServer({ rootDir: resolve(options.root ?? process.cwd()), port });
      if (booted.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('[blog-api] Server failed:'), booted.error.message);
        process.exit(1);
      }

      const { server } = booted.value;

      // Graceful shutdown
      const shutdown = (): void => {
        // eslint-disable-next-line no-console
        console.error(chalk.blue('[blog-api]'), 'Shutting down...');
        void server
          .close()
          .catch((error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            // eslint-disable-next-line no-console
            console.error(chalk.red('[blog-api] Shutdown failed:'), message);
          })
          .finally(() => process.exit(0));
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      // eslint-disable-next-line no-console
      console.error(chalk.blue('[blog-api]'), 'Starting blog API server...');
      const boundPort = await server.start();
      // eslint-disable-next-line no-console
      console.error(chalk.green('[blog-api]'), `Listening on http://localhost:${boundPort}`);
    });
}
