import { Command } from 'commander';
import { registerServeCommand } from './commands/serve.js';
import { registerMigrateCommand } from './commands/migrate.js';

export function createProgram(version: string): Command {
  const program = new Command();
  program
    .name('blog-api')
    .description('Multi-user blogging API with bearer-token authentication')
    .version(version);

  registerServeCommand(program);
  registerMigrateCommand(program);

  return program;
}
