import type { Command } from 'commander';
import chalk from 'chalk';
import { startApiServer } from '../modules/api/server.js';
import { createCompletionClient } from '../modules/completion/client.js';
import { listPlatforms } from '../modules/catalog/lookup.js';
import { defaultRandom } from '../utils/random.js';
import { loadCommandContext, reportFailure } from '../utils/cli.js';

interface ServeOptions {
  port?: string;
  host?: string;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the HTTP API')
    .option('--port <port>', 'HTTP port (default API_PORT or 8002)')
    .option('--host <host>', 'Bind address (default API_HOST or 127.0.0.1)')
    .action(async (opts: ServeOptions) => {
      try {
        const { config, catalog } = loadCommandContext({
          port: opts.port ? parseInt(opts.port, 10) || undefined : undefined,
          host: opts.host,
        });

        const completion = createCompletionClient(config);
        const api = startApiServer({ catalog, completion, rng: defaultRandom }, { host: config.host, port: config.port });

        console.log(chalk.bold('\n  postcraft API'));
        console.log(chalk.dim('  ─'.repeat(25)));
        console.log(`  URL:        ${chalk.cyan(`http://${config.host}:${config.port}`)}`);
        console.log(`  Platforms:  ${listPlatforms(catalog).join(', ')}`);
        console.log(`  Completion: ${config.anthropicApiKey ? chalk.green('connected') : chalk.yellow('templates only (no API key)')}`);
        console.log(chalk.dim('  Press Ctrl+C to stop\n'));

        process.on('SIGINT', () => {
          console.log(chalk.dim('\n  Shutting down API...'));
          api.stop();
          process.exit(0);
        });
      } catch (err) {
        reportFailure(err);
        return;
      }

      // Keep process alive
      await new Promise(() => {});
    });
}
