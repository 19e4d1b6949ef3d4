import type { Command } from 'commander';
import chalk from 'chalk';
import { listPlatforms } from '../modules/catalog/lookup.js';
import { loadCommandContext, reportFailure } from '../utils/cli.js';

export function registerPlatformsCommand(program: Command): void {
  program
    .command('platforms')
    .description('List supported platforms and their guidelines')
    .option('--json', 'Output as JSON (for machine consumption)')
    .action((opts: { json?: boolean }) => {
      try {
        const { catalog } = loadCommandContext();

        if (opts.json) {
          console.log(JSON.stringify({ platforms: catalog.platforms, posting: catalog.posting }, null, 2));
          return;
        }

        console.log(chalk.bold('\nSupported platforms'));
        console.log(chalk.dim('━'.repeat(50)));
        for (const name of listPlatforms(catalog)) {
          const p = catalog.platforms[name];
          if (!p) continue;
          console.log(chalk.cyan.bold(`\n  ${name}`));
          console.log(`    Length:    ${p.optimalLength[0]}-${p.optimalLength[1]} characters`);
          console.log(`    Hashtags:  ${p.optimalHashtags[0]}-${p.optimalHashtags[1]} (max ${p.maxHashtags})`);
          console.log(`    Emojis:    ${p.emojiFriendly ? chalk.green('welcome') : chalk.yellow('sparingly')}`);
          console.log(`    CTA:       ${p.ctaImportant ? 'important' : chalk.dim('optional')}`);
        }
        console.log('');
      } catch (err) {
        reportFailure(err);
      }
    });
}
