import type { Command } from 'commander';
import chalk from 'chalk';
import { generateHashtagStrategy } from '../modules/generators/hashtags.js';
import { loadCommandContext, parseCount, reportFailure } from '../utils/cli.js';

interface HashtagsOptions {
  niche: string;
  count: string;
  json?: boolean;
}

export function registerHashtagsCommand(program: Command): void {
  program
    .command('hashtags')
    .description('Build a hashtag strategy for a caption and niche')
    .argument('<caption>', 'Caption the hashtags go with')
    .requiredOption('--niche <niche>', 'Niche, e.g. food, fitness, tech, travel')
    .option('--count <n>', 'Total hashtags', '20')
    .option('--json', 'Output as JSON (for machine consumption)')
    .action((caption: string, opts: HashtagsOptions) => {
      try {
        const { catalog } = loadCommandContext();
        const strategy = generateHashtagStrategy(catalog, caption, opts.niche, parseCount(opts.count, '--count'));

        if (opts.json) {
          console.log(JSON.stringify(strategy, null, 2));
          return;
        }

        console.log(chalk.bold(`\n#️⃣  ${strategy.totalCount} hashtags`));
        console.log(chalk.cyan(strategy.allHashtags.join(' ')));
        console.log(chalk.dim('━'.repeat(50)));
        console.log(`  Niche:    ${strategy.nicheSpecific.length}`);
        console.log(`  Content:  ${strategy.contentBased.length}`);
        console.log(`  Trending: ${strategy.trending.length}`);
        console.log('');
      } catch (err) {
        reportFailure(err);
      }
    });
}
