import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { normalizePlatform } from '../modules/catalog/lookup.js';
import { createCompletionClient } from '../modules/completion/client.js';
import { generateCaptions, generateQuickCaption } from '../modules/generators/captions.js';
import { generateTopicHashtags } from '../modules/generators/hashtags.js';
import { randomFromSeed } from '../utils/random.js';
import { loadCommandContext, parseCount, reportFailure } from '../utils/cli.js';

interface CaptionsOptions {
  tone: string;
  platform: string;
  count: string;
  seed?: string;
}

interface QuickOptions {
  style: string;
  platform: string;
  hashtags: string;
  seed?: string;
}

export function registerCaptionsCommand(program: Command): void {
  program
    .command('captions')
    .description('Generate caption variations for a topic')
    .argument('<topic>', 'What the post is about')
    .option('--tone <tone>', 'casual, professional, funny, inspirational, educational, excited', 'casual')
    .option('--platform <platform>', 'Target platform', 'instagram')
    .option('--count <n>', 'Number of captions', '3')
    .option('--seed <seed>', 'Seed for reproducible output')
    .action(async (topic: string, opts: CaptionsOptions) => {
      const spinner = ora('Generating captions...').start();
      try {
        const { config, catalog } = loadCommandContext();
        const platform = normalizePlatform(catalog, opts.platform);
        const count = parseCount(opts.count, '--count');

        const captions = await generateCaptions(
          { topic, tone: opts.tone, platform, count },
          { catalog, completion: createCompletionClient(config), rng: randomFromSeed(opts.seed) },
        );

        spinner.succeed(`${captions.length} captions for ${platform}`);
        console.log(chalk.cyan('━'.repeat(50)));
        captions.forEach((caption, i) => {
          console.log(chalk.bold(`${i + 1}.`) + ` ${caption}`);
        });
        console.log(chalk.cyan('━'.repeat(50)));
      } catch (err) {
        reportFailure(err, spinner);
      }
    });

  program
    .command('quick')
    .description('One quick caption plus topic hashtags, no completion model')
    .argument('<topic>', 'What the post is about')
    .option('--style <style>', 'casual, professional, funny, inspirational', 'casual')
    .option('--platform <platform>', 'Target platform', 'instagram')
    .option('--hashtags <n>', 'Number of hashtags (0 for none)', '15')
    .option('--seed <seed>', 'Seed for reproducible output')
    .action((topic: string, opts: QuickOptions) => {
      try {
        const { catalog } = loadCommandContext();
        const platform = normalizePlatform(catalog, opts.platform);
        const rng = randomFromSeed(opts.seed);
        const hashtagCount = parseInt(opts.hashtags, 10) || 0;

        const caption = generateQuickCaption(catalog, topic, opts.style, platform, rng);
        const hashtags = hashtagCount > 0 ? generateTopicHashtags(catalog, topic, hashtagCount, rng) : [];

        console.log(`\n${caption}`);
        if (hashtags.length > 0) console.log(chalk.cyan(`\n${hashtags.join(' ')}`));
        console.log('');
      } catch (err) {
        reportFailure(err);
      }
    });
}
