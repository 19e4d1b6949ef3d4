import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { RequestValidationError } from '../errors.js';
import { createCompletionClient } from '../modules/completion/client.js';
import { AUDIENCES, CONTENT_TYPES, generateScript } from '../modules/generators/scripts.js';
import { randomFromSeed } from '../utils/random.js';
import { loadCommandContext, reportFailure } from '../utils/cli.js';

interface ScriptOptions {
  audience: string;
  type: string;
  seed?: string;
}

function oneOf(value: string, allowed: readonly string[], flag: string): string {
  const key = value.toLowerCase();
  if (!allowed.includes(key)) {
    throw new RequestValidationError([`${flag} must be one of: ${allowed.join(', ')}`]);
  }
  return key;
}

export function registerScriptCommand(program: Command): void {
  program
    .command('script')
    .description('Generate a video, carousel, reel, story, tutorial or thread script')
    .argument('<topic>', 'What the script is about')
    .option('--audience <audience>', AUDIENCES.join(', '), 'general')
    .option('--type <type>', CONTENT_TYPES.join(', '), 'video')
    .option('--seed <seed>', 'Seed for reproducible output')
    .action(async (topic: string, opts: ScriptOptions) => {
      const spinner = ora('Writing script...').start();
      try {
        const { config, catalog } = loadCommandContext();
        const audience = oneOf(opts.audience, AUDIENCES, '--audience');
        const contentType = oneOf(opts.type, CONTENT_TYPES, '--type');

        const result = await generateScript(
          { topic, audience, contentType },
          { catalog, completion: createCompletionClient(config), rng: randomFromSeed(opts.seed) },
        );

        spinner.succeed(`${contentType} script (${result.source})`);
        console.log('\n' + chalk.cyan('━'.repeat(50)));
        console.log(result.script);
        console.log(chalk.cyan('━'.repeat(50)));
        console.log(chalk.dim(`Structure: ${result.structure.join(' → ')}`));
        console.log(chalk.dim(`Words: ${result.wordCount} | Est. duration: ${result.estimatedDuration}`));
        console.log(chalk.cyan(result.hashtags.join(' ')));
      } catch (err) {
        reportFailure(err, spinner);
      }
    });
}
