import type { Command } from 'commander';
import chalk from 'chalk';
import { analyzeContent } from '../modules/analysis/health-scorer.js';
import { normalizePlatform } from '../modules/catalog/lookup.js';
import { formatAnalysis, formatScore, scoreBand, scoreEmoji } from '../utils/format.js';
import { loadCommandContext, reportFailure } from '../utils/cli.js';

interface AnalyzeOptions {
  platform: string;
  image?: string;
  json?: boolean;
}

function colorFor(score: number): (text: string) => string {
  const band = scoreBand(score);
  if (band === 'excellent') return chalk.green;
  if (band === 'good') return chalk.yellow;
  return chalk.red;
}

function scoreLine(label: string, score: number): string {
  return `  ${label.padEnd(20)} ${scoreEmoji(score)} ${colorFor(score)(formatScore(score))}`;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Score a caption for readability, engagement and platform fit')
    .argument('<text>', 'Caption text to analyze')
    .option('--platform <platform>', 'Target platform', 'instagram')
    .option('--image <description>', 'Description of the accompanying image')
    .option('--json', 'Output as JSON (for machine consumption)')
    .action((text: string, opts: AnalyzeOptions) => {
      try {
        const { catalog } = loadCommandContext();
        const platform = normalizePlatform(catalog, opts.platform);
        const result = analyzeContent(catalog, text, opts.image ?? '', platform);

        if (opts.json) {
          console.log(JSON.stringify(formatAnalysis(result), null, 2));
          return;
        }

        console.log(chalk.bold(`\n📊 Content Health (${platform})`));
        console.log(chalk.dim('━'.repeat(50)));
        console.log(scoreLine('Overall', result.overallScore));
        console.log(scoreLine('Readability', result.readabilityScore));
        console.log(scoreLine('Engagement', result.engagementScore));
        console.log(scoreLine('Platform fit', result.platformScore));
        console.log(chalk.dim('━'.repeat(50)));
        console.log(
          chalk.dim(
            `Words: ${result.wordCount} | Characters: ${result.characterCount} | ` +
              `Emojis: ${result.emojiCount} | Hashtags: ${result.hashtagCount}`,
          ),
        );

        if (result.strengths.length > 0) {
          console.log(chalk.green.bold('\nStrengths:'));
          for (const s of result.strengths) console.log(chalk.green(`  ✓ ${s}`));
        }
        if (result.improvements.length > 0) {
          console.log(chalk.yellow.bold('\nImprovements:'));
          for (const s of result.improvements) console.log(chalk.yellow(`  • ${s}`));
        }
        if (result.warnings.length > 0) {
          console.log(chalk.red.bold('\nWarnings:'));
          for (const s of result.warnings) console.log(chalk.red(`  ⚠ ${s}`));
        }
        console.log('');
      } catch (err) {
        reportFailure(err);
      }
    });
}
