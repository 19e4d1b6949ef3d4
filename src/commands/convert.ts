import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import fs from 'node:fs';
import { RequestValidationError } from '../errors.js';
import { articleFromText, convertArticle, exportPosts } from '../modules/blog/converter.js';
import { fetchArticle, type Article } from '../modules/blog/extractor.js';
import { randomFromSeed } from '../utils/random.js';
import { loadCommandContext, parseCount, reportFailure } from '../utils/cli.js';

interface ConvertCommandOptions {
  url?: string;
  file?: string;
  title?: string;
  voice: string;
  platforms: string;
  threads: boolean;
  carousels: boolean;
  points: string;
  export?: string;
  seed?: string;
}

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .description('Turn a blog post into platform-ready social posts')
    .option('--url <url>', 'Blog post URL to fetch')
    .option('--file <path>', 'Plain-text file to convert instead of a URL')
    .option('--title <title>', 'Title to use (defaults to the page title)')
    .option('--voice <voice>', 'professional, casual, educational, inspirational', 'professional')
    .option('--platforms <list>', 'Comma-separated platforms', 'instagram,twitter,linkedin')
    .option('--no-threads', 'Skip the twitter thread')
    .option('--no-carousels', 'Skip the instagram carousel')
    .option('--points <n>', 'Key points to extract', '5')
    .option('--export <file>', 'Also write all posts to a text file')
    .option('--seed <seed>', 'Seed for reproducible output')
    .action(async (opts: ConvertCommandOptions) => {
      const spinner = ora('Loading content...').start();
      try {
        const { config, catalog } = loadCommandContext();

        if (!opts.url === !opts.file) {
          throw new RequestValidationError(['Pass exactly one of --url or --file']);
        }

        let article: Article;
        if (opts.url) {
          spinner.text = `Fetching ${opts.url}...`;
          const extracted = await fetchArticle(opts.url, { timeoutMs: config.fetchTimeoutMs });
          if (!extracted.ok) {
            spinner.fail(extracted.error);
            process.exitCode = 1;
            return;
          }
          article = opts.title ? { ...extracted.article, title: opts.title } : extracted.article;
        } else {
          article = articleFromText(fs.readFileSync(opts.file ?? '', 'utf-8'), opts.title);
        }

        spinner.text = 'Converting...';
        const { keyPoints, posts } = convertArticle(
          catalog,
          article,
          {
            platforms: opts.platforms.split(',').map((p) => p.trim()).filter(Boolean),
            voice: opts.voice,
            includeThreads: opts.threads,
            includeCarousels: opts.carousels,
            maxPoints: parseCount(opts.points, '--points'),
          },
          randomFromSeed(opts.seed),
        );

        spinner.succeed(`Generated ${posts.length} posts from "${article.title || 'untitled'}" (${article.wordCount} words)`);

        if (keyPoints.length === 0) {
          console.log(chalk.yellow('  No key points found; posts use the fallback wording.'));
        }

        for (const post of posts) {
          console.log('\n' + chalk.cyan('━'.repeat(50)));
          console.log(chalk.bold(`${post.platform} - ${post.postType}`) + chalk.dim(` (${post.characterCount} chars)`));
          console.log(chalk.cyan('━'.repeat(50)));
          console.log(post.content);
          if (post.hashtags) console.log(chalk.cyan(`\n${post.hashtags}`));
          if (post.tips.length > 0) console.log(chalk.dim(`\nTips: ${post.tips.join(', ')}`));
        }

        if (opts.export) {
          fs.writeFileSync(opts.export, exportPosts(posts), 'utf-8');
          console.log(chalk.green(`\n✓ Exported ${posts.length} posts to ${opts.export}`));
        }
      } catch (err) {
        reportFailure(err, spinner);
      }
    });
}
