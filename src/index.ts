import { Command } from 'commander';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerPlatformsCommand } from './commands/platforms.js';
import { registerCaptionsCommand } from './commands/captions.js';
import { registerHashtagsCommand } from './commands/hashtags.js';
import { registerScriptCommand } from './commands/script.js';
import { registerConvertCommand } from './commands/convert.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('postcraft')
  .description('Score, generate and repurpose social media content')
  .version('0.1.0');

// Register all commands
registerAnalyzeCommand(program);
registerPlatformsCommand(program);
registerCaptionsCommand(program);
registerHashtagsCommand(program);
registerScriptCommand(program);
registerConvertCommand(program);
registerServeCommand(program);

export async function run(): Promise<void> {
  await program.parseAsync();
}

// Direct execution (when run via tsx, not via bin entry point)
const isBinEntry = process.argv[1]?.endsWith('postcraft.mjs');
if (!isBinEntry) {
  await run();
}
