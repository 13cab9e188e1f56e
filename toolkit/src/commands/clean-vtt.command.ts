import { createLogger } from '../logger.js';
import { cleanVttFile } from '../services/vtt.service.js';
import { sanitizePath } from '../utils/path.js';
import type { Command } from './context.js';

export const runCleanVtt: Command = async (ctx) => {
  const { prompter, print, config } = ctx;
  print(
    [
      '',
      'This tool will:',
      '  - Remove timestamp lines',
      '  - Remove cue ids and voice tags',
      '  - Combine speaker lines for readability',
      '',
    ].join('\n')
  );

  const answer = await prompter.text('Please enter the path to your VTT file:');
  const inputPath = await sanitizePath(answer);
  const outputPath = await cleanVttFile(
    inputPath,
    createLogger('VttCleaner', { verbose: config.verbose })
  );

  print(`\nSuccess! Your transcript has been cleaned and saved to:\n  ${outputPath}`);
};
