import { runCleanVtt } from './commands/clean-vtt.command.js';
import type { Command, CommandContext } from './commands/context.js';
import {
  runConvertBucket,
  runConvertFile,
  runConvertJob,
} from './commands/convert.command.js';
import { runStartJob } from './commands/start-job.command.js';
import { errorMessage } from './utils/errors.js';

export const EXIT_CHOICE = 'Exit';

export const MENU: ReadonlyArray<readonly [string, Command]> = [
  ['Clean a VTT transcript', runCleanVtt],
  ['Start an AWS transcription job', runStartJob],
  ['Convert an AWS Transcribe JSON file', runConvertFile],
  ['Convert an AWS Transcribe job (select by bucket)', runConvertBucket],
  ['Convert an AWS Transcribe job by name', runConvertJob],
];

/**
 * Shows the main menu until the user exits. A failing command is reported
 * and the menu shown again.
 */
export const runMenu = async (ctx: CommandContext): Promise<void> => {
  const commands = new Map<string, Command>(MENU);
  const choices = [...commands.keys(), EXIT_CHOICE];

  for (;;) {
    const choice = await ctx.prompter.select('Transcript Toolkit - choose a task:', choices);
    const command = commands.get(choice);
    if (!command) break;

    try {
      await command(ctx);
    } catch (err) {
      ctx.logger.error(errorMessage(err));
    }
  }

  ctx.print('Goodbye!');
};
