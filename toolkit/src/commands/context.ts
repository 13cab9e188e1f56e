import type { ToolkitConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { IPrompter } from '../prompter.js';
import type { ToolkitServices } from '../services/transcribe.factory.js';

export interface CommandContext {
  config: ToolkitConfig;
  services: ToolkitServices;
  prompter: IPrompter;
  logger: Logger;
  /** Where job-based conversions write their output. */
  cwd: string;
  /** User-facing output; console.log outside of tests. */
  print: (message: string) => void;
}

export type Command = (ctx: CommandContext) => Promise<void>;
