#!/usr/bin/env node
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { runMenu } from './menu.js';
import { ReadlinePrompter } from './prompter.js';
import { getServices } from './services/transcribe.factory.js';
import { errorMessage } from './utils/errors.js';

const startToolkit = async () => {
  const config = loadConfig();
  const logger = createLogger('Toolkit', { verbose: config.verbose });
  const services = await getServices(config);
  const prompter = new ReadlinePrompter();

  try {
    await runMenu({
      config,
      services,
      prompter,
      logger,
      cwd: process.cwd(),
      print: (message) => console.log(message),
    });
  } finally {
    prompter.close();
  }
};

startToolkit().catch((err: unknown) => {
  console.error(`[Toolkit] Fatal: ${errorMessage(err)}`);
  process.exitCode = 1;
});
