import { promises as fs } from 'fs';
import path from 'path';

import type { TranscriptionJob } from '../services/transcribe.service.js';
import {
  normalizeResults,
  reconcileNormalized,
  resolveSpeakerNames,
  type AskSpeakerName,
  type TranscriptLayout,
} from '../transcript/index.js';
import { errorMessage } from '../utils/errors.js';
import { sanitizePath } from '../utils/path.js';
import type { Command, CommandContext } from './context.js';

const RULE = '='.repeat(50);

/**
 * Reconciles a Transcribe payload, shows it and writes it to `outputPath`.
 * `layout` picks one block per speaker or one block per turn.
 *
 * @returns The written path, or `null` when the user chose not to save an
 * empty transcript.
 */
export const convertAndSave = async (
  payload: unknown,
  outputPath: string,
  ctx: CommandContext,
  layout: TranscriptLayout = 'speaker'
): Promise<string | null> => {
  const { prompter, print } = ctx;
  const normalized = normalizeResults(payload);

  print(`Detected ${normalized.speakerCount} speaker(s) in the transcript.`);
  let ask: AskSpeakerName | undefined;
  if (
    normalized.speakerLabels.length > 1 &&
    (await prompter.confirm('Would you like to name the speakers?'))
  ) {
    ask = (label, position) =>
      prompter.text(`Name for speaker ${position} (currently labeled as ${label}):`);
  }
  const labelMap = await resolveSpeakerNames(normalized.speakerLabels, ask);

  const result = reconcileNormalized(normalized, labelMap, { layout, logger: ctx.logger });

  print('\nProcessed Transcript:');
  print(RULE);
  print(result.text);
  print(RULE);

  if (
    !result.text &&
    !(await prompter.confirm('The transcript is empty. Save it anyway?'))
  ) {
    return null;
  }

  await fs.writeFile(outputPath, result.text, 'utf-8');
  print(`\nTranscript saved to:\n${outputPath}`);
  return outputPath;
};

/**
 * Returns the job once it is COMPLETED, waiting on it if the user agrees.
 * Returns `null` for failed jobs or when the user does not want to wait.
 */
export const awaitCompletedJob = async (
  job: TranscriptionJob,
  ctx: CommandContext
): Promise<TranscriptionJob | null> => {
  const { services, prompter, config, print } = ctx;
  let current = job;

  if (current.status !== 'COMPLETED' && current.status !== 'FAILED') {
    print(`Transcription job is currently ${current.status}.`);
    if (!(await prompter.confirm('Would you like to wait for the job to complete?'))) {
      return null;
    }
    print('Waiting for job to complete...');
    current = await services.transcribe.waitForJob(current.name, {
      intervalMs: config.pollIntervalMs,
      onPoll: (polled) => ctx.logger.debug(`Job ${polled.name}: ${polled.status}`),
    });
  }

  if (current.status === 'FAILED') {
    print(`Transcription job failed: ${current.failureReason ?? 'Unknown error'}`);
    return null;
  }
  return current;
};

export const convertJob = async (
  job: TranscriptionJob,
  outputPath: string,
  ctx: CommandContext,
  layout: TranscriptLayout = 'speaker'
): Promise<string | null> => {
  const completed = await awaitCompletedJob(job, ctx);
  if (!completed) return null;
  const payload = await ctx.services.transcribe.fetchTranscript(completed);
  return convertAndSave(payload, outputPath, ctx, layout);
};

export const runConvertFile: Command = async (ctx) => {
  const { prompter, print } = ctx;
  let jsonPath: string | undefined;
  while (!jsonPath) {
    const answer = await prompter.text('Enter the path to your AWS Transcribe JSON file:');
    try {
      jsonPath = await sanitizePath(answer);
    } catch (err) {
      print(`\nError: ${errorMessage(err)}\n`);
    }
  }

  let payload: unknown;
  try {
    payload = JSON.parse(await fs.readFile(jsonPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Error reading file: ${errorMessage(err)}`, { cause: err });
  }

  const { dir, name } = path.parse(jsonPath);
  await convertAndSave(payload, path.join(dir, `${name}_processed.txt`), ctx);
};

export const runConvertBucket: Command = async (ctx) => {
  const { prompter, services, config, print } = ctx;

  for (;;) {
    const bucket = await prompter.text('Enter the S3 bucket name for the audio file:', {
      default: config.defaultBucket,
    });
    const jobs = await services.transcribe.listJobsForBucket(bucket);

    if (jobs.length === 0) {
      print(`No transcription jobs found for bucket '${bucket}'.`);
      if (await prompter.confirm('Would you like to try another bucket?')) continue;
      return;
    }

    const labels = jobs.map((job) => `${job.name} - ${job.status}`);
    const selected = await prompter.select('Select a transcription job:', labels);
    const chosen = jobs[labels.indexOf(selected)];
    if (!chosen) return;

    const job = await services.transcribe.getJob(chosen.name);
    await convertJob(job, path.join(ctx.cwd, `${job.name}_processed.txt`), ctx);
    return;
  }
};

export const runConvertJob: Command = async (ctx) => {
  const { prompter, services, print } = ctx;

  for (;;) {
    const name = await prompter.text('Please enter your AWS Transcribe job name:');
    if (!name) {
      print('Job name cannot be empty. Please try again.');
      continue;
    }

    try {
      const job = await services.transcribe.getJob(name);
      const saved = await convertJob(job, path.join(ctx.cwd, `${name}.txt`), ctx, 'turns');
      if (saved) return;
    } catch (err) {
      print(`Error: ${errorMessage(err)}`);
    }

    if (!(await prompter.confirm('Would you like to try another job name?'))) return;
  }
};
