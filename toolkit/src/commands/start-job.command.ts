import path from 'path';

import { toS3Uri } from '../services/storage.service.js';
import { parseS3Uri, parseSpeakerCount } from '../services/transcribe.service.js';
import { sanitizePath } from '../utils/path.js';
import type { Command, CommandContext } from './context.js';
import { convertJob } from './convert.command.js';

export const UPLOAD_CHOICE = 'Upload a local audio file from computer';
export const S3_URI_CHOICE = 'Use S3 URI for an audio file hosted on S3';

const chooseMedia = async (ctx: CommandContext): Promise<string | null> => {
  const { prompter, services, config, print } = ctx;
  const method = await prompter.select('Choose a transcription method:', [
    UPLOAD_CHOICE,
    S3_URI_CHOICE,
  ]);

  if (method === UPLOAD_CHOICE) {
    const localFile = await sanitizePath(
      await prompter.text('Enter the local file path (e.g., /path/to/file.mp3):')
    );
    const bucket = await prompter.text('Enter the target S3 bucket name:', {
      default: config.defaultBucket,
    });
    await services.storage.validateBucket(bucket);
    return services.storage.uploadFile(localFile, bucket);
  }

  const uri = await prompter.text('Enter the S3 URI (e.g., s3://bucket/path/to/file.mp3):');
  const location = parseS3Uri(uri);
  if (!location) {
    print('Invalid S3 URI. It should look like s3://bucket/path/to/file.mp3.');
    return null;
  }
  return toS3Uri(location.bucket, location.key);
};

export const runStartJob: Command = async (ctx) => {
  const { prompter, services, config, print } = ctx;

  await services.transcribe.verifyCredentials();

  const mediaUri = await chooseMedia(ctx);
  if (!mediaUri) return;

  const { count, warning } = parseSpeakerCount(
    await prompter.text('Enter number of speakers (between 2 and 30):')
  );
  if (warning) print(warning);

  print('Starting transcription job...');
  const job = await services.transcribe.startJob({
    mediaUri,
    maxSpeakers: count,
    languageCode: config.languageCode,
  });
  print(`Transcription job started successfully!\nJob Name: ${job.name}`);

  if (await prompter.confirm('Wait for the job and convert its transcript now?')) {
    print('Waiting for job to complete...');
    const finished = await services.transcribe.waitForJob(job.name, {
      intervalMs: config.pollIntervalMs,
    });
    await convertJob(finished, path.join(ctx.cwd, `${finished.name}_processed.txt`), ctx);
  }
};
