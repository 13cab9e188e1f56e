export type TranscribeProvider = 'aws' | 'mock';

export interface ToolkitConfig {
  region?: string;
  provider: TranscribeProvider;
  /** JSON file seeding the mock provider's jobs. */
  mockJobsFile?: string;
  defaultBucket: string;
  languageCode: string;
  pollIntervalMs: number;
  verbose: boolean;
}

const DEFAULT_BUCKET = 'audio-recordings';
const DEFAULT_LANGUAGE_CODE = 'en-US';
const DEFAULT_POLL_INTERVAL_MS = 30_000;

const parsePositiveInt = (name: string, value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}".`);
  }
  return parsed;
};

const parseProvider = (value: string | undefined): TranscribeProvider => {
  switch (value) {
    case undefined:
    case '':
    case 'aws':
      return 'aws';
    case 'mock':
      return 'mock';
    default:
      throw new Error(`TRANSCRIBE_PROVIDER must be "aws" or "mock", got "${value}".`);
  }
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ToolkitConfig => ({
  region: env.AWS_REGION || undefined,
  provider: parseProvider(env.TRANSCRIBE_PROVIDER),
  mockJobsFile: env.MOCK_TRANSCRIBE_JOBS || undefined,
  defaultBucket: env.DEFAULT_S3_BUCKET?.trim() || DEFAULT_BUCKET,
  languageCode: env.TRANSCRIBE_LANGUAGE_CODE?.trim() || DEFAULT_LANGUAGE_CODE,
  pollIntervalMs: parsePositiveInt(
    'TRANSCRIBE_POLL_INTERVAL_MS',
    env.TRANSCRIBE_POLL_INTERVAL_MS,
    DEFAULT_POLL_INTERVAL_MS
  ),
  verbose: ['1', 'true'].includes((env.TRANSCRIPT_TOOLKIT_VERBOSE ?? '').toLowerCase()),
});
