import { promises as fs } from 'fs';
import path from 'path';

import { createLogger, type Logger } from '../logger.js';
import { toS3Uri, type IStorageService } from './storage.service.js';
import {
  type ITranscribeService,
  type JobStatus,
  type StartJobRequest,
  type TranscriptionJob,
  type WaitOptions,
  createJobName,
  pollUntilTerminal,
  toJobStatus,
} from './transcribe.service.js';

export interface MockJob {
  name: string;
  mediaUri: string;
  status?: JobStatus;
  /** getJob calls before a non-terminal job turns COMPLETED. */
  pollsUntilComplete?: number;
  transcript: unknown;
}

interface MockEntry {
  job: TranscriptionJob;
  remainingPolls: number;
  transcript: unknown;
}

const EMPTY_TRANSCRIPT = { results: { items: [] } };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Validates the contents of a mock jobs file. */
export const parseMockJobs = (data: unknown): MockJob[] => {
  if (!Array.isArray(data)) {
    throw new Error('Mock jobs file must contain a JSON array.');
  }
  return data.map((entry: unknown, index): MockJob => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.mediaUri !== 'string') {
      throw new Error(`Mock job #${index + 1} needs string "name" and "mediaUri" fields.`);
    }
    return {
      name: entry.name,
      mediaUri: entry.mediaUri,
      status: typeof entry.status === 'string' ? toJobStatus(entry.status) : 'COMPLETED',
      pollsUntilComplete:
        typeof entry.pollsUntilComplete === 'number' ? entry.pollsUntilComplete : undefined,
      transcript: entry.transcript ?? EMPTY_TRANSCRIPT,
    };
  });
};

export const loadMockJobs = async (filePath: string): Promise<MockJob[]> => {
  const data: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  return parseMockJobs(data);
};

/**
 * In-memory Transcribe stand-in. Jobs that are not terminal complete after
 * `pollsUntilComplete` reads.
 */
export class MockTranscribeService implements ITranscribeService {
  private jobs = new Map<string, MockEntry>();
  private logger: Logger;

  constructor(seed: MockJob[] = [], logger: Logger = createLogger('MockTranscribeService')) {
    this.logger = logger;
    for (const mock of seed) this.register(mock);
  }

  private register(mock: MockJob): TranscriptionJob {
    const job: TranscriptionJob = {
      name: mock.name,
      mediaUri: mock.mediaUri,
      status: mock.status ?? 'COMPLETED',
    };
    if (job.status === 'COMPLETED') job.transcriptUri = `mock://${mock.name}`;
    if (job.status === 'FAILED') job.failureReason = 'Simulated failure';
    this.jobs.set(mock.name, {
      job,
      remainingPolls: mock.pollsUntilComplete ?? 1,
      transcript: mock.transcript,
    });
    return { ...job };
  }

  async verifyCredentials(): Promise<void> {
    this.logger.debug('Mock provider needs no credentials.');
  }

  async startJob({ mediaUri }: StartJobRequest): Promise<TranscriptionJob> {
    let name = createJobName(mediaUri);
    if (this.jobs.has(name)) name = `${name}-${Math.floor(Date.now() / 1000)}`;
    this.logger.info(`Simulating job ${name} for ${mediaUri}`);
    return this.register({ name, mediaUri, status: 'IN_PROGRESS', transcript: EMPTY_TRANSCRIPT });
  }

  async getJob(name: string): Promise<TranscriptionJob> {
    const entry = this.jobs.get(name);
    if (!entry) throw new Error(`Transcription job ${name} not found.`);

    if (entry.job.status === 'QUEUED' || entry.job.status === 'IN_PROGRESS') {
      entry.remainingPolls--;
      if (entry.remainingPolls <= 0) {
        entry.job.status = 'COMPLETED';
        entry.job.transcriptUri = `mock://${name}`;
      } else {
        entry.job.status = 'IN_PROGRESS';
      }
    }
    return { ...entry.job };
  }

  async listJobsForBucket(bucket: string): Promise<TranscriptionJob[]> {
    const prefix = `s3://${bucket}/`;
    return [...this.jobs.values()]
      .filter(({ job }) => job.mediaUri?.startsWith(prefix))
      .map(({ job }) => ({ ...job }));
  }

  waitForJob(name: string, options: WaitOptions): Promise<TranscriptionJob> {
    return pollUntilTerminal((jobName) => this.getJob(jobName), name, options);
  }

  async fetchTranscript(job: TranscriptionJob): Promise<unknown> {
    const entry = this.jobs.get(job.name);
    if (!entry || entry.job.status !== 'COMPLETED') {
      throw new Error(`Job ${job.name} has no transcript (status ${job.status}).`);
    }
    return entry.transcript;
  }
}

export class MockStorageService implements IStorageService {
  private buckets: Set<string>;
  private objects = new Map<string, unknown>();

  /** With no buckets listed, every bucket is accepted. */
  constructor(buckets: string[] = []) {
    this.buckets = new Set(buckets);
  }

  async validateBucket(bucket: string): Promise<void> {
    if (this.buckets.size > 0 && !this.buckets.has(bucket)) {
      throw new Error(`Bucket '${bucket}' does not exist`);
    }
  }

  async uploadFile(localPath: string, bucket: string, key?: string): Promise<string> {
    await this.validateBucket(bucket);
    const stats = await fs.stat(localPath).catch(() => null);
    if (!stats?.isFile()) {
      throw new Error(`Local file '${localPath}' not found`);
    }
    const uri = toS3Uri(bucket, key ?? path.basename(localPath));
    this.objects.set(uri, await fs.readFile(localPath, 'utf-8'));
    return uri;
  }

  async getJson(bucket: string, key: string): Promise<unknown> {
    const uri = toS3Uri(bucket, key);
    if (!this.objects.has(uri)) throw new Error(`Object ${uri} not found.`);
    const stored = this.objects.get(uri);
    const data: unknown = typeof stored === 'string' ? JSON.parse(stored) : stored;
    return data;
  }
}
