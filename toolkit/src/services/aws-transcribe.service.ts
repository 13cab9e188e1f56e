import {
  ConflictException,
  LanguageCode,
  MediaFormat,
  type GetTranscriptionJobCommandInput,
  type GetTranscriptionJobCommandOutput,
  type ListTranscriptionJobsCommandInput,
  type ListTranscriptionJobsCommandOutput,
  type StartTranscriptionJobCommandInput,
  type StartTranscriptionJobCommandOutput,
  type TranscriptionJob as AwsTranscriptionJob,
} from '@aws-sdk/client-transcribe';
import axios from 'axios';

import { createLogger, type Logger } from '../logger.js';
import type { IStorageService } from './storage.service.js';
import { errorMessage } from '../utils/errors.js';
import {
  type ITranscribeService,
  type StartJobRequest,
  type TranscriptionJob,
  type WaitOptions,
  createJobName,
  mediaFormatOf,
  parseS3HttpsUrl,
  pollUntilTerminal,
  toJobStatus,
} from './transcribe.service.js';

const isMediaFormat = (value: string): value is MediaFormat =>
  Object.values<string>(MediaFormat).includes(value);

const isLanguageCode = (value: string): value is LanguageCode =>
  Object.values<string>(LanguageCode).includes(value);

/** The calls this service makes on the SDK's `Transcribe` client. */
export interface TranscribeApi {
  config: { credentials: () => Promise<unknown> };
  startTranscriptionJob(
    input: StartTranscriptionJobCommandInput
  ): Promise<StartTranscriptionJobCommandOutput>;
  getTranscriptionJob(input: GetTranscriptionJobCommandInput): Promise<GetTranscriptionJobCommandOutput>;
  listTranscriptionJobs(
    input: ListTranscriptionJobsCommandInput
  ): Promise<ListTranscriptionJobsCommandOutput>;
}

const startFailure = (err: unknown) =>
  new Error(`Failed to start transcription job: ${errorMessage(err)}`, { cause: err });

const toJob = (job: AwsTranscriptionJob | undefined, fallbackName: string): TranscriptionJob => ({
  name: job?.TranscriptionJobName ?? fallbackName,
  status: toJobStatus(job?.TranscriptionJobStatus),
  mediaUri: job?.Media?.MediaFileUri,
  transcriptUri: job?.Transcript?.TranscriptFileUri,
  failureReason: job?.FailureReason,
});

export class AwsTranscribeService implements ITranscribeService {
  private transcribeClient: TranscribeApi;
  private storage: IStorageService;
  private logger: Logger;

  constructor(
    transcribeClient: TranscribeApi,
    storage: IStorageService,
    logger: Logger = createLogger('AwsTranscribeService')
  ) {
    this.transcribeClient = transcribeClient;
    this.storage = storage;
    this.logger = logger;
  }

  async verifyCredentials(): Promise<void> {
    try {
      await this.transcribeClient.config.credentials();
    } catch (err) {
      throw new Error(
        'AWS credentials not found. Configure them with `aws configure` or the AWS_* environment variables.',
        { cause: err }
      );
    }
  }

  async startJob({ mediaUri, maxSpeakers, languageCode }: StartJobRequest): Promise<TranscriptionJob> {
    const format = mediaFormatOf(mediaUri);
    if (!isMediaFormat(format)) {
      throw new Error(`Unsupported media format "${format}" for ${mediaUri}.`);
    }
    if (!isLanguageCode(languageCode)) {
      throw new Error(`Unsupported language code "${languageCode}".`);
    }

    const send = async (jobName: string) => {
      const response = await this.transcribeClient.startTranscriptionJob({
        TranscriptionJobName: jobName,
        Media: { MediaFileUri: mediaUri },
        MediaFormat: format,
        LanguageCode: languageCode,
        Settings: {
          ShowSpeakerLabels: true,
          MaxSpeakerLabels: maxSpeakers,
        },
      });
      this.logger.info(`Started job ${jobName}.`);
      return toJob(response.TranscriptionJob, jobName);
    };

    const jobName = createJobName(mediaUri);
    try {
      return await send(jobName);
    } catch (err) {
      if (!(err instanceof ConflictException)) throw startFailure(err);
    }

    const retryName = `${jobName}-${Math.floor(Date.now() / 1000)}`;
    this.logger.warn(`Job name already in use, retrying as ${retryName}.`);
    try {
      return await send(retryName);
    } catch (err) {
      throw startFailure(err);
    }
  }

  async getJob(name: string): Promise<TranscriptionJob> {
    const response = await this.transcribeClient.getTranscriptionJob({
      TranscriptionJobName: name,
    });
    const job = toJob(response.TranscriptionJob, name);
    this.logger.debug(`Job ${name} status: ${job.status}`);
    return job;
  }

  async listJobsForBucket(bucket: string): Promise<TranscriptionJob[]> {
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const response = await this.transcribeClient.listTranscriptionJobs({
        NextToken: nextToken,
      });
      for (const summary of response.TranscriptionJobSummaries ?? []) {
        if (summary.TranscriptionJobName) names.push(summary.TranscriptionJobName);
      }
      nextToken = response.NextToken;
    } while (nextToken);

    this.logger.debug(`Found ${names.length} job(s), filtering by bucket ${bucket}.`);

    // Summaries carry no media URI, so each job is read in full.
    const prefix = `s3://${bucket}/`;
    const matching: TranscriptionJob[] = [];
    for (const name of names) {
      const job = await this.getJob(name);
      if (job.mediaUri?.startsWith(prefix)) matching.push(job);
    }
    return matching;
  }

  waitForJob(name: string, options: WaitOptions): Promise<TranscriptionJob> {
    return pollUntilTerminal((jobName) => this.getJob(jobName), name, options);
  }

  async fetchTranscript(job: TranscriptionJob): Promise<unknown> {
    if (job.status !== 'COMPLETED' || !job.transcriptUri) {
      throw new Error(`Job ${job.name} has no transcript (status ${job.status}).`);
    }

    const location = parseS3HttpsUrl(job.transcriptUri);
    if (location) {
      return this.storage.getJson(location.bucket, location.key);
    }

    this.logger.debug(`Downloading transcript from ${job.transcriptUri}`);
    const response = await axios.get<unknown>(job.transcriptUri, { responseType: 'json' });
    return response.data;
  }
}
