export type JobStatus = 'QUEUED' | 'IN_PROGRESS' | 'COMPLETED' | 'FAILED';

export interface TranscriptionJob {
  name: string;
  status: JobStatus;
  mediaUri?: string;
  transcriptUri?: string;
  failureReason?: string;
}

export interface StartJobRequest {
  /** `s3://bucket/key` of the audio file. */
  mediaUri: string;
  maxSpeakers: number;
  languageCode: string;
}

export interface WaitOptions {
  intervalMs: number;
  onPoll?: (job: TranscriptionJob) => void;
}

export interface ITranscribeService {
  verifyCredentials(): Promise<void>;
  startJob(request: StartJobRequest): Promise<TranscriptionJob>;
  getJob(name: string): Promise<TranscriptionJob>;
  /** Jobs whose media lives under `s3://<bucket>/`. */
  listJobsForBucket(bucket: string): Promise<TranscriptionJob[]>;
  /** Polls until the job is COMPLETED or FAILED. */
  waitForJob(name: string, options: WaitOptions): Promise<TranscriptionJob>;
  /**
   * @returns The parsed transcript JSON of a completed job.
   */
  fetchTranscript(job: TranscriptionJob): Promise<unknown>;
}

export const MIN_SPEAKERS = 2;
export const MAX_SPEAKERS = 30;

export const delay = (ms: number) => new Promise<void>((res) => setTimeout(res, ms));

export const isTerminal = (status: JobStatus): boolean =>
  status === 'COMPLETED' || status === 'FAILED';

export const toJobStatus = (value: string | undefined): JobStatus => {
  switch (value) {
    case 'IN_PROGRESS':
    case 'COMPLETED':
    case 'FAILED':
      return value;
    default:
      return 'QUEUED';
  }
};

const fileNameOf = (uri: string): string => uri.split('/').pop() ?? '';

/** Job name from the media file's base name, safe for Transcribe. */
export const createJobName = (mediaUri: string): string => {
  const baseName = fileNameOf(mediaUri).split('.')[0] ?? '';
  return baseName.replace(/[^a-zA-Z0-9_-]/g, '-') || 'transcription-job';
};

export const mediaFormatOf = (mediaUri: string): string => {
  const fileName = fileNameOf(mediaUri);
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
};

export interface SpeakerCountResult {
  count: number;
  warning?: string;
}

export const parseSpeakerCount = (input: string): SpeakerCountResult => {
  const trimmed = input.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (Number.isNaN(parsed)) {
    return {
      count: MIN_SPEAKERS,
      warning: `Invalid speaker count "${input}". Defaulting to ${MIN_SPEAKERS} speakers.`,
    };
  }
  if (parsed < MIN_SPEAKERS || parsed > MAX_SPEAKERS) {
    return {
      count: MIN_SPEAKERS,
      warning: `Speaker count should be between ${MIN_SPEAKERS} and ${MAX_SPEAKERS}. Defaulting to ${MIN_SPEAKERS}.`,
    };
  }
  return { count: parsed };
};

export interface S3Location {
  bucket: string;
  key: string;
}

export const parseS3Uri = (uri: string): S3Location | undefined => {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri.trim());
  if (!match?.[1] || !match[2]) return undefined;
  return { bucket: match[1], key: match[2] };
};

/**
 * Bucket and key of a path-style S3 HTTPS URL, such as the
 * `TranscriptFileUri` Transcribe reports. Other URLs return `undefined`.
 */
export const parseS3HttpsUrl = (uri: string): S3Location | undefined => {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return undefined;
  }
  if (!/^s3([.-][a-z0-9-]+)?\.amazonaws\.com$/.test(url.hostname)) return undefined;

  const [bucket, ...keyParts] = url.pathname.replace(/^\/+/, '').split('/');
  let key: string;
  try {
    key = keyParts.map(decodeURIComponent).join('/');
  } catch {
    // malformed percent escape
    return undefined;
  }
  if (!bucket || !key) return undefined;
  return { bucket, key };
};

/**
 * Shared polling loop: reads the job until it reaches a terminal status.
 */
export const pollUntilTerminal = async (
  getJob: (name: string) => Promise<TranscriptionJob>,
  name: string,
  { intervalMs, onPoll }: WaitOptions
): Promise<TranscriptionJob> => {
  let job = await getJob(name);
  while (!isTerminal(job.status)) {
    await delay(intervalMs);
    job = await getJob(name);
    onPoll?.(job);
  }
  return job;
};
