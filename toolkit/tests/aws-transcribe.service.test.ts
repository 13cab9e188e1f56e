import { ConflictException } from '@aws-sdk/client-transcribe';
import axios from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { silentLogger } from '../src/logger.js';
import { AwsTranscribeService, type TranscribeApi } from '../src/services/aws-transcribe.service.js';
import type { IStorageService } from '../src/services/storage.service.js';

vi.mock('axios', () => ({ default: { get: vi.fn() } }));

const fakeClient = () => ({
  config: { credentials: vi.fn(async (): Promise<unknown> => ({ accessKeyId: 'test-key' })) },
  startTranscriptionJob: vi.fn<TranscribeApi['startTranscriptionJob']>(),
  getTranscriptionJob: vi.fn<TranscribeApi['getTranscriptionJob']>(),
  listTranscriptionJobs: vi.fn<TranscribeApi['listTranscriptionJobs']>(),
});

const fakeStorage = () => ({
  validateBucket: vi.fn<IStorageService['validateBucket']>(),
  uploadFile: vi.fn<IStorageService['uploadFile']>(),
  getJson: vi.fn<IStorageService['getJson']>(),
});

const request = { mediaUri: 's3://team-audio/interview.mp3', maxSpeakers: 3, languageCode: 'en-US' };

describe('AwsTranscribeService', () => {
  let client: ReturnType<typeof fakeClient>;
  let storage: ReturnType<typeof fakeStorage>;
  let service: AwsTranscribeService;

  beforeEach(() => {
    client = fakeClient();
    storage = fakeStorage();
    service = new AwsTranscribeService(client, storage, silentLogger);
    vi.mocked(axios.get).mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('verifyCredentials', () => {
    it('passes when the credential chain resolves', async () => {
      await expect(service.verifyCredentials()).resolves.toBeUndefined();
    });

    it('explains missing credentials', async () => {
      client.config.credentials.mockRejectedValueOnce(new Error('Could not load credentials'));

      await expect(service.verifyCredentials()).rejects.toThrow(
        'AWS credentials not found. Configure them with `aws configure` or the AWS_* environment variables.'
      );
    });
  });

  describe('startJob', () => {
    it('requests speaker labels for the media file', async () => {
      client.startTranscriptionJob.mockResolvedValueOnce({
        $metadata: {},
        TranscriptionJob: {
          TranscriptionJobName: 'interview',
          TranscriptionJobStatus: 'IN_PROGRESS',
          Media: { MediaFileUri: 's3://team-audio/interview.mp3' },
        },
      });

      const job = await service.startJob(request);

      expect(job).toEqual({
        name: 'interview',
        status: 'IN_PROGRESS',
        mediaUri: 's3://team-audio/interview.mp3',
      });
      expect(client.startTranscriptionJob).toHaveBeenCalledWith({
        TranscriptionJobName: 'interview',
        Media: { MediaFileUri: 's3://team-audio/interview.mp3' },
        MediaFormat: 'mp3',
        LanguageCode: 'en-US',
        Settings: { ShowSpeakerLabels: true, MaxSpeakerLabels: 3 },
      });
    });

    it('retries once with a timestamp suffix when the name is taken', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(1_767_225_600_000);
      client.startTranscriptionJob
        .mockRejectedValueOnce(new ConflictException({ message: 'Job exists', $metadata: {} }))
        .mockResolvedValueOnce({
          $metadata: {},
          TranscriptionJob: {
            TranscriptionJobName: 'interview-1767225600',
            TranscriptionJobStatus: 'QUEUED',
          },
        });

      const job = await service.startJob(request);

      expect(job.name).toBe('interview-1767225600');
      expect(client.startTranscriptionJob).toHaveBeenCalledTimes(2);
      expect(client.startTranscriptionJob).toHaveBeenLastCalledWith(
        expect.objectContaining({ TranscriptionJobName: 'interview-1767225600' })
      );
    });

    it('reports a failed retry like a failed first attempt', async () => {
      client.startTranscriptionJob
        .mockRejectedValueOnce(new ConflictException({ message: 'Job exists', $metadata: {} }))
        .mockRejectedValueOnce(new ConflictException({ message: 'Job exists', $metadata: {} }));

      await expect(service.startJob(request)).rejects.toThrow(
        'Failed to start transcription job: Job exists'
      );
    });

    it('does not retry other errors', async () => {
      client.startTranscriptionJob.mockRejectedValueOnce(new Error('Rate exceeded'));

      await expect(service.startJob(request)).rejects.toThrow(
        'Failed to start transcription job: Rate exceeded'
      );
      expect(client.startTranscriptionJob).toHaveBeenCalledTimes(1);
    });

    it('rejects media formats Transcribe does not accept', async () => {
      await expect(
        service.startJob({ ...request, mediaUri: 's3://team-audio/notes.txt' })
      ).rejects.toThrow('Unsupported media format "txt" for s3://team-audio/notes.txt.');
      expect(client.startTranscriptionJob).not.toHaveBeenCalled();
    });
  });

  describe('listJobsForBucket', () => {
    it('follows every page and keeps the jobs of one bucket', async () => {
      const media = new Map([
        ['standup', 's3://team-audio/standup.mp3'],
        ['podcast', 's3://other-audio/podcast.mp3'],
        ['retro', 's3://team-audio/retro.wav'],
      ]);
      client.listTranscriptionJobs
        .mockResolvedValueOnce({
          $metadata: {},
          TranscriptionJobSummaries: [
            { TranscriptionJobName: 'standup' },
            { TranscriptionJobName: 'podcast' },
          ],
          NextToken: 'page-2',
        })
        .mockResolvedValueOnce({
          $metadata: {},
          TranscriptionJobSummaries: [{ TranscriptionJobName: 'retro' }],
        });
      client.getTranscriptionJob.mockImplementation(async ({ TranscriptionJobName }) => ({
        $metadata: {},
        TranscriptionJob: {
          TranscriptionJobName,
          TranscriptionJobStatus: 'COMPLETED',
          Media: { MediaFileUri: media.get(TranscriptionJobName ?? '') },
        },
      }));

      const jobs = await service.listJobsForBucket('team-audio');

      expect(jobs.map((job) => job.name)).toEqual(['standup', 'retro']);
      expect(client.listTranscriptionJobs).toHaveBeenNthCalledWith(1, { NextToken: undefined });
      expect(client.listTranscriptionJobs).toHaveBeenNthCalledWith(2, { NextToken: 'page-2' });
    });
  });

  describe('fetchTranscript', () => {
    const completed = (transcriptUri: string) => ({
      name: 'standup',
      status: 'COMPLETED' as const,
      transcriptUri,
    });

    it('reads path-style S3 URLs through storage', async () => {
      storage.getJson.mockResolvedValueOnce({ results: { items: [] } });

      const transcript = await service.fetchTranscript(
        completed('https://s3.eu-west-1.amazonaws.com/team-transcripts/jobs/standup.json')
      );

      expect(transcript).toEqual({ results: { items: [] } });
      expect(storage.getJson).toHaveBeenCalledWith('team-transcripts', 'jobs/standup.json');
      expect(axios.get).not.toHaveBeenCalled();
    });

    it('downloads any other URL over HTTPS', async () => {
      const uri = 'https://transcripts.example.com/standup.json?token=test-token';
      vi.mocked(axios.get).mockResolvedValueOnce({ data: { results: { items: [] } } });

      await expect(service.fetchTranscript(completed(uri))).resolves.toEqual({
        results: { items: [] },
      });
      expect(axios.get).toHaveBeenCalledWith(uri, { responseType: 'json' });
      expect(storage.getJson).not.toHaveBeenCalled();
    });

    it('falls back to HTTPS for S3 URLs with a malformed escape', async () => {
      const uri = 'https://s3.amazonaws.com/team-transcripts/bad%zz.json';
      vi.mocked(axios.get).mockResolvedValueOnce({ data: { results: { items: [] } } });

      await service.fetchTranscript(completed(uri));

      expect(axios.get).toHaveBeenCalledWith(uri, { responseType: 'json' });
      expect(storage.getJson).not.toHaveBeenCalled();
    });

    it('refuses jobs that have not completed', async () => {
      await expect(
        service.fetchTranscript({ name: 'standup', status: 'IN_PROGRESS' })
      ).rejects.toThrow('Job standup has no transcript (status IN_PROGRESS).');
    });
  });
});
