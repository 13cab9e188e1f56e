import { S3 } from '@aws-sdk/client-s3';
import { Transcribe } from '@aws-sdk/client-transcribe';

import type { ToolkitConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { AwsTranscribeService } from './aws-transcribe.service.js';
import { loadMockJobs, MockStorageService, MockTranscribeService } from './mock.service.js';
import { S3StorageService, type IStorageService } from './storage.service.js';
import type { ITranscribeService } from './transcribe.service.js';

export interface ToolkitServices {
  transcribe: ITranscribeService;
  storage: IStorageService;
}

/**
 * Instantiates the Transcribe and storage services for the configured
 * provider.
 */
export const getServices = async (config: ToolkitConfig): Promise<ToolkitServices> => {
  const logger = createLogger('Services', { verbose: config.verbose });

  switch (config.provider) {
    case 'mock': {
      logger.info('Using MOCK provider for transcription.');
      const jobs = config.mockJobsFile ? await loadMockJobs(config.mockJobsFile) : [];
      return {
        transcribe: new MockTranscribeService(
          jobs,
          createLogger('MockTranscribeService', { verbose: config.verbose })
        ),
        storage: new MockStorageService(),
      };
    }

    case 'aws': {
      logger.debug(`Using AWS Transcribe (region: ${config.region ?? 'default chain'}).`);
      const storage = new S3StorageService(
        new S3({ region: config.region }),
        createLogger('S3StorageService', { verbose: config.verbose })
      );
      return {
        transcribe: new AwsTranscribeService(
          new Transcribe({ region: config.region }),
          storage,
          createLogger('AwsTranscribeService', { verbose: config.verbose })
        ),
        storage,
      };
    }
  }
};
