import axios from 'axios';
import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { StorageConfigurationError } from '../errors';
import { create } from '../logger';
import { type RunReport } from '../orchestrator/report';
import { sendRequestWithRetry } from '../utils/http';

const logger = create({ name: 'persistence' });

/** Destination of the finished run report. */
export interface ReportSink {
  /**
   * Persist the report. Remote side effects are skipped on dry runs.
   * @returns the path of the local copy
   */
  persist(report: RunReport, options: { dryRun: boolean }): Promise<string>;
}

/** Location of the report archive in Azure Data Lake / Blob Storage. */
export type StorageSettings = {
  accountName: string;
  fileSystem: string;
  directory: string;
  /** Shared access signature with write permission. */
  sasToken: string;
};

const STORAGE_VARIABLES = ['DATALAKE_NAME', 'DATALAKE_FILESYSTEM', 'DATALAKE_DIRECTORY', 'DATALAKE_SASTOKEN'] as const;

/**
 * Read the storage settings from the environment.
 * @throws {StorageConfigurationError} listing every missing variable
 */
export function getStorageSettingsFromEnvironment(env: NodeJS.ProcessEnv = process.env): StorageSettings {
  const missing = STORAGE_VARIABLES.filter((name) => !env[name]);
  const { DATALAKE_NAME, DATALAKE_FILESYSTEM, DATALAKE_DIRECTORY, DATALAKE_SASTOKEN } = env;
  if (!DATALAKE_NAME || !DATALAKE_FILESYSTEM || !DATALAKE_DIRECTORY || !DATALAKE_SASTOKEN) {
    throw new StorageConfigurationError(`Report storage is not configured; missing ${missing.join(', ')}`);
  }
  return {
    accountName: DATALAKE_NAME,
    fileSystem: DATALAKE_FILESYSTEM,
    directory: DATALAKE_DIRECTORY,
    sasToken: DATALAKE_SASTOKEN,
  };
}

/** Name of the report file, from the start of the run: `dependency-updates-20260301T060000.json` */
export function reportFileName(report: RunReport): string {
  const stamp = report.metadata.start_time.slice(0, 19).replace(/[-:]/g, '');
  return `dependency-updates-${stamp}.json`;
}

/** URL of the blob, without the shared access signature. */
export function blobUrl({ accountName, fileSystem, directory }: StorageSettings, fileName: string): string {
  const path = [fileSystem, ...directory.split('/'), fileName].filter(Boolean).map(encodeURIComponent).join('/');
  return `https://${accountName}.blob.core.windows.net/${path}`;
}

export type RunReportSinkOptions = {
  /** Directory for the local copy. */
  outputDirectory: string;
  /** Keep the report local even outside dry runs. */
  skipUpload?: boolean;
  /** Resolved only when uploading. */
  storage?: () => StorageSettings;
  retryDelay?: number;
};

/**
 * Writes the report to a local JSON file and then uploads the same document as a block blob.
 */
export class RunReportSink implements ReportSink {
  private readonly outputDirectory: string;
  private readonly skipUpload: boolean;
  private readonly storage: () => StorageSettings;
  private readonly retryDelay?: number;

  constructor({
    outputDirectory,
    skipUpload = false,
    storage = () => getStorageSettingsFromEnvironment(),
    retryDelay,
  }: RunReportSinkOptions) {
    this.outputDirectory = outputDirectory;
    this.skipUpload = skipUpload;
    this.storage = storage;
    this.retryDelay = retryDelay;
  }

  public async persist(report: RunReport, { dryRun }: { dryRun: boolean }): Promise<string> {
    const fileName = reportFileName(report);
    const contents = JSON.stringify(report, null, 2);

    await mkdir(this.outputDirectory, { recursive: true });
    const path = resolve(join(this.outputDirectory, fileName));
    await writeFile(path, contents, 'utf-8');
    logger.info(`Run report written to ${path}`);

    if (dryRun || this.skipUpload) {
      logger.info(`Skipping report upload (${dryRun ? 'dry run' : 'upload disabled'})`);
      return path;
    }

    await this.upload(this.storage(), fileName, contents);
    return path;
  }

  private async upload(settings: StorageSettings, fileName: string, contents: string): Promise<void> {
    const url = blobUrl(settings, fileName);
    const signature = settings.sasToken.replace(/^\?/, '');

    // the signature stays out of the logged url
    await sendRequestWithRetry(
      'PUT',
      url,
      async () =>
        await axios.put(`${url}?${signature}`, contents, {
          headers: {
            'Content-Type': 'application/json',
            'x-ms-blob-type': 'BlockBlob',
          },
          validateStatus: () => true,
        }),
      { logger, retryDelay: this.retryDelay },
    );
    logger.info(`Run report uploaded to ${url}`);
  }
}
