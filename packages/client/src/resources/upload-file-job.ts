import { FormatError } from '@predictkit/utils';
import type { Connection } from '../connection.js';
import { Resource, type ResourceKind } from './resource.js';
import { UploadFileJobSchema, type UploadFileJobJson } from './schemas.js';

/** Indexed by the server's integer status code */
export const UPLOAD_FILE_JOB_STATUSES = [
  'PENDING',
  'CLOUD_FILE_UPLOADED',
  'QUEUED',
  'CLOUD_FILE_DOWNLOADED',
  'SUCCESS',
  'FAILED',
] as const;

export type UploadFileJobStatus = (typeof UPLOAD_FILE_JOB_STATUSES)[number];

export function uploadFileJobStatusName(code: number): UploadFileJobStatus {
  const name = Number.isInteger(code) ? UPLOAD_FILE_JOB_STATUSES[code] : undefined;
  if (name === undefined) {
    throw new FormatError(`Unknown upload file job status code: ${code}`, { status: code });
  }
  return name;
}

export const UPLOAD_FILE_JOB_KIND: ResourceKind<UploadFileJobJson> = {
  name: 'UploadFileJob',
  schema: UploadFileJobSchema,
  displayKeys: ['status'],
};

/**
 * Server-side processing of an uploaded forecast file. Created uncached:
 * poll with refresh() to follow its status.
 */
export class UploadFileJob extends Resource<UploadFileJobJson> {
  constructor(connection: Connection, uri: string, initialJson?: unknown) {
    super(connection, uri, UPLOAD_FILE_JOB_KIND, initialJson);
  }

  async status(): Promise<UploadFileJobStatus> {
    return uploadFileJobStatusName((await this.json()).status);
  }

  async isTerminal(): Promise<boolean> {
    const status = await this.status();
    return status === 'SUCCESS' || status === 'FAILED';
  }

  async outputJson(): Promise<Record<string, unknown> | null> {
    return (await this.json()).output_json ?? null;
  }

  protected override describe(snapshot: UploadFileJobJson): string[] {
    const name = UPLOAD_FILE_JOB_STATUSES[snapshot.status];
    return [`status=${name ?? snapshot.status}`];
  }
}
