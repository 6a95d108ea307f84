import { S3 } from 'aws-sdk';
import { RunSnapshotStore, RunState } from '../types/run-state';

export interface RunSnapshotRepositoryConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  /** Clock used to date-partition keys */
  now?: () => Date;
}

/**
 * Run Snapshot Repository - persists finished run states in S3
 *
 * Snapshots are write-once JSON documents partitioned by ticker and the
 * UTC day they were saved.
 *
 * Storage path format: runs/{ticker}/{year}/{month}/{day}/{runId}.json
 */
export class RunSnapshotRepository implements RunSnapshotStore {
  private readonly s3Client: S3;
  private readonly bucket: string;
  private readonly now: () => Date;

  constructor(config: RunSnapshotRepositoryConfig) {
    const s3Config: S3.ClientConfiguration = {
      region: config.region,
      ...(config.endpoint && {
        endpoint: config.endpoint,
        s3ForcePathStyle: true
      })
    };
    this.s3Client = new S3(s3Config);
    this.bucket = config.bucket;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Generate S3 key for a run snapshot
   */
  generateKey(ticker: string, savedAt: Date, runId: string): string {
    const year = savedAt.getUTCFullYear();
    const month = String(savedAt.getUTCMonth() + 1).padStart(2, '0');
    const day = String(savedAt.getUTCDate()).padStart(2, '0');

    return `runs/${ticker}/${year}/${month}/${day}/${runId}.json`;
  }

  /**
   * Store a run state snapshot
   */
  async saveSnapshot(state: RunState): Promise<void> {
    const key = this.generateKey(state.ticker, this.now(), state.runId);

    await this.s3Client.putObject({
      Bucket: this.bucket,
      Key: key,
      Body: JSON.stringify(state),
      ContentType: 'application/json',
      Metadata: {
        'run-id': state.runId,
        'ticker': state.ticker,
        'status': state.status,
        'degraded': String(state.degraded)
      }
    }).promise();
  }

  /**
   * Read a snapshot back. Returns null when the object does not exist.
   */
  async getSnapshot(ticker: string, savedAt: Date, runId: string): Promise<RunState | null> {
    const key = this.generateKey(ticker, savedAt, runId);

    try {
      const result = await this.s3Client.getObject({
        Bucket: this.bucket,
        Key: key
      }).promise();

      if (!result.Body) {
        return null;
      }
      return JSON.parse(result.Body.toString()) as RunState;
    } catch (error: unknown) {
      if (error && typeof error === 'object' && 'code' in error && error.code === 'NoSuchKey') {
        return null;
      }
      throw error;
    }
  }
}
