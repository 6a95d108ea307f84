/**
 * Tests for the S3 run snapshot repository
 */

const mockPutObject = jest.fn();
const mockGetObject = jest.fn();

jest.mock('aws-sdk', () => ({
  S3: jest.fn(() => ({
    putObject: (...args: unknown[]) => mockPutObject(...args),
    getObject: (...args: unknown[]) => mockGetObject(...args)
  }))
}));

import { S3 } from 'aws-sdk';
import { RunSnapshotRepository } from './run-snapshot';
import { createInitialState } from '../services/workflow-orchestrator';

const savedAt = new Date('2024-03-09T23:59:00Z');
const state = createInitialState('run-1', 'ACME', { startDate: '2024-03-01', endDate: '2024-03-08' });

const createRepository = () => new RunSnapshotRepository({
  bucket: 'test-bucket',
  region: 'us-east-1',
  now: () => savedAt
});

describe('RunSnapshotRepository', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockPutObject.mockReturnValue({ promise: () => Promise.resolve({}) });
  });

  it('should partition keys by ticker and UTC save date', () => {
    expect(createRepository().generateKey('ACME', savedAt, 'run-1'))
      .toBe('runs/ACME/2024/03/09/run-1.json');
  });

  it('should use path-style addressing for a custom endpoint', () => {
    new RunSnapshotRepository({ bucket: 'test-bucket', region: 'us-east-1', endpoint: 'http://localhost:4566' });

    expect(S3).toHaveBeenCalledWith({
      region: 'us-east-1',
      endpoint: 'http://localhost:4566',
      s3ForcePathStyle: true
    });
  });

  it('should write the state as JSON with run metadata', async () => {
    await createRepository().saveSnapshot(state);

    expect(mockPutObject).toHaveBeenCalledWith({
      Bucket: 'test-bucket',
      Key: 'runs/ACME/2024/03/09/run-1.json',
      Body: JSON.stringify(state),
      ContentType: 'application/json',
      Metadata: {
        'run-id': 'run-1',
        'ticker': 'ACME',
        'status': 'INIT',
        'degraded': 'false'
      }
    });
  });

  it('should propagate write failures', async () => {
    mockPutObject.mockReturnValue({ promise: () => Promise.reject(new Error('AccessDenied')) });

    await expect(createRepository().saveSnapshot(state)).rejects.toThrow('AccessDenied');
  });

  it('should read a stored snapshot back', async () => {
    mockGetObject.mockReturnValue({ promise: () => Promise.resolve({ Body: Buffer.from(JSON.stringify(state)) }) });

    await expect(createRepository().getSnapshot('ACME', savedAt, 'run-1')).resolves.toEqual(state);
    expect(mockGetObject).toHaveBeenCalledWith({ Bucket: 'test-bucket', Key: 'runs/ACME/2024/03/09/run-1.json' });
  });

  it('should return null for a missing snapshot', async () => {
    const missing = Object.assign(new Error('The specified key does not exist.'), { code: 'NoSuchKey' });
    mockGetObject.mockReturnValue({ promise: () => Promise.reject(missing) });

    await expect(createRepository().getSnapshot('ACME', savedAt, 'run-2')).resolves.toBeNull();
  });

  it('should rethrow other read errors', async () => {
    const denied = Object.assign(new Error('Access Denied'), { code: 'AccessDenied' });
    mockGetObject.mockReturnValue({ promise: () => Promise.reject(denied) });

    await expect(createRepository().getSnapshot('ACME', savedAt, 'run-1')).rejects.toThrow('Access Denied');
  });
});
