import { S3Client } from '@aws-sdk/client-s3';
import { InvalidArgumentError } from '../common/errors';
import { Logger } from '../common/logger';
import { ClusterMetaJSONFile } from './ClusterMetaJSONFile';
import { ClusterMetaObject } from './ClusterMetaObject';
import { InMemoryClusterMeta } from './InMemoryClusterMeta';
import { ObjectStorageClient, S3ObjectStorageClient } from './ObjectStorageClient';
import { ClusterMetaStore } from './types';

export type ClusterMetaLocation =
  | { kind: 'file'; path: string }
  | { kind: 's3'; bucket: string; key: string }
  | { kind: 'memory'; name: string };

export interface ClusterMetaFactoryOptions {
  logger?: Logger;
  lockRetryInterval?: number;
  /** Object storage client to use for s3:// locations instead of one built from the bucket */
  objectStorage?: ObjectStorageClient;
  s3Client?: S3Client;
}

/**
 * Interpret a metadata source: a file path, a "file:" URI, an
 * "s3://bucket/key" URI or "memory:".
 */
export function parseClusterMetaLocation(uri: string): ClusterMetaLocation {
  if (uri.trim() === '') {
    throw new InvalidArgumentError('cluster metadata location is empty');
  }

  if (uri.startsWith('s3://')) {
    const rest = uri.slice('s3://'.length);
    const slash = rest.indexOf('/');
    if (slash <= 0 || slash === rest.length - 1) {
      throw new InvalidArgumentError(`invalid object storage location: ${uri}`);
    }
    return { kind: 's3', bucket: rest.slice(0, slash), key: rest.slice(slash + 1) };
  }

  if (uri.startsWith('memory:')) {
    return { kind: 'memory', name: uri.slice('memory:'.length) };
  }

  let filePath = uri.startsWith('file:') ? uri.slice('file:'.length) : uri;
  if (filePath.startsWith('/')) {
    // ensure exactly one leading slash
    filePath = '/' + filePath.replace(/^\/+/, '');
  }
  if (filePath === '') {
    throw new InvalidArgumentError(`invalid file location: ${uri}`);
  }
  return { kind: 'file', path: filePath };
}

/**
 * Construct the metadata store handle for a location. Callers create it once
 * and pass it to every operation.
 */
export function openClusterMeta(uri: string, options: ClusterMetaFactoryOptions = {}): ClusterMetaStore {
  const location = parseClusterMetaLocation(uri);
  switch (location.kind) {
    case 'file':
      return new ClusterMetaJSONFile(location.path, {
        logger: options.logger,
        lockRetryInterval: options.lockRetryInterval
      });
    case 's3': {
      const client = options.objectStorage
        ?? new S3ObjectStorageClient(location.bucket, options.s3Client);
      return new ClusterMetaObject(client, location.key, {
        locationPrefix: `s3://${location.bucket}/`,
        logger: options.logger,
        lockRetryInterval: options.lockRetryInterval
      });
    }
    case 'memory':
      return new InMemoryClusterMeta(uri);
  }
}
