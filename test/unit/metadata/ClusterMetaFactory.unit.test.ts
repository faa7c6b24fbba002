import { InvalidArgumentError } from '../../../src/common/errors';
import { ClusterMetaJSONFile } from '../../../src/metadata/ClusterMetaJSONFile';
import { ClusterMetaObject } from '../../../src/metadata/ClusterMetaObject';
import { openClusterMeta, parseClusterMetaLocation } from '../../../src/metadata/ClusterMetaFactory';
import { InMemoryClusterMeta } from '../../../src/metadata/InMemoryClusterMeta';
import { InMemoryObjectStorageClient } from '../../helpers/fakes';

describe('parseClusterMetaLocation', () => {
  it('should treat bare paths and file URIs as files', () => {
    expect(parseClusterMetaLocation('/var/lib/ctdb/shared/nodes.json'))
      .toEqual({ kind: 'file', path: '/var/lib/ctdb/shared/nodes.json' });
    expect(parseClusterMetaLocation('file:///var/lib/ctdb/shared/nodes.json'))
      .toEqual({ kind: 'file', path: '/var/lib/ctdb/shared/nodes.json' });
    expect(parseClusterMetaLocation('relative/nodes.json'))
      .toEqual({ kind: 'file', path: 'relative/nodes.json' });
  });

  it('should split s3 URIs into bucket and key', () => {
    expect(parseClusterMetaLocation('s3://test-bucket/fleet/nodes.json'))
      .toEqual({ kind: 's3', bucket: 'test-bucket', key: 'fleet/nodes.json' });
  });

  it('should recognise in-memory locations', () => {
    expect(parseClusterMetaLocation('memory:unit')).toEqual({ kind: 'memory', name: 'unit' });
  });

  it('should reject empty and incomplete locations', () => {
    expect(() => parseClusterMetaLocation('')).toThrow(InvalidArgumentError);
    expect(() => parseClusterMetaLocation('s3://test-bucket')).toThrow('invalid object storage location');
    expect(() => parseClusterMetaLocation('s3://test-bucket/')).toThrow('invalid object storage location');
    expect(() => parseClusterMetaLocation('file:')).toThrow('invalid file location');
  });
});

describe('openClusterMeta', () => {
  it('should open the backend matching the location', () => {
    expect(openClusterMeta('/tmp/nodes.json')).toBeInstanceOf(ClusterMetaJSONFile);
    expect(openClusterMeta('memory:')).toBeInstanceOf(InMemoryClusterMeta);

    const store = openClusterMeta('s3://test-bucket/nodes.json', { objectStorage: new InMemoryObjectStorageClient() });
    expect(store).toBeInstanceOf(ClusterMetaObject);
    expect(store.location).toBe('s3://test-bucket/nodes.json');
  });
});
