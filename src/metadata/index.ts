export * from './types';
export * from './document';
export * from './ClusterMetaJSONFile';
export * from './ClusterMetaObject';
export * from './ObjectStorageClient';
export * from './InMemoryClusterMeta';
export * from './ClusterMetaFactory';
