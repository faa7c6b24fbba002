export * from './NodesFile';
