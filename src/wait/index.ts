export * from './types';
export * from './Sleeper';
export * from './FileChangeWaiter';
export * from './bestWaiter';
