export * from './errors';
export * from './CommandRunner';
export * from './DaemonController';
export * from './LegacyMigration';
