// Main entry point for the fleet-membership library

// Types
export * from './types';

// Common
export * from './common/logger';
export * from './common/errors';
export { delay, isAbortError, isValidAddress } from './common/utils';

// Cluster metadata stores
export * from './metadata';

// Nodes list
export * from './nodes';

// Reconciliation and registration
export * from './reconcile';
export * from './registration';

// Waiting and supervision
export * from './wait';
export * from './supervisor';

// Daemon control
export * from './control';

// Configuration
export * from './config/MembershipConfiguration';

// Command line
export * from './cli/NodeParams';
export { buildProgram, type CliDependencies } from './cli/program';
