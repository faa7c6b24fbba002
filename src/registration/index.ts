export * from './NodeRegistration';
