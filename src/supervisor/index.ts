export * from './MembershipSupervisor';
