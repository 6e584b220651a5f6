export * from './retry.util';
export * from './sleep.util';
export * from './user-agent.util';
export * from './zoned-time.util';
