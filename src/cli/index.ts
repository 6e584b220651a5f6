export * from './cli-options';
export { UsageException } from './usage.exception';
