export * from './clock';
export * from './http-client';
export * from './utils';
