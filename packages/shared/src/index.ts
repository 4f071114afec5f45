export * from './config';
export * from './db';
export * from './errors';
export * from './events';
export * from './http/metrics';
export * from './logger';
export * from './tracing';
