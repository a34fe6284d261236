export * from './types';
export * from './errors';
export * from './schemas';
export * from './logger';
