export * from './types';
export * from './constants';
export * from './errors';
export * from './schemas';
export * from './utils';
