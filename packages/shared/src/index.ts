export const name = '@adapterlab/shared';

export * from './types/events';
export * from './types/collaborators';
export * from './logger';
export * from './errors';
export * from './fs';
export * from './json-utils';
export * from './config/schema';
