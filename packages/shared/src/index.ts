export * from './errors';
export * from './types';
export * from './utils';
export { assertValidated, codeSchema, optionalTextSchema, optionalRankSchema } from './validation';
