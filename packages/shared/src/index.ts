export * from './constants/entity-suffixes';
export * from './constants/casing';
export * from './schemas/common';
export * from './schemas/job';
export type * from './types/index';
