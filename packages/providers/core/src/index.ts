export * from './config';
export * from './roles';
export * from './match/normalize';
export * from './match/trackMatcher';
export * from './match/statistics';
export * from './match/snapshot';
export * from './http/cache';
export * from './http/client';
