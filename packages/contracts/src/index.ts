export * from './constants';
export * from './tracks';
export * from './matcher';
export * from './providers';
export * from './checkpoint';
