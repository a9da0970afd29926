export * from './importers/common';
export * from './importers/csv';
export * from './catalog/fileSource';
export * from './jobs/progress';
