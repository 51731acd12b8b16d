export * from './directory';
export * from './schema';
export * from './groupsetJobs';
