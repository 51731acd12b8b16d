export * from './schemas';
export * from './validator';
