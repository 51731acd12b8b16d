export { InMemoryJobStore } from './InMemoryJobStore';
export { FileSystemJobStore } from './FileSystemJobStore';
export { matchesFilter, byCreation } from './filter';
