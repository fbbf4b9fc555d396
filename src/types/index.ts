// Publish types
export * from './publish.types';

// Git types
export * from './git.types';

// Config types
export * from './config.types';
