export * from './types.ts';
export { runGitCommand } from './core.ts';
export * from './repository.ts';
export * from './remote.ts';
export * from './stash.ts';
export { createGitBackend } from './backend.ts';
