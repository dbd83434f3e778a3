import type { SourceFileState } from './types.js';

/**
 * Reports whether a file can be loaded. Resolves for every outcome;
 * a rejection is recorded as 'unreadable'.
 */
export type SourceFileProbe = (filePath: string) => Promise<SourceFileState>;
