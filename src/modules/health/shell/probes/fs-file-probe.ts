/**
 * Filesystem probe for the donation source files
 */

import fs from 'node:fs/promises';

import type { SourceFileProbe } from '../../core/ports.js';
import type { SourceFileState } from '../../core/types.js';

export const makeFsFileProbe = (): SourceFileProbe => {
  return async (filePath: string): Promise<SourceFileState> => {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return 'unreadable';
      }
      await fs.access(filePath, fs.constants.R_OK);
      return stats.size === 0 ? 'empty' : 'readable';
    } catch (error) {
      return (error as NodeJS.ErrnoException).code === 'ENOENT' ? 'missing' : 'unreadable';
    }
  };
};
