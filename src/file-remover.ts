import { unlink } from 'fs/promises';
import { errorMessage } from './logger.js';
import { FileRemover, RemoveResult } from './types.js';

/**
 * Removes files from disk with unlink
 */
export class FsFileRemover implements FileRemover {
  async remove(path: string): Promise<RemoveResult> {
    try {
      await unlink(path);
      return { ok: true };
    } catch (error) {
      return { ok: false, cause: errorMessage(error) };
    }
  }
}
