import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import type { PairMaterializer, PathPair, TransferMode } from './types.js';
import { PRIVATE_DIR_MODE } from '../../constants/index.js';
import { ensureDir } from '../../utils/fs.js';
import { FileSystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

/**
 * Materializes pairs by staging the new destination in a fresh directory under
 * the scratch directory and renaming it into place, so readers of the
 * destination see either the old file or the new one.
 */
export class AtomicPairMaterializer implements PairMaterializer {
  constructor(private readonly scratchDir: string) {}

  async isSameFile(pair: PathPair): Promise<boolean> {
    try {
      const source = await fs.stat(pair.source);
      const destination = await fs.stat(pair.destination);
      return source.dev === destination.dev && source.ino === destination.ino;
    } catch (error) {
      if (isMissingPathError(error)) {
        return false;
      }
      throw new FileSystemError(`Failed to compare ${pair.source} and ${pair.destination}`, { pair, error });
    }
  }

  async prepareParent(destination: string): Promise<void> {
    await ensureDir(dirname(destination), PRIVATE_DIR_MODE);
  }

  async replace(pair: PathPair, mode: TransferMode): Promise<void> {
    await ensureDir(this.scratchDir);

    let stagingDir: string;
    try {
      stagingDir = await fs.mkdtemp(join(this.scratchDir, 'stage-'));
    } catch (error) {
      throw new FileSystemError(`Failed to create staging directory in ${this.scratchDir}`, { error });
    }

    try {
      const staged = join(stagingDir, mode === 'symlink' ? 'symlink' : 'cp');
      if (mode === 'symlink') {
        await fs.symlink(pair.source, staged);
      } else {
        await fs.copyFile(pair.source, staged);
      }
      await fs.rename(staged, pair.destination);
      logger.debug(`Replaced ${pair.destination} (${mode})`, { source: pair.source });
    } catch (error) {
      const verb = mode === 'symlink' ? 'symlink' : 'copy';
      throw new FileSystemError(`Failed to ${verb} ${pair.source} -> ${pair.destination}`, { pair, error });
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }
}
