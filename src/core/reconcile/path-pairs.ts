import { join } from 'path';
import type { Location } from '../categories/definitions.js';
import type { LocationResolver } from '../locations/location-resolver.js';
import type { PairDirection, PathPair } from './types.js';
import { isDirectory, walkFiles } from '../../utils/fs.js';

/**
 * Expand one location into concrete (source, destination) pairs.
 *
 * A location whose walked side is a directory yields one pair per file below it,
 * with the same relative subpath on both sides. Anything else, including a path
 * that does not exist yet, is a single pair. No pairs when the location has no
 * path for the current OS.
 */
export async function expandLocation(
  resolver: LocationResolver,
  location: Location,
  direction: PairDirection
): Promise<PathPair[]> {
  const systemSide = resolver.resolveSystemSide(location);
  if (systemSide === undefined) {
    return [];
  }
  const repositorySide = resolver.resolveRepositorySide(location);

  const [source, destination] =
    direction === 'to-repository' ? [systemSide, repositorySide] : [repositorySide, systemSide];

  if (direction === 'compare') {
    return expandComparison(source, destination);
  }

  if (!(await isDirectory(source))) {
    return [{ source, destination }];
  }

  const files = await walkFiles(source);
  return files.map((file) => ({ source: join(source, file), destination: join(destination, file) }));
}

async function expandComparison(source: string, destination: string): Promise<PathPair[]> {
  const [sourceIsDir, destinationIsDir] = [await isDirectory(source), await isDirectory(destination)];
  if (!sourceIsDir && !destinationIsDir) {
    return [{ source, destination }];
  }

  const files = new Set<string>([
    ...(sourceIsDir ? await walkFiles(source) : []),
    ...(destinationIsDir ? await walkFiles(destination) : [])
  ]);
  return [...files]
    .sort()
    .map((file) => ({ source: join(source, file), destination: join(destination, file) }));
}
