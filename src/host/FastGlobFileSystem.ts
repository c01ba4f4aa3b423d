import fg from 'fast-glob';
import type { GlobPattern } from '../versioning/GlobPattern';
import type { GlobFileSystem } from './types';
import { Logger } from '../utils/Logger';

const log = new Logger('FastGlobFileSystem');

/**
 * GlobFileSystem backed by fast-glob's synchronous walker.
 *
 * Literal runs go through `convertPathToPattern`, which escapes glob syntax
 * (brackets in frame-range tokens, parentheses in folder names) and turns
 * Windows separators into forward slashes.
 */
export class FastGlobFileSystem implements GlobFileSystem {
  glob(pattern: GlobPattern): string[] {
    if (pattern.isEmpty) return [];

    const source = pattern.toGlob((literal) => fg.convertPathToPattern(literal));
    const matches = fg.sync(source, {
      onlyFiles: !pattern.directoriesOnly,
      onlyDirectories: pattern.directoriesOnly,
      unique: true,
      suppressErrors: true,
    });
    log.debug(`glob ${source} -> ${matches.length} match(es)`);
    return matches.sort();
  }
}
