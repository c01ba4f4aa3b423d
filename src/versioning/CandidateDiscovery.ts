/**
 * Candidate discovery: find every version of a shot that exists on disk.
 *
 * The shot path's version token is turned into a wildcard and the result is
 * globbed. For sequences the frame-range token is wildcarded too, or, when the
 * version also names a directory, only the version directories are listed
 * (a per-frame walk of every version would be far slower).
 */

import { NoCandidatesFoundError } from '../core/errors';
import type { GlobFileSystem } from '../host/types';
import { Logger } from '../utils/Logger';
import { extractFrameRangeToken } from './FrameRangeToken';
import { GlobPattern } from './GlobPattern';
import { countSegmentsContaining, extractVersionToken } from './PathVersionToken';

const log = new Logger('CandidateDiscovery');

export interface DiscoveryPattern {
  pattern: GlobPattern;
  isSequence: boolean;
}

export interface DiscoveryResult extends DiscoveryPattern {
  /** De-duplicated tokens in plain string order */
  versions: string[];
}

/**
 * Build the glob used to list a shot's sibling versions.
 */
export function buildDiscoveryPattern(path: string, version: string): DiscoveryPattern {
  let pattern = GlobPattern.fromPath(path).wildcardAll(version);
  const frameRange = extractFrameRangeToken(pattern.toString());
  const isSequence = frameRange !== null;

  if (frameRange !== null) {
    pattern =
      countSegmentsContaining(path, version) > 1
        ? pattern.parentDirectory()
        : pattern.wildcardAll(frameRange);
  }

  return { pattern, isSequence };
}

/**
 * Reduce glob matches to their version tokens, de-duplicated and sorted.
 * Sorting is by string, not number: `v0010` follows `v0009` only while every
 * token has the same digit width.
 */
export function collectVersions(matches: string[]): string[] {
  const versions = new Set<string>();
  for (const match of matches) {
    const token = extractVersionToken(match);
    if (token !== null) versions.add(token);
  }
  return [...versions].sort();
}

/**
 * List the versions available for `path`, whose current token is `version`.
 * Throws NoCandidatesFoundError when nothing on disk matches.
 */
export function discoverVersions(path: string, version: string, fs: GlobFileSystem): DiscoveryResult {
  const { pattern, isSequence } = buildDiscoveryPattern(path, version);
  log.debug(`Discovering ${version} siblings`, { glob: pattern.toString(), isSequence });

  const versions = collectVersions(fs.glob(pattern));
  if (versions.length === 0) {
    throw new NoCandidatesFoundError(path, pattern.toString());
  }

  log.debug(`Found versions: ${versions.join(', ')}`);
  return { pattern, isSequence, versions };
}
