/**
 * Version token extraction.
 *
 * Paths are split into segments and searched from the file name outwards:
 * the rightmost token of the first segment that has one wins. A token in an
 * intermediate directory only counts when the file name carries none.
 *
 *   /show/sh010/v0003/sh010_comp_v0003.exr  -> v0003
 *   /show/sh010/comp_v0002/render.exr        -> v0002
 *   /show/sh010/plate.exr                    -> null
 */

import { PATH_SEPARATOR_PATTERN, VERSION_TOKEN_PATTERN } from '../config';

export function splitPathSegments(path: string): string[] {
  return path.split(PATH_SEPARATOR_PATTERN);
}

/**
 * Every version-like substring of `text`, in order of appearance.
 */
export function findVersionTokens(text: string): string[] {
  return text.match(VERSION_TOKEN_PATTERN) ?? [];
}

/**
 * The effective version token of a path, or null when the path is not versionable.
 */
export function extractVersionToken(path: string): string | null {
  const segments = splitPathSegments(path);
  for (let i = segments.length - 1; i >= 0; i--) {
    const tokens = findVersionTokens(segments[i] ?? '');
    const last = tokens[tokens.length - 1];
    if (last !== undefined) return last;
  }
  return null;
}

/**
 * Textual substitution of every occurrence of `from`.
 * Not segment-aware: a coincidental earlier occurrence of the token text is replaced too.
 */
export function replaceVersion(path: string, from: string, to: string): string {
  if (from === '') return path;
  return path.split(from).join(to);
}

/** Number of path segments in which `token` appears */
export function countSegmentsContaining(path: string, token: string): number {
  if (token === '') return 0;
  return splitPathSegments(path).filter((segment) => segment.includes(token)).length;
}
