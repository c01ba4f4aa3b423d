/**
 * Frame-range token extraction.
 *
 * Hosts display an image sequence as a single path with the frame span in
 * brackets, e.g. `sh010_comp_v0003.[1001-1050].exr`. Only the last bracketed
 * span is meaningful; earlier ones belong to directory names.
 */

import { FRAME_RANGE_PATTERN } from '../config';

export function findFrameRangeTokens(path: string): string[] {
  return path.match(FRAME_RANGE_PATTERN) ?? [];
}

export function extractFrameRangeToken(path: string): string | null {
  const tokens = findFrameRangeTokens(path);
  return tokens[tokens.length - 1] ?? null;
}

export function isSequencePath(path: string): boolean {
  return extractFrameRangeToken(path) !== null;
}
