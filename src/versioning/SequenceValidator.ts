/**
 * Sequence validation: pick the best render whose frames are all there.
 *
 * Candidates are checked newest first and the scan stops at the first one that
 * is contiguous and covers the clip's duration. Re-globbing a sequence is
 * expensive, and an editor only ever needs the single best usable version.
 */

import type { GlobFileSystem } from '../host/types';
import { Logger } from '../utils/Logger';
import { extractFrameRangeToken } from './FrameRangeToken';
import { GlobPattern } from './GlobPattern';
import { replaceVersion } from './PathVersionToken';

const log = new Logger('SequenceValidator');

const FRAME_DIGITS = /^\d+$/;

export interface ValidationInput {
  path: string;
  currentVersion: string;
  /** Required frame count */
  duration: number;
  isSequence: boolean;
}

/** What was found on disk for one candidate */
export interface FrameCheck {
  version: string;
  frameCount: number;
  firstFrame: number | null;
  lastFrame: number | null;
  /** Frame numbers absent between the first and last frame */
  missingFrames: number[];
  hasMissingFrames: boolean;
  isLongEnough: boolean;
  isValid: boolean;
}

export interface ValidationResult {
  validVersions: string[];
  invalidVersions: string[];
  /** One entry per candidate actually scanned, highest first */
  checks: FrameCheck[];
}

/**
 * Frame numbers from glob matches, ascending. Matches whose wildcard text is not
 * all digits (`_denoise`, `0001_tmp`) are not frames of this sequence and are dropped.
 */
export function parseFrameNumbers(matches: string[], pattern: GlobPattern): number[] {
  const frames: number[] = [];
  for (const match of matches) {
    const captured = pattern.matchWildcards(match);
    const text = captured?.[captured.length - 1];
    if (text === undefined || !FRAME_DIGITS.test(text)) {
      log.debug(`Ignoring non-frame match ${match}`);
      continue;
    }
    frames.push(parseInt(text, 10));
  }
  return frames.sort((a, b) => a - b);
}

/**
 * True unless `frames` (ascending) is non-empty and each frame is exactly one
 * more than the previous. Duplicates (`01` and `001`) count as missing.
 */
export function hasMissingFrames(frames: number[]): boolean {
  if (frames.length === 0) return true;
  for (let i = 1; i < frames.length; i++) {
    if (frames[i] !== (frames[i - 1] ?? 0) + 1) return true;
  }
  return false;
}

/**
 * Detect missing frames by finding gaps between the lowest and highest frame number.
 */
export function findMissingFrames(frames: number[]): number[] {
  if (frames.length < 2) return [];

  const present = new Set(frames);
  const min = Math.min(...frames);
  const max = Math.max(...frames);
  const missing: number[] = [];

  for (let f = min; f <= max; f++) {
    if (!present.has(f)) {
      missing.push(f);
    }
  }

  return missing;
}

/**
 * Glob one candidate's frames and judge it against the required duration.
 */
export function checkVersionFrames(input: ValidationInput, version: string, fs: GlobFileSystem): FrameCheck {
  const versionPath = replaceVersion(input.path, input.currentVersion, version);
  const frameRange = extractFrameRangeToken(versionPath);

  let frames: number[] = [];
  if (frameRange !== null) {
    const pattern = GlobPattern.fromPath(versionPath).wildcardLast(frameRange);
    frames = parseFrameNumbers(fs.glob(pattern), pattern);
  }

  const missing = hasMissingFrames(frames);
  const isLongEnough = frames.length >= input.duration;

  return {
    version,
    frameCount: frames.length,
    firstFrame: frames[0] ?? null,
    lastFrame: frames[frames.length - 1] ?? null,
    missingFrames: findMissingFrames(frames),
    hasMissingFrames: missing,
    isLongEnough,
    isValid: !missing && isLongEnough,
  };
}

/**
 * Split `candidates` (ascending) into valid and invalid versions.
 * Single-file shots accept every candidate; a sequence yields at most one valid version.
 */
export function validateVersions(
  input: ValidationInput,
  candidates: string[],
  fs: GlobFileSystem,
): ValidationResult {
  if (!input.isSequence) {
    return { validVersions: [...candidates], invalidVersions: [], checks: [] };
  }

  const checks: FrameCheck[] = [];
  const validVersions: string[] = [];

  for (const version of [...candidates].reverse()) {
    const check = checkVersionFrames(input, version, fs);
    checks.push(check);

    if (check.isValid) {
      validVersions.push(version);
      break;
    }

    log.info(
      `${version} rejected: ${check.frameCount}/${input.duration} frames` +
        (check.hasMissingFrames ? `, missing ${check.missingFrames.length}` : ''),
    );
  }

  const invalidVersions = candidates.filter((v) => !validVersions.includes(v));
  return { validVersions, invalidVersions, checks };
}
