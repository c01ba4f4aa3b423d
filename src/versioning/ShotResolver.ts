/**
 * Shot resolution: turn a live timeline clip into a version decision.
 */

import { FILE_PATH_PROPERTY } from '../config';
import { MissingMediaError } from '../core/errors';
import type { GlobFileSystem, MediaObject, TimelineClip } from '../host/types';
import { Logger } from '../utils/Logger';
import { discoverVersions } from './CandidateDiscovery';
import { validateVersions, type FrameCheck } from './SequenceValidator';
import { extractVersionToken } from './PathVersionToken';

const log = new Logger('ShotResolver');

/**
 * - not-versionable: no version token in the path
 * - up-to-date: already on the highest valid version
 * - outdated: a newer valid version exists
 * - fallback: the newest render on disk failed validation, a lower one was chosen
 * - unvalidated: no render of this sequence passed validation
 */
export type ShotStatus = 'not-versionable' | 'up-to-date' | 'outdated' | 'fallback' | 'unvalidated';

export interface Shot {
  readonly clip: TimelineClip;
  /** Media the clip was bound to at scan time */
  readonly media: MediaObject;
  readonly name: string;
  readonly path: string;
  readonly duration: number;
  readonly isVersionable: boolean;
  readonly isSequence: boolean;
  /** The version token, or the whole path when not versionable */
  readonly currentVersion: string;
  readonly availableVersions: readonly string[];
  readonly validVersions: readonly string[];
  readonly invalidVersions: readonly string[];
  readonly highestVersion: string;
  /** Highest version on disk, ignoring validation */
  readonly highestInvalidVersion: string;
  readonly status: ShotStatus;
  /** Highest valid and highest on-disk differ; must be surfaced as a warning */
  readonly hasVersionMismatch: boolean;
  readonly frameChecks: readonly FrameCheck[];
}

export interface ResolveContext {
  fileSystem: GlobFileSystem;
}

function notVersionable(clip: TimelineClip, media: MediaObject, name: string, path: string, duration: number): Shot {
  return {
    clip,
    media,
    name,
    path,
    duration,
    isVersionable: false,
    isSequence: false,
    currentVersion: path,
    availableVersions: [],
    validVersions: [],
    invalidVersions: [],
    highestVersion: path,
    highestInvalidVersion: path,
    status: 'not-versionable',
    hasVersionMismatch: false,
    frameChecks: [],
  };
}

function statusFor(current: string, highest: string, highestOnDisk: string, exhausted: boolean): ShotStatus {
  if (exhausted) return 'unvalidated';
  if (highest !== highestOnDisk) return 'fallback';
  return current === highest ? 'up-to-date' : 'outdated';
}

/**
 * Resolve a clip's current, highest and highest-valid versions.
 *
 * Throws MissingMediaError for clips without a media path and lets
 * NoCandidatesFoundError from discovery propagate; the caller decides how to
 * report either for this one clip.
 */
export function resolveShot(clip: TimelineClip, context: ResolveContext): Shot {
  const name = clip.getName();
  const media = clip.getMediaObject();
  const path = media?.getProperty(FILE_PATH_PROPERTY);
  if (!media || !path) {
    throw new MissingMediaError(name);
  }
  const duration = clip.getDuration();
  log.debug(`Resolving ${name}`, { path, duration });

  const currentVersion = extractVersionToken(path);
  if (currentVersion === null) {
    log.debug(`${name} is not versionable`);
    return notVersionable(clip, media, name, path, duration);
  }

  const discovery = discoverVersions(path, currentVersion, context.fileSystem);
  const available = discovery.versions;
  const validation = validateVersions(
    { path, currentVersion, duration, isSequence: discovery.isSequence },
    available,
    context.fileSystem,
  );

  // discoverVersions never returns an empty set
  const highestInvalidVersion = available[available.length - 1] ?? currentVersion;
  const highestValid = validation.validVersions[validation.validVersions.length - 1];
  const exhausted = highestValid === undefined;
  const highestVersion = highestValid ?? highestInvalidVersion;

  if (exhausted) {
    log.warn(`${name}: no valid render available, showing ${highestInvalidVersion} unvalidated`);
  } else if (highestVersion !== highestInvalidVersion) {
    log.warn(`${name}: ${highestInvalidVersion} is incomplete, falling back to ${highestVersion}`);
  }

  return {
    clip,
    media,
    name,
    path,
    duration,
    isVersionable: true,
    isSequence: discovery.isSequence,
    currentVersion,
    availableVersions: available,
    validVersions: validation.validVersions,
    invalidVersions: validation.invalidVersions,
    highestVersion,
    highestInvalidVersion,
    status: statusFor(currentVersion, highestVersion, highestInvalidVersion, exhausted),
    hasVersionMismatch: highestVersion !== highestInvalidVersion,
    frameChecks: validation.checks,
  };
}

/** An update would change the clip's source */
export function needsUpdate(shot: Shot): boolean {
  return shot.isVersionable && shot.currentVersion !== shot.highestVersion;
}
