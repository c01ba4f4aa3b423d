/**
 * Update application: import the resolved version and swap it onto the clip.
 *
 * Failures are returned, never thrown, so one bad shot cannot stop a batch.
 * A failed swap may leave the imported item in the media library; it is not
 * removed.
 */

import { START_PROPERTY } from '../config';
import {
  ImportNotFoundError,
  SwapVerificationFailedError,
  ValidationExhaustedError,
  type VersionResolutionError,
} from '../core/errors';
import { findFolderContaining, findImportedItem, mediaPath } from '../host/MediaLibrarySearch';
import type { MediaLibrary, MediaObject } from '../host/types';
import { Logger } from '../utils/Logger';
import { extractFrameRangeToken } from './FrameRangeToken';
import { GlobPattern } from './GlobPattern';
import { replaceVersion } from './PathVersionToken';
import type { Shot } from './ShotResolver';

const log = new Logger('UpdateApplier');

export interface UpdateOptions {
  /** Import next to the clip's original media instead of the currently open folder */
  importToSourceBin: boolean;
}

export interface UpdateContext {
  library: MediaLibrary;
}

export type UpdateResult =
  | { ok: true; changed: false }
  | { ok: true; changed: true; path: string }
  | { ok: false; error: VersionResolutionError };

/** Keep everything up to and including the last separator */
function stripFileName(path: string): string {
  const idx = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  return idx === -1 ? path : path.slice(0, idx + 1);
}

/**
 * Path handed to the importer. Sequences are imported by directory, since the
 * importer does not accept a single frame file as a sequence reference.
 */
export function buildUpdatePath(shot: Shot): string {
  const path = replaceVersion(shot.path, shot.currentVersion, shot.highestVersion);
  return shot.isSequence ? stripFileName(path) : path;
}

/**
 * Full path the swapped clip should point at. For sequences the frame range
 * is a wildcard: the host names an imported sequence after the frames it found.
 */
export function expectedMediaPattern(shot: Shot): GlobPattern {
  const pattern = GlobPattern.fromPath(replaceVersion(shot.path, shot.currentVersion, shot.highestVersion));
  const frameRange = shot.isSequence ? extractFrameRangeToken(shot.path) : null;
  return frameRange ? pattern.wildcardLast(frameRange) : pattern;
}

/**
 * Add `media` as a take covering the clip's current source range, then make it the clip's source.
 */
export function swapTake(shot: Shot, media: MediaObject): void {
  const { clip } = shot;
  const start = Number(shot.media.getProperty(START_PROPERTY) ?? 0);
  if (Number.isNaN(start)) {
    log.warn(`${shot.name}: unreadable ${START_PROPERTY} property, assuming 0`);
  }
  const newIn = (Number.isNaN(start) ? 0 : start) + clip.getLeftOffset();

  if (!clip.addTake(media, newIn, newIn + shot.duration)) {
    log.warn(`${shot.name}: host refused the new take`);
  }
  clip.selectTakeByIndex(clip.getTakesCount());
  clip.finalizeTake();
}

function moveToSourceFolder(shot: Shot, library: MediaLibrary): void {
  const folder = findFolderContaining(library.getRootFolder(), shot.media);
  if (!folder) {
    log.warn(`${shot.name}: original bin not found, importing into the current bin`);
    return;
  }
  library.setCurrentFolder(folder);
}

export function applyUpdate(shot: Shot, options: UpdateOptions, context: UpdateContext): UpdateResult {
  if (shot.currentVersion === shot.highestVersion) {
    return { ok: true, changed: false };
  }
  if (shot.status === 'unvalidated') {
    return { ok: false, error: new ValidationExhaustedError(shot.path) };
  }

  const { library } = context;
  const newPath = buildUpdatePath(shot);

  if (options.importToSourceBin) {
    moveToSourceFolder(shot, library);
  }

  log.debug(`Importing ${newPath} into ${library.getCurrentFolder().getName()}`);
  const imported = library.importPath(newPath);

  const expected = expectedMediaPattern(shot);
  const matches = (path: string): boolean => expected.matchWildcards(path) !== null;
  const item =
    imported.filter((media) => matches(mediaPath(media) ?? '')).pop() ??
    findImportedItem(library.getRootFolder(), matches, shot.media);
  if (!item) {
    log.error(`Could not find ${newPath} in project!`);
    return { ok: false, error: new ImportNotFoundError(shot.path, newPath) };
  }

  swapTake(shot, item);

  const bound = shot.clip.getMediaObject();
  const boundPath = bound ? mediaPath(bound) : null;
  if (boundPath === null || !matches(boundPath)) {
    log.error(`Failed to update ${shot.name} to ${newPath}`);
    return { ok: false, error: new SwapVerificationFailedError(shot.path, expected.toString(), boundPath) };
  }

  log.info(`Successfully updated ${shot.name} to ${newPath}`);
  return { ok: true, changed: true, path: newPath };
}
