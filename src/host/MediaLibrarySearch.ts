/**
 * Depth-first lookups over the media library folder tree.
 *
 * Both searches use an explicit stack and visit folders in the order the host
 * lists them: a folder's own clips first, then its sub-folders top to bottom.
 */

import { FILE_PATH_PROPERTY } from '../config';
import type { MediaFolder, MediaObject } from './types';

export function mediaPath(media: MediaObject): string | null {
  return media.getProperty(FILE_PATH_PROPERTY) ?? null;
}

function isSameMedia(a: MediaObject, b: MediaObject): boolean {
  if (a === b) return true;
  const pathA = mediaPath(a);
  return pathA !== null && pathA === mediaPath(b);
}

function* walkFolders(root: MediaFolder): Generator<MediaFolder> {
  const stack: MediaFolder[] = [root];
  let folder = stack.pop();
  while (folder) {
    yield folder;
    const children = folder.getSubFolders();
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push(child);
    }
    folder = stack.pop();
  }
}

/**
 * First media item whose file path contains `pathFragment`.
 */
export function findItemByPath(root: MediaFolder, pathFragment: string): MediaObject | null {
  for (const folder of walkFolders(root)) {
    const match = folder.getClips().find((clip) => mediaPath(clip)?.includes(pathFragment) ?? false);
    if (match) return match;
  }
  return null;
}

/**
 * Last media item whose file path satisfies `matches`, skipping `original`.
 * A fresh import is appended to its folder, so the newest match wins.
 */
export function findImportedItem(
  root: MediaFolder,
  matches: (path: string) => boolean,
  original: MediaObject,
): MediaObject | null {
  let found: MediaObject | null = null;
  for (const folder of walkFolders(root)) {
    for (const clip of folder.getClips()) {
      if (isSameMedia(clip, original)) continue;
      const path = mediaPath(clip);
      if (path !== null && matches(path)) found = clip;
    }
  }
  return found;
}

/**
 * First folder holding `media` (same object, or same file path).
 */
export function findFolderContaining(root: MediaFolder, media: MediaObject): MediaFolder | null {
  for (const folder of walkFolders(root)) {
    if (folder.getClips().some((clip) => isSameMedia(clip, media))) return folder;
  }
  return null;
}
