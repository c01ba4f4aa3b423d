/**
 * Collaborator contracts for the host editing application.
 *
 * The resolver only ever talks to these narrow interfaces; a host adapter
 * (or a test double) implements them over the real project API.
 */

import type { GlobPattern } from '../versioning/GlobPattern';

/** A media-library item: a file or an image sequence. */
export interface MediaObject {
  /** Named clip property, e.g. 'File Path' or 'Start'. Undefined when absent. */
  getProperty(name: string): string | undefined;
}

/** A clip placed on a timeline track. */
export interface TimelineClip {
  getName(): string;
  /** Trimmed length on the timeline, in frames */
  getDuration(): number;
  /** Frames trimmed off the head of the source */
  getLeftOffset(): number;
  getMediaObject(): MediaObject | null;
  /** Add an alternate source covering source frames [startFrame, endFrame) */
  addTake(media: MediaObject, startFrame: number, endFrame: number): boolean;
  getTakesCount(): number;
  /** 1-based */
  selectTakeByIndex(index: number): boolean;
  /** Make the selected take the clip's only source */
  finalizeTake(): boolean;
}

export interface Timeline {
  getName(): string;
  getTrackCount(kind: string): number;
  /** 1-based */
  getTrackName(kind: string, index: number): string;
  /** 1-based */
  getItemsInTrack(kind: string, index: number): TimelineClip[];
}

export interface MediaFolder {
  getName(): string;
  getClips(): MediaObject[];
  getSubFolders(): MediaFolder[];
}

export interface MediaLibrary {
  getRootFolder(): MediaFolder;
  getCurrentFolder(): MediaFolder;
  setCurrentFolder(folder: MediaFolder): boolean;
  /** Import a file, directory or sequence path into the current folder */
  importPath(path: string): MediaObject[];
}

/** Pattern-based path expansion. Results must be sorted. */
export interface GlobFileSystem {
  glob(pattern: GlobPattern): string[];
}

/** Where scan progress, results and warnings are shown. */
export interface StatusSurface {
  setStatus(text: string): void;
  showResults(columns: readonly string[], rows: string[][]): void;
  showWarning(title: string, message: string): void;
}
