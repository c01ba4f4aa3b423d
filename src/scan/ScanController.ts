/**
 * ScanController - batch scan and update of the clips on a timeline.
 *
 * Owns the shot list for one scan -> display -> update cycle and the busy
 * flag that stops a scan or update from starting while another is running
 * (a status listener calling back into `scan()` gets null).
 *
 * Everything runs synchronously on the caller's thread; progress is reported
 * through `status` events between clips.
 */

import {
  DEFAULT_SCAN_CONFIG,
  EXHAUSTED_WARNING,
  IMPORT_LOCATIONS,
  MISMATCH_WARNING,
  SCANNING_STATUS,
  WARNING_TITLE,
  type ImportLocation,
  type ScanConfig,
} from '../config';
import { MissingMediaError, VersionResolutionError } from '../core/errors';
import type { ManagerBase } from '../core/ManagerBase';
import type { GlobFileSystem, MediaLibrary, Timeline, TimelineClip } from '../host/types';
import { EventEmitter, type EventMap } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import { resolveShot, type Shot } from '../versioning/ShotResolver';
import { applyUpdate, type UpdateResult } from '../versioning/UpdateApplier';
import { failureRow, markFailed, markUpdated, shotRow, type ResultsRow } from './ResultsTable';

const log = new Logger('ScanController');

export interface ScanContext {
  timeline: Timeline;
  library: MediaLibrary;
  fileSystem: GlobFileSystem;
  config?: Partial<ScanConfig>;
}

export interface ScanFailure {
  clipName: string;
  error: VersionResolutionError;
}

export interface ScanReport {
  target: string;
  shots: Shot[];
  failures: ScanFailure[];
  /** Shots whose newest render was rejected in favour of a lower version */
  mismatches: Shot[];
  /** Sequence shots with no valid render at all */
  exhausted: Shot[];
  rows: ResultsRow[];
}

export interface ShotUpdateOutcome {
  shot: Shot;
  result: UpdateResult;
}

export interface UpdateReport {
  outcomes: ShotUpdateOutcome[];
  updated: number;
  failed: number;
  rows: ResultsRow[];
}

export interface ScanWarning {
  title: string;
  message: string;
  shots: Shot[];
}

export interface ScanControllerEvents extends EventMap {
  status: string;
  scanStarted: { target: string; clipCount: number };
  scanCompleted: ScanReport;
  updateCompleted: UpdateReport;
  warning: ScanWarning;
}

interface ResultEntry {
  row: ResultsRow;
  /** Null for clips that failed to resolve */
  shot: Shot | null;
}

function toResolutionError(err: unknown, clipName: string): VersionResolutionError {
  if (err instanceof VersionResolutionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new VersionResolutionError(`Unexpected failure on "${clipName}": ${message}`, 'UNEXPECTED', '');
}

export class ScanController extends EventEmitter<ScanControllerEvents> implements ManagerBase {
  private readonly config: ScanConfig;
  private _busy = false;
  private _shots: Shot[] = [];
  private _entries: ResultEntry[] = [];

  constructor(private readonly context: ScanContext) {
    super();
    this.config = { ...DEFAULT_SCAN_CONFIG, ...context.config };
  }

  get isBusy(): boolean {
    return this._busy;
  }

  get shots(): readonly Shot[] {
    return this._shots;
  }

  get rows(): ResultsRow[] {
    return this._entries.map((e) => e.row);
  }

  /**
   * Track choices for the host's track picker: the "All Tracks" entry first,
   * then the tracks from the top of the stack down.
   */
  getTrackOptions(): string[] {
    const { timeline } = this.context;
    const { trackKind, allTracksLabel } = this.config;
    const names: string[] = [];
    for (let i = 1; i <= timeline.getTrackCount(trackKind); i++) {
      names.push(timeline.getTrackName(trackKind, i));
    }
    names.push(allTracksLabel);
    return names.reverse();
  }

  /**
   * Clips on the named track, or on every track for the "All Tracks" entry.
   * An unknown track name yields no clips.
   */
  collectClips(target: string): TimelineClip[] {
    const { timeline } = this.context;
    const { trackKind, allTracksLabel } = this.config;
    const clips: TimelineClip[] = [];

    for (let i = 1; i <= timeline.getTrackCount(trackKind); i++) {
      const name = timeline.getTrackName(trackKind, i);
      if (target !== allTracksLabel && name !== target) continue;

      const found = timeline.getItemsInTrack(trackKind, i);
      log.info(`Scanning track ${i} (${name}): ${found.length} clip(s)`);
      clips.push(...found);
      if (target !== allTracksLabel) break;
    }

    return clips;
  }

  /**
   * Resolve every clip on `target`. Returns null if a scan or update is already running.
   */
  scan(target: string): ScanReport | null {
    if (this._busy) return null;
    this._busy = true;

    try {
      log.info(`Scanning versions on ${this.context.timeline.getName()} / ${target}`);
      this.emit('status', SCANNING_STATUS);

      const clips = this.collectClips(target);
      this.emit('scanStarted', { target, clipCount: clips.length });

      const shots: Shot[] = [];
      const failures: ScanFailure[] = [];
      const entries: ResultEntry[] = [];

      for (const clip of clips) {
        const clipName = clip.getName();
        this.emit('status', `Scanning ${clipName}`);
        try {
          const shot = resolveShot(clip, { fileSystem: this.context.fileSystem });
          shots.push(shot);
          entries.push({ row: shotRow(shot), shot });
        } catch (err) {
          if (err instanceof MissingMediaError) {
            log.debug(`Skipping ${clipName}: ${err.message}`);
            continue;
          }
          const error = toResolutionError(err, clipName);
          log.error(`Could not resolve ${clipName}`, error);
          failures.push({ clipName, error });
          entries.push({ row: failureRow(clipName, error.code), shot: null });
        }
      }

      this._shots = shots;
      this._entries = entries;

      const report: ScanReport = {
        target,
        shots,
        failures,
        mismatches: shots.filter((s) => s.hasVersionMismatch),
        exhausted: shots.filter((s) => s.status === 'unvalidated'),
        rows: this.rows,
      };

      this.emit('scanCompleted', report);
      this.emitWarning(report);
      log.info(`Done! ${shots.length} shot(s), ${failures.length} failure(s)`);
      return report;
    } finally {
      this.emit('status', '');
      this._busy = false;
    }
  }

  /**
   * Swap every scanned shot to its highest valid version.
   * Returns null while busy or when nothing has been scanned.
   */
  update(location: ImportLocation): UpdateReport | null {
    if (this._busy || this._shots.length === 0) return null;
    this._busy = true;

    try {
      const options = { importToSourceBin: location === IMPORT_LOCATIONS.SOURCE_BIN };
      const outcomes: ShotUpdateOutcome[] = [];

      this._entries = this._entries.map(({ row, shot }) => {
        if (!shot) return { row, shot };

        let result: UpdateResult;
        try {
          result = applyUpdate(shot, options, { library: this.context.library });
        } catch (err) {
          result = { ok: false, error: toResolutionError(err, shot.name) };
        }
        outcomes.push({ shot, result });
        if (!result.ok) {
          log.warn(`${shot.name} not updated: ${result.error.message}`);
          return { row: markFailed(row, this.config.failedRowPrefix), shot };
        }
        return { row: markUpdated(row, shot), shot };
      });

      const failed = outcomes.filter((o) => !o.result.ok).length;
      const report: UpdateReport = {
        outcomes,
        updated: outcomes.filter((o) => o.result.ok && o.result.changed).length,
        failed,
        rows: this.rows,
      };
      this.emit('updateCompleted', report);
      return report;
    } finally {
      this._busy = false;
    }
  }

  private emitWarning(report: ScanReport): void {
    const messages: string[] = [];
    if (report.mismatches.length > 0) messages.push(MISMATCH_WARNING);
    if (report.exhausted.length > 0) messages.push(EXHAUSTED_WARNING);
    if (messages.length === 0) return;

    this.emit('warning', {
      title: WARNING_TITLE,
      message: messages.join('\n\n'),
      shots: [...report.mismatches, ...report.exhausted],
    });
  }

  dispose(): void {
    this.removeAllListeners();
    this._shots = [];
    this._entries = [];
  }
}
