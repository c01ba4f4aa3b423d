import { describe, it, expect } from 'vitest';
import { needsUpdate, resolveShot } from './ShotResolver';
import { MissingMediaError, NoCandidatesFoundError } from '../core/errors';
import { FakeTimelineClip, InMemoryFileSystem, createMedia, frameFiles } from '../../test/mocks';

function clipFor(path: string, duration = 1): FakeTimelineClip {
  return new FakeTimelineClip('sh010', createMedia(path), { duration });
}

describe('ShotResolver', () => {
  it('SHOT-001: falls back when the newest sequence render is short', () => {
    const fs = new InMemoryFileSystem([
      ...frameFiles('/r/shot010_comp_v0001.', '.exr', 1, 50),
      ...frameFiles('/r/shot010_comp_v0002.', '.exr', 1, 40),
    ]);
    const shot = resolveShot(clipFor('/r/shot010_comp_v0002.[0001-0050].exr', 50), { fileSystem: fs });

    expect(shot.isVersionable).toBe(true);
    expect(shot.isSequence).toBe(true);
    expect(shot.currentVersion).toBe('v0002');
    expect(shot.availableVersions).toEqual(['v0001', 'v0002']);
    expect(shot.highestInvalidVersion).toBe('v0002');
    expect(shot.validVersions).toEqual(['v0001']);
    expect(shot.invalidVersions).toEqual(['v0002']);
    expect(shot.highestVersion).toBe('v0001');
    expect(shot.hasVersionMismatch).toBe(true);
    expect(shot.status).toBe('fallback');
  });

  it('SHOT-002: reports v0002 over v0001 when v0003 is missing frames', () => {
    const fs = new InMemoryFileSystem([
      ...frameFiles('/s/v0001/sh_v0001.', '.exr', 1, 5),
      ...frameFiles('/s/v0002/sh_v0002.', '.exr', 1, 5),
      ...frameFiles('/s/v0003/sh_v0003.', '.exr', 1, 5, { skip: [4] }),
    ]);
    const shot = resolveShot(clipFor('/s/v0001/sh_v0001.[0001-0005].exr', 5), { fileSystem: fs });

    expect(shot.highestVersion).toBe('v0002');
    expect(shot.highestInvalidVersion).toBe('v0003');
    expect(shot.hasVersionMismatch).toBe(true);
    expect(shot.frameChecks.map((c) => c.version)).toEqual(['v0003', 'v0002']);
  });

  it('SHOT-003: short-circuits unversioned paths', () => {
    const fs = new InMemoryFileSystem(['/r/plate.exr']);
    const shot = resolveShot(clipFor('/r/plate.exr'), { fileSystem: fs });

    expect(shot.isVersionable).toBe(false);
    expect(shot.currentVersion).toBe('/r/plate.exr');
    expect(shot.highestVersion).toBe('/r/plate.exr');
    expect(shot.highestInvalidVersion).toBe('/r/plate.exr');
    expect(shot.hasVersionMismatch).toBe(false);
    expect(shot.status).toBe('not-versionable');
    expect(fs.globs).toHaveLength(0);
  });

  it('SHOT-004: picks the highest single-file version', () => {
    const fs = new InMemoryFileSystem(['/r/sh_v0001.mov', '/r/sh_v0002.mov']);
    const shot = resolveShot(clipFor('/r/sh_v0001.mov', 120), { fileSystem: fs });

    expect(shot.availableVersions).toContain(shot.currentVersion);
    expect(shot.validVersions).toEqual(['v0001', 'v0002']);
    expect(shot.highestVersion).toBe('v0002');
    expect(shot.status).toBe('outdated');
    expect(needsUpdate(shot)).toBe(true);
  });

  it('marks a shot already on its highest version as up to date', () => {
    const fs = new InMemoryFileSystem(['/r/sh_v0001.mov', '/r/sh_v0002.mov']);
    const shot = resolveShot(clipFor('/r/sh_v0002.mov'), { fileSystem: fs });

    expect(shot.status).toBe('up-to-date');
    expect(needsUpdate(shot)).toBe(false);
  });

  it('SHOT-005: keeps valid and invalid versions partitioning the available set', () => {
    const fs = new InMemoryFileSystem([
      ...frameFiles('/r/sh_v0001.', '.exr', 1, 5),
      ...frameFiles('/r/sh_v0002.', '.exr', 1, 5),
      ...frameFiles('/r/sh_v0003.', '.exr', 1, 3),
    ]);
    const shot = resolveShot(clipFor('/r/sh_v0001.[0001-0005].exr', 5), { fileSystem: fs });

    for (const v of shot.validVersions) expect(shot.availableVersions).toContain(v);
    expect([...shot.validVersions, ...shot.invalidVersions].sort()).toEqual(shot.availableVersions);
  });

  it('SHOT-006: marks a sequence with no valid render as unvalidated', () => {
    const fs = new InMemoryFileSystem(frameFiles('/r/sh_v0001.', '.exr', 1, 5, { skip: [2] }));
    const shot = resolveShot(clipFor('/r/sh_v0001.[0001-0005].exr', 5), { fileSystem: fs });

    expect(shot.validVersions).toEqual([]);
    expect(shot.status).toBe('unvalidated');
    expect(shot.highestVersion).toBe('v0001');
    expect(shot.hasVersionMismatch).toBe(false);
    expect(needsUpdate(shot)).toBe(false);
  });

  it('throws MissingMediaError for clips without media', () => {
    const clip = new FakeTimelineClip('Title', null);
    expect(() => resolveShot(clip, { fileSystem: new InMemoryFileSystem() })).toThrow(MissingMediaError);
  });

  it('propagates NoCandidatesFoundError when the render is gone', () => {
    expect(() => resolveShot(clipFor('/r/sh_v0001.mov'), { fileSystem: new InMemoryFileSystem() })).toThrow(
      NoCandidatesFoundError,
    );
  });
});
