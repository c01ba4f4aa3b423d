import { describe, it, expect } from 'vitest';
import {
  countSegmentsContaining,
  extractVersionToken,
  findVersionTokens,
  replaceVersion,
  splitPathSegments,
} from './PathVersionToken';

describe('PathVersionToken', () => {
  describe('extractVersionToken', () => {
    it('TOK-001: takes the token from the file name', () => {
      expect(extractVersionToken('/show/sh010/v0003/sh010_comp_v0003.exr')).toBe('v0003');
    });

    it('TOK-002: takes the rightmost token within the file name', () => {
      expect(extractVersionToken('C:\\show\\v002\\sh010_v002_v005.exr')).toBe('v005');
    });

    it('TOK-003: ignores directory tokens when the file name has one', () => {
      expect(extractVersionToken('/show/v0001_old/sh010_v0004.exr')).toBe('v0004');
    });

    it('TOK-004: falls back to the nearest directory with a token', () => {
      expect(extractVersionToken('/show/v0001/comp_v0002/render.exr')).toBe('v0002');
    });

    it('accepts an upper-case V', () => {
      expect(extractVersionToken('/show/sh010_V12.mov')).toBe('V12');
    });

    it('TOK-005: returns null for unversioned paths', () => {
      expect(extractVersionToken('/show/sh010/plate.exr')).toBeNull();
      expect(extractVersionToken('V:\\renders\\plate.exr')).toBeNull();
      expect(extractVersionToken('')).toBeNull();
    });

    it('is deterministic for the same path', () => {
      const path = '/show/v0001/sh010_v0007.[1001-1050].exr';
      expect(extractVersionToken(path)).toBe(extractVersionToken(path));
    });
  });

  describe('findVersionTokens', () => {
    it('lists every token in order', () => {
      expect(findVersionTokens('/a/v1/b_V02.exr')).toEqual(['v1', 'V02']);
    });

    it('returns an empty list when nothing matches', () => {
      expect(findVersionTokens('/a/b.exr')).toEqual([]);
    });
  });

  describe('splitPathSegments', () => {
    it('splits on both separators', () => {
      expect(splitPathSegments('C:\\show/sh010\\a.exr')).toEqual(['C:', 'show', 'sh010', 'a.exr']);
    });
  });

  describe('replaceVersion', () => {
    it('replaces every occurrence', () => {
      expect(replaceVersion('/s/v0002/sh_v0002.exr', 'v0002', 'v0003')).toBe('/s/v0003/sh_v0003.exr');
    });

    it('also replaces coincidental matches earlier in the path', () => {
      expect(replaceVersion('/jobs/v1/sh_v1.mov', 'v1', 'v2')).toBe('/jobs/v2/sh_v2.mov');
    });

    it('leaves the path alone for an empty token', () => {
      expect(replaceVersion('/s/a.exr', '', 'v1')).toBe('/s/a.exr');
    });
  });

  describe('countSegmentsContaining', () => {
    it('counts directory and file segments', () => {
      expect(countSegmentsContaining('/s/v0002/sh_v0002.exr', 'v0002')).toBe(2);
      expect(countSegmentsContaining('/s/sh_v0002.exr', 'v0002')).toBe(1);
      expect(countSegmentsContaining('/s/sh.exr', 'v0002')).toBe(0);
    });
  });
});
