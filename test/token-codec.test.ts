// This test suite verifies navigation token encoding, digest fallback under the callback byte limit, and decoding of malformed tokens.

import { describe, expect, it } from 'vitest';
import {
  decodeToken,
  encodeListToken,
  encodeToken,
  idDigest,
  MAX_TOKEN_BYTES,
  type TokenIdResolver
} from '../src/navigation/token-codec.js';
import type { NavigationToken } from '../src/types/domain.js';
import { AppError } from '../src/utils/errors.js';

describe('navigation token codec', () => {
  it('encodes list positions in the versioned compact form', () => {
    expect(encodeListToken('regions', undefined, 0)).toBe('v1:lr:0');
    expect(encodeListToken('stations', 'R1', 3)).toBe('v1:ls:R1:3');
    expect(encodeToken({ kind: 'pick_station', regionId: 'R1', stationId: 'S10' })).toBe('v1:ps:R1:S10');
    expect(encodeToken({ kind: 'back' })).toBe('v1:bk');
    expect(encodeToken({ kind: 'admin_report' })).toBe('v1:ar');
  });

  it('decodes every variant back to the token it was built from', () => {
    const tokens: NavigationToken[] = [
      { kind: 'list', listKind: 'regions', page: 12 },
      { kind: 'list', listKind: 'stations', parentRegion: 'North:East', page: 0 },
      { kind: 'pick_region', regionId: 'استان' },
      { kind: 'pick_station', regionId: 'R 1', stationId: 'S/10%' },
      { kind: 'back' },
      { kind: 'admin_report' }
    ];

    for (const token of tokens) {
      expect(decodeToken(encodeToken(token))).toEqual(token);
    }
  });

  it('escapes separators inside identifiers', () => {
    expect(encodeToken({ kind: 'pick_region', regionId: 'a:b' })).toBe('v1:pr:a%3Ab');
  });

  it('rejects stations lists without a parent region and negative or fractional pages', () => {
    expect(() => encodeListToken('stations', undefined, 0)).toThrow(AppError);
    expect(() => encodeListToken('stations', '', 0)).toThrow(AppError);
    expect(() => encodeListToken('regions', undefined, -1)).toThrow(AppError);
    expect(() => encodeListToken('regions', undefined, 1.5)).toThrow(AppError);
  });

  it('keeps non-ASCII identifiers as raw UTF-8', () => {
    expect(encodeToken({ kind: 'pick_region', regionId: 'تهران' })).toBe('v1:pr:تهران');
    expect(encodeToken({ kind: 'pick_region', regionId: 'خراسان رضوی' })).toBe('v1:pr:خراسان رضوی');
    expect(encodeListToken('stations', 'خراسان رضوی', 2)).toBe('v1:ls:خراسان رضوی:2');
    expect(encodeToken({ kind: 'pick_region', regionId: '#1' })).toBe('v1:pr:%231');
  });

  it('still decodes tokens whose identifiers were fully percent-encoded', () => {
    expect(decodeToken('v1:pr:%D8%AA%D9%87%D8%B1%D8%A7%D9%86')).toEqual({ kind: 'pick_region', regionId: 'تهران' });
  });

  it('switches oversized identifiers to digests and resolves them back', () => {
    const longRegion = 'x'.repeat(MAX_TOKEN_BYTES);
    const longStation = 'ایستگاه'.repeat(6);
    const resolver: TokenIdResolver = {
      regionIdForDigest: (digest) => (digest === idDigest(longRegion) ? longRegion : null),
      stationIdForDigest: (regionId, digest) =>
        regionId === longRegion && digest === idDigest(longStation) ? longStation : null
    };

    const pick = encodeToken({ kind: 'pick_region', regionId: longRegion });
    const station = encodeToken({ kind: 'pick_station', regionId: longRegion, stationId: longStation });
    const list = encodeListToken('stations', longRegion, 3);

    expect(pick).toBe(`v1:pr:${idDigest(longRegion)}`);
    expect(station).toBe(`v1:ps:${idDigest(longRegion)}:${idDigest(longStation)}`);
    expect(list).toBe(`v1:ls:${idDigest(longRegion)}:3`);
    for (const token of [pick, station, list]) {
      expect(Buffer.byteLength(token, 'utf8')).toBeLessThanOrEqual(MAX_TOKEN_BYTES);
    }

    expect(decodeToken(pick, resolver)).toEqual({ kind: 'pick_region', regionId: longRegion });
    expect(decodeToken(station, resolver)).toEqual({ kind: 'pick_station', regionId: longRegion, stationId: longStation });
    expect(decodeToken(list, resolver)).toEqual({ kind: 'list', listKind: 'stations', parentRegion: longRegion, page: 3 });
  });

  it('treats digests that no longer resolve as invalid', () => {
    const pick = encodeToken({ kind: 'pick_region', regionId: 'x'.repeat(MAX_TOKEN_BYTES) });

    expect(decodeToken(pick)).toEqual({ kind: 'invalid', reason: 'region' });
    expect(
      decodeToken(pick, { regionIdForDigest: () => null, stationIdForDigest: () => null })
    ).toEqual({ kind: 'invalid', reason: 'region' });
  });

  it('returns the invalid variant with a reason for malformed input', () => {
    expect(decodeToken('')).toEqual({ kind: 'invalid', reason: 'empty' });
    expect(decodeToken('x'.repeat(65))).toEqual({ kind: 'invalid', reason: 'too_long' });
    expect(decodeToken('v0:lr:0')).toEqual({ kind: 'invalid', reason: 'unknown_version' });
    expect(decodeToken('page_2')).toEqual({ kind: 'invalid', reason: 'unknown_version' });
    expect(decodeToken('v1:lr')).toEqual({ kind: 'invalid', reason: 'arity' });
    expect(decodeToken('v1:lr:01')).toEqual({ kind: 'invalid', reason: 'page' });
    expect(decodeToken('v1:lr:-1')).toEqual({ kind: 'invalid', reason: 'page' });
    expect(decodeToken('v1:ls::2')).toEqual({ kind: 'invalid', reason: 'parent_region' });
    expect(decodeToken('v1:pr:%E0%A4%A')).toEqual({ kind: 'invalid', reason: 'region' });
    expect(decodeToken('v1:ps:R1:')).toEqual({ kind: 'invalid', reason: 'station' });
    expect(decodeToken('v1:bk:extra')).toEqual({ kind: 'invalid', reason: 'arity' });
    expect(decodeToken('v1:zz')).toEqual({ kind: 'invalid', reason: 'unknown_tag' });
  });
});
