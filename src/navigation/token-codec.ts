// This module encodes navigation state into compact, versioned callback tokens and maps malformed input to an invalid variant.

import { createHash } from 'node:crypto';
import type { DecodedToken, ListKind, NavigationToken } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export const TOKEN_VERSION = 'v1';

// Telegram rejects callback data longer than 64 bytes.
export const MAX_TOKEN_BYTES = 64;

const SEPARATOR = ':';
const DIGEST_MARKER = '#';
const DIGEST_LENGTH = 10;
const DIGEST_REGEX = /^#[A-Za-z0-9_-]{10}$/;
const PAGE_REGEX = /^(0|[1-9]\d{0,8})$/;

const TAG_LIST_REGIONS = 'lr';
const TAG_LIST_STATIONS = 'ls';
const TAG_PICK_REGION = 'pr';
const TAG_PICK_STATION = 'ps';
const TAG_BACK = 'bk';
const TAG_ADMIN_REPORT = 'ar';

// Identifiers that do not fit in raw form are referenced by digest and resolved against the live catalog.
export interface TokenIdResolver {
  regionIdForDigest(digest: string): string | null;
  stationIdForDigest(regionId: string, digest: string): string | null;
}

// Only the escape character, the separator and the digest marker are escaped; everything else stays raw UTF-8.
function escapeSegment(value: string): string {
  return value.replace(/[%:#]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

// This helper derives the short, stable reference used when an identifier is too long for a token.
export function idDigest(value: string): string {
  return DIGEST_MARKER + createHash('sha256').update(value, 'utf8').digest('base64url').slice(0, DIGEST_LENGTH);
}

function isDigest(segment: string): boolean {
  return DIGEST_REGEX.test(segment);
}

function unescapeSegment(value: string): string | null {
  if (value.length === 0) {
    return null;
  }

  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

function assertPage(page: number): void {
  if (!Number.isInteger(page) || page < 0 || page > 999_999_999) {
    throw new AppError(400, 'invalid_token', `Page must be a non-negative integer, got ${page}.`);
  }
}

function assertId(label: string, value: string): void {
  if (value.length === 0) {
    throw new AppError(400, 'invalid_token', `${label} must not be empty.`);
  }
}

function buildToken(segments: string[]): string {
  return [TOKEN_VERSION, ...segments].join(SEPARATOR);
}

function fits(token: string): boolean {
  return Buffer.byteLength(token, 'utf8') <= MAX_TOKEN_BYTES;
}

// This helper joins token segments and enforces the transport byte limit.
function joinSegments(segments: string[]): string {
  const token = buildToken(segments);
  const bytes = Buffer.byteLength(token, 'utf8');
  if (bytes > MAX_TOKEN_BYTES) {
    throw new AppError(400, 'token_too_long', 'Navigation token exceeds the callback data limit.', {
      bytes,
      limit: MAX_TOKEN_BYTES
    });
  }

  return token;
}

// This helper keeps identifiers raw when the token fits and switches every identifier to its digest otherwise.
function joinWithIds(tag: string, ids: string[], trailing: string[] = []): string {
  const raw = buildToken([tag, ...ids.map(escapeSegment), ...trailing]);
  if (fits(raw)) {
    return raw;
  }

  return joinSegments([tag, ...ids.map(idDigest), ...trailing]);
}

// This function encodes one list position; stations lists require their parent region.
export function encodeListToken(listKind: ListKind, parentRegion: string | undefined, page: number): string {
  assertPage(page);

  if (listKind === 'regions') {
    return joinSegments([TAG_LIST_REGIONS, String(page)]);
  }

  if (parentRegion === undefined) {
    throw new AppError(400, 'invalid_token', 'Stations list tokens require a parent region.');
  }

  assertId('Parent region', parentRegion);
  return joinWithIds(TAG_LIST_STATIONS, [parentRegion], [String(page)]);
}

// This function encodes any navigation token variant.
export function encodeToken(token: NavigationToken): string {
  switch (token.kind) {
    case 'list':
      return token.listKind === 'regions'
        ? encodeListToken('regions', undefined, token.page)
        : encodeListToken('stations', token.parentRegion, token.page);
    case 'pick_region':
      assertId('Region', token.regionId);
      return joinWithIds(TAG_PICK_REGION, [token.regionId]);
    case 'pick_station':
      assertId('Region', token.regionId);
      assertId('Station', token.stationId);
      return joinWithIds(TAG_PICK_STATION, [token.regionId, token.stationId]);
    case 'back':
      return joinSegments([TAG_BACK]);
    case 'admin_report':
      return joinSegments([TAG_ADMIN_REPORT]);
  }
}

function invalid(reason: string): DecodedToken {
  return { kind: 'invalid', reason };
}

function parsePage(value: string): number | null {
  return PAGE_REGEX.test(value) ? Number(value) : null;
}

function resolveRegion(segment: string, resolver: TokenIdResolver | undefined): string | null {
  if (isDigest(segment)) {
    return resolver ? resolver.regionIdForDigest(segment) : null;
  }

  return unescapeSegment(segment);
}

function resolveStation(regionId: string, segment: string, resolver: TokenIdResolver | undefined): string | null {
  if (isDigest(segment)) {
    return resolver ? resolver.stationIdForDigest(regionId, segment) : null;
  }

  return unescapeSegment(segment);
}

// This function decodes one token; anything malformed or no longer resolvable yields the explicit invalid variant.
export function decodeToken(token: string, resolver?: TokenIdResolver): DecodedToken {
  if (typeof token !== 'string' || token.length === 0) {
    return invalid('empty');
  }

  if (Buffer.byteLength(token, 'utf8') > MAX_TOKEN_BYTES) {
    return invalid('too_long');
  }

  const [version, tag, ...rest] = token.split(SEPARATOR);
  if (version !== TOKEN_VERSION) {
    return invalid('unknown_version');
  }

  switch (tag) {
    case TAG_LIST_REGIONS: {
      if (rest.length !== 1) {
        return invalid('arity');
      }
      const page = parsePage(rest[0]);
      return page === null ? invalid('page') : { kind: 'list', listKind: 'regions', page };
    }
    case TAG_LIST_STATIONS: {
      if (rest.length !== 2) {
        return invalid('arity');
      }
      const parentRegion = resolveRegion(rest[0], resolver);
      const page = parsePage(rest[1]);
      if (parentRegion === null) {
        return invalid('parent_region');
      }
      return page === null ? invalid('page') : { kind: 'list', listKind: 'stations', parentRegion, page };
    }
    case TAG_PICK_REGION: {
      if (rest.length !== 1) {
        return invalid('arity');
      }
      const regionId = resolveRegion(rest[0], resolver);
      return regionId === null ? invalid('region') : { kind: 'pick_region', regionId };
    }
    case TAG_PICK_STATION: {
      if (rest.length !== 2) {
        return invalid('arity');
      }
      const regionId = resolveRegion(rest[0], resolver);
      const stationId = regionId === null ? null : resolveStation(regionId, rest[1], resolver);
      if (regionId === null || stationId === null) {
        return invalid('station');
      }
      return { kind: 'pick_station', regionId, stationId };
    }
    case TAG_BACK:
      return rest.length === 0 ? { kind: 'back' } : invalid('arity');
    case TAG_ADMIN_REPORT:
      return rest.length === 0 ? { kind: 'admin_report' } : invalid('arity');
    default:
      return invalid('unknown_tag');
  }
}
