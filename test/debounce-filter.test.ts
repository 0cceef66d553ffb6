// This test suite verifies duplicate-trigger suppression windows and bounded memory of the debounce filter.

import { describe, expect, it } from 'vitest';
import { DebounceFilter } from '../src/quota/debounce-filter.js';

describe('debounce filter', () => {
  it('suppresses an identical trigger on the same message inside the window', () => {
    const filter = new DebounceFilter({ windowMs: 1500 });

    expect(filter.shouldSuppress('c1', 'm1', 'v1:ps:R1:S10', 10_000)).toBe(false);
    expect(filter.shouldSuppress('c1', 'm1', 'v1:ps:R1:S10', 11_499)).toBe(true);
  });

  it('lets the same trigger through once the window has elapsed', () => {
    const filter = new DebounceFilter({ windowMs: 1500 });

    expect(filter.shouldSuppress('c1', 'm1', 'v1:bk', 10_000)).toBe(false);
    expect(filter.shouldSuppress('c1', 'm1', 'v1:bk', 11_500)).toBe(false);
  });

  it('treats different payloads, messages, and conversations as distinct', () => {
    const filter = new DebounceFilter({ windowMs: 1500 });

    expect(filter.shouldSuppress('c1', 'm1', 'v1:lr:0', 0)).toBe(false);
    expect(filter.shouldSuppress('c1', 'm1', 'v1:lr:1', 10)).toBe(false);
    expect(filter.shouldSuppress('c1', 'm2', 'v1:lr:1', 20)).toBe(false);
    expect(filter.shouldSuppress('c2', 'm1', 'v1:lr:1', 30)).toBe(false);
    expect(filter.shouldSuppress('c1', 'm1', 'v1:lr:1', 40)).toBe(true);
  });

  it('sweeps expired entries once the threshold is reached', () => {
    const filter = new DebounceFilter({ windowMs: 100, sweepThreshold: 3 });

    filter.shouldSuppress('c1', 'm1', 'a', 0);
    filter.shouldSuppress('c1', 'm2', 'a', 0);
    filter.shouldSuppress('c1', 'm3', 'a', 50);
    expect(filter.size).toBe(3);

    filter.shouldSuppress('c1', 'm4', 'a', 120);
    expect(filter.size).toBe(2);
    expect(filter.sweep(1000)).toBe(2);
    expect(filter.size).toBe(0);
  });
});
