import { describe, expect, it, vi, afterEach } from 'vitest';
import fc from 'fast-check';

import { Logger } from '../utils/logger.js';
import { inject, splitPrefixList } from './injector.js';
import { normalize } from './normalizer.js';
import type { IncludeDirectory } from './types.js';

function paths(dirs: readonly IncludeDirectory[]): string[] {
  return dirs.map((dir) => dir.path);
}

const usrInclude = [normalize('/usr/include')];

describe('splitPrefixList', () => {
  it('should return no prefixes for unset or empty input', () => {
    expect(splitPrefixList(undefined)).toEqual([]);
    expect(splitPrefixList('')).toEqual([]);
  });

  it('should keep empty segments', () => {
    expect(splitPrefixList('/a::/b:')).toEqual(['/a', '', '/b', '']);
  });
});

describe('inject', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should append <prefix>/include in listed order', () => {
    expect(paths(inject(usrInclude, '/a:/b'))).toEqual(['/usr/include', '/a/include', '/b/include']);
  });

  it('should return the defaults unchanged for empty or unset input', () => {
    const dirs = [normalize('/usr/local/include'), normalize('/usr/include')];

    expect(inject(dirs, '')).toEqual(dirs);
    expect(inject(dirs, undefined)).toEqual(dirs);
  });

  it('should not mutate the input array', () => {
    const dirs = [normalize('/usr/include')];
    const result = inject(dirs, '/opt/zlib');

    expect(dirs).toHaveLength(1);
    expect(result).not.toBe(dirs);
  });

  it('should skip empty segments', () => {
    expect(inject(usrInclude, '/a::/b')).toEqual(inject(usrInclude, '/a:/b'));
    expect(paths(inject(usrInclude, ':/a:'))).toEqual(['/usr/include', '/a/include']);
    expect(inject(usrInclude, ':::')).toEqual(usrInclude);
  });

  it('should log skipped segments at debug level', () => {
    const writes: string[] = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
      writes.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    });
    const logger = new Logger({ component: 'Injector', debugMode: true });

    inject(usrInclude, '/a::/b', { logger });

    expect(writes).toHaveLength(1);
    const entry: unknown = JSON.parse(writes[0] ?? '');
    expect(entry).toMatchObject({
      level: 'debug',
      event: 'empty_prefix_segment_skipped',
      data: { position: 1 },
    });
  });

  it('should normalize and escape injected directories like the defaults', () => {
    const result = inject([], '/work/root/external/dep/:/opt/q"uote', { executionRoot: '/work/root' });

    expect(result).toEqual([
      { path: 'external/dep/include', literal: 'external/dep/include' },
      { path: '/opt/q"uote/include', literal: '/opt/q\\"uote/include' },
    ]);
  });

  it('should equal the result without empty segments (property-based)', () => {
    const prefix = fc.stringMatching(/^\/[a-z0-9_]{1,8}(\/[a-z0-9_]{1,8}){0,2}$/);

    fc.assert(
      fc.property(fc.array(fc.oneof(prefix, fc.constant(''))), (segments) => {
        const withEmpty = inject(usrInclude, segments.join(':'));
        const withoutEmpty = inject(usrInclude, segments.filter((s) => s !== '').join(':'));

        expect(withEmpty).toEqual(withoutEmpty);
        expect(paths(withoutEmpty)).toEqual([
          '/usr/include',
          ...segments.filter((s) => s !== '').map((s) => `${s}/include`),
        ]);
      })
    );
  });
});
