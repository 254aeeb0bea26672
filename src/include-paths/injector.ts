/**
 * Injection of dependency include directories after the compiler defaults.
 *
 * @packageDocumentation
 */

import path from 'node:path';

import type { Logger } from '../utils/logger.js';
import { normalize } from './normalizer.js';
import type { IncludeDirectory, NormalizeOptions } from './types.js';

/**
 * Options for {@link inject}.
 */
export interface InjectOptions extends NormalizeOptions {
  /** Receives a debug entry per skipped empty segment. */
  logger?: Logger;
}

/**
 * Splits a colon-separated prefix list. Empty segments are kept so callers
 * can report them; {@link inject} skips them.
 */
export function splitPrefixList(raw: string | undefined): string[] {
  if (raw === undefined || raw === '') {
    return [];
  }
  return raw.split(':');
}

/**
 * Appends `<prefix>/include` for every dependency prefix, in listed order.
 *
 * The derived directories go through the same normalization as the
 * compiler defaults. Existence is not checked.
 *
 * @param defaultDirs - Directories reported by the compiler, in precedence order.
 * @param dependencyPrefixesRaw - Colon-separated install prefixes; unset or empty
 *   leaves `defaultDirs` unchanged.
 * @returns A new array: `defaultDirs` followed by the injected directories.
 *
 * @example
 * ```typescript
 * inject([normalize('/usr/include')], '/opt/zlib:/opt/png').map((d) => d.path);
 * // ['/usr/include', '/opt/zlib/include', '/opt/png/include']
 * ```
 */
export function inject(
  defaultDirs: readonly IncludeDirectory[],
  dependencyPrefixesRaw: string | undefined,
  options: InjectOptions = {}
): IncludeDirectory[] {
  const { logger, ...normalizeOptions } = options;
  const result = [...defaultDirs];

  splitPrefixList(dependencyPrefixesRaw).forEach((prefix, position) => {
    if (prefix === '') {
      logger?.debug('empty_prefix_segment_skipped', { position });
      return;
    }
    result.push(normalize(path.posix.join(prefix, 'include'), normalizeOptions));
  });

  return result;
}
