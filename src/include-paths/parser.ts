/**
 * Extraction of the default include search list from compiler diagnostics.
 *
 * GCC and Clang, run with `-v`, print a block such as:
 *
 * ```text
 * #include "..." search starts here:
 * #include <...> search starts here:
 *  /usr/lib/gcc/x86_64-linux-gnu/12/include
 *  /usr/include
 * End of search list.
 * ```
 *
 * @packageDocumentation
 */

import { DelimiterNotFoundError, type MissingDelimiter } from './types.js';

/** Line that opens the system search list. */
export const SEARCH_LIST_BEGIN = '#include <...> search starts here:';

/** Line that closes the search list. */
export const SEARCH_LIST_END = 'End of search list.';

interface SearchListBounds {
  start: number;
  end: number;
}

interface MissingMarker {
  missing: MissingDelimiter;
}

function locateSearchList(output: string): SearchListBounds | MissingMarker {
  const beginIndex = output.indexOf(SEARCH_LIST_BEGIN);
  if (beginIndex === -1) {
    return { missing: 'begin' };
  }

  const start = beginIndex + SEARCH_LIST_BEGIN.length;
  const end = output.indexOf(SEARCH_LIST_END, start);
  if (end === -1) {
    return { missing: 'end' };
  }

  return { start, end };
}

/**
 * Returns whether `output` contains a complete search-list block.
 */
export function hasSearchList(output: string): boolean {
  return !('missing' in locateSearchList(output));
}

/**
 * Extracts the raw include directories listed between the search-list markers.
 *
 * Lines are trimmed, blank lines dropped, and order preserved.
 *
 * @param output - Captured compiler diagnostic text.
 * @returns Raw path strings in the order the compiler reported them.
 * @throws DelimiterNotFoundError if either marker is absent.
 *
 * @example
 * ```typescript
 * extract('#include <...> search starts here:\n /usr/include\nEnd of search list.\n');
 * // ['/usr/include']
 * ```
 */
export function extract(output: string): string[] {
  const bounds = locateSearchList(output);
  if ('missing' in bounds) {
    const marker = bounds.missing === 'begin' ? SEARCH_LIST_BEGIN : SEARCH_LIST_END;
    throw new DelimiterNotFoundError(bounds.missing, marker, output);
  }

  return output
    .slice(bounds.start, bounds.end)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}
