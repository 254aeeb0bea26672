/**
 * Canonicalization and escaping of include directories.
 *
 * @packageDocumentation
 */

import path from 'node:path';

import { LiteralSyntaxError, type IncludeDirectory, type NormalizeOptions } from './types.js';

/**
 * Annotation Apple toolchains append to framework search-list entries,
 * e.g. `/System/Library/Frameworks (framework directory)`.
 */
const FRAMEWORK_ANNOTATION = /(?:\s*\(framework directory\))+$/;

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '%': '%%',
};

const UNESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Escapes a path for the body of a double-quoted literal in generated
 * toolchain configuration.
 *
 * Backslash, double quote, newline, carriage return and tab take backslash
 * escapes; `%` is doubled because the configuration templates expand
 * `%{name}` placeholders.
 */
export function escapeLiteral(value: string): string {
  return value.replace(/[\\"\n\r\t%]/g, (char) => ESCAPES[char] ?? char);
}

/**
 * Inverse of {@link escapeLiteral}.
 *
 * @throws LiteralSyntaxError on an unterminated or unknown escape, a lone `%`,
 * or an unescaped double quote.
 */
export function unescapeLiteral(literal: string): string {
  let result = '';
  let index = 0;

  while (index < literal.length) {
    const char = literal.charAt(index);

    if (char === '\\') {
      const next = literal.charAt(index + 1);
      const replacement = UNESCAPES[next];
      if (next === '' || replacement === undefined) {
        throw new LiteralSyntaxError(`unknown escape '\\${next}'`, literal, index);
      }
      result += replacement;
      index += 2;
    } else if (char === '%') {
      if (literal.charAt(index + 1) !== '%') {
        throw new LiteralSyntaxError("'%' must be doubled", literal, index);
      }
      result += '%';
      index += 2;
    } else if (char === '"') {
      throw new LiteralSyntaxError('unescaped double quote', literal, index);
    } else {
      result += char;
      index += 1;
    }
  }

  return result;
}

/**
 * Converts compiler-specific entry syntax into a plain directory path.
 */
function toDirectoryPath(rawPath: string): string {
  return rawPath.trim().replace(FRAMEWORK_ANNOTATION, '');
}

/**
 * Rewrites `directory` relative to the execution root when it lies beneath
 * it. The root itself becomes `.`.
 */
function relativeToRoot(directory: string, executionRoot: string | undefined): string {
  if (executionRoot === undefined) {
    const normalized = path.posix.normalize(directory);
    return normalized.length > 1 && normalized.endsWith('/')
      ? normalized.slice(0, -1)
      : normalized;
  }

  const root = path.posix.resolve(executionRoot);
  const resolved = path.posix.resolve(root, directory);
  if (resolved === root) {
    return '.';
  }

  const rootPrefix = root.endsWith('/') ? root : `${root}/`;
  return resolved.startsWith(rootPrefix) ? resolved.slice(rootPrefix.length) : resolved;
}

/**
 * Converts a raw search-list entry (or an already normalized directory)
 * into its canonical, literal-safe form.
 *
 * Trimming, annotation stripping and path resolution repeat until the path
 * stops changing, so dot segments cannot hide trailing whitespace or an
 * annotation. Hence `normalize(normalize(x).path)` and
 * `normalize(normalize(x))` both equal `normalize(x)`.
 *
 * @example
 * ```typescript
 * normalize('/work/external/zlib/include', { executionRoot: '/work' });
 * // { path: 'external/zlib/include', literal: 'external/zlib/include' }
 * ```
 */
export function normalize(
  rawPath: string | IncludeDirectory,
  options: NormalizeOptions = {}
): IncludeDirectory {
  const step = (value: string): string =>
    relativeToRoot(toDirectoryPath(value), options.executionRoot);

  let canonical = step(typeof rawPath === 'string' ? rawPath : rawPath.path);
  for (let next = step(canonical); next !== canonical; next = step(canonical)) {
    canonical = next;
  }

  return { path: canonical, literal: escapeLiteral(canonical) };
}
