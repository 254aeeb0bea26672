/**
 * Include-directory resolution: search-list extraction, normalization,
 * dependency injection and the combined pipeline.
 *
 * @packageDocumentation
 */

export { extract, hasSearchList, SEARCH_LIST_BEGIN, SEARCH_LIST_END } from './parser.js';
export { normalize, escapeLiteral, unescapeLiteral } from './normalizer.js';
export { inject, splitPrefixList } from './injector.js';
export type { InjectOptions } from './injector.js';
export { resolveIncludeDirectories, dedupeDirectories } from './resolver.js';
export type { ResolveRequest, ResolveDependencies } from './resolver.js';
export { DelimiterNotFoundError, LiteralSyntaxError } from './types.js';
export type { IncludeDirectory, NormalizeOptions, MissingDelimiter } from './types.js';
