/**
 * JSON library module
 * @module library
 */

export { JsonLibrary, parseLibrary } from './json-library.js'
export type { JsonLibraryOptions, LibraryDocument, LibraryItem } from './json-library.js'
export { parseQuery, matchesQuery, DEFAULT_QUERY_FIELDS } from './query.js'
export type { QueryTerm } from './query.js'
