/**
 * @toil-registry/core
 *
 * Parsing, normalization, export and consistency logic for the product
 * registry. Everything here is pure; file and process I/O live in the CLI.
 */

export * from './types.js'
export * from './errors.js'
export * from './json.js'
export * from './schemas.js'
export * from './markdown-table.js'
export * from './normalize.js'
export * from './exports.js'
export * from './diff.js'
export * from './consistency.js'
export * from './product-pack.js'
export * from './index-document.js'
