/**
 * Accounts module: remote id -> ledger account resolution.
 */

export { normalizeName, normalizeSegment } from './normalize.js';
export { classifyReservedCategory } from './reserved.js';
export { createResolutionContext, derivePath, prefixFor, resolveAccount, resolveId } from './resolve.js';
export { buildIdentifierMapping, prefixesFromOptions } from './mapping.js';
export type { Resolution, ResolutionContext } from './types.js';
