/**
 * Account name normalization.
 *
 * NOTE: Punctuation is removed BEFORE spaces become hyphens, so
 * "Interest & Fees" yields "Interest--Fees". Runs are never collapsed;
 * existing ledgers depend on the exact output.
 */

import { NormalizationError } from '../errors.js';

/**
 * Normalize one display name into a single account component.
 *
 * Transformations:
 * - Drop every character that is not a letter, digit or space
 * - Replace each space with a hyphen
 * - Case is kept as-is
 *
 * @throws NormalizationError if nothing survives
 */
export function normalizeSegment(name: string): string {
    const segment = name
        .replace(/[^\p{L}\p{N} ]/gu, '')
        .replace(/ /g, '-');

    if (segment.length === 0 || /^-+$/.test(segment)) {
        throw new NormalizationError(name);
    }
    return segment;
}

/**
 * Normalize a display name, prefixed by its group when it has one.
 *
 * @example normalizeName('Rent & Mortgage', 'Immediate Obligations')
 *          // 'Immediate-Obligations:RentMortgage'
 */
export function normalizeName(name: string, groupName?: string): string {
    const leaf = normalizeSegment(name);
    if (!groupName) {
        return leaf;
    }
    return `${normalizeSegment(groupName)}:${leaf}`;
}
