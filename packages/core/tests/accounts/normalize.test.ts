import { describe, it, expect } from 'vitest';
import { normalizeName, normalizeSegment } from '../../src/accounts/normalize.js';
import { NormalizationError } from '../../src/errors.js';

describe('normalizeSegment', () => {
    it('drops punctuation before replacing spaces', () => {
        expect(normalizeSegment('Interest & Fees')).toBe('Interest--Fees');
    });

    it('removes punctuation without a separator', () => {
        expect(normalizeSegment('Rent & Mortgage')).toBe('Rent--Mortgage');
        expect(normalizeSegment('Rent&Mortgage')).toBe('RentMortgage');
    });

    it('keeps case verbatim', () => {
        expect(normalizeSegment('iPhone Repairs')).toBe('iPhone-Repairs');
    });

    it('keeps digits and non-ASCII letters', () => {
        expect(normalizeSegment('401k Savings')).toBe('401k-Savings');
        expect(normalizeSegment('Café Visits')).toBe('Café-Visits');
    });

    it('turns the reserved inflow label into one component', () => {
        expect(normalizeSegment('Inflow: Ready to Assign')).toBe('Inflow-Ready-to-Assign');
    });

    it('throws on a name made only of punctuation', () => {
        expect(() => normalizeSegment('&&!')).toThrow(NormalizationError);
    });

    it('throws on a name made only of spaces', () => {
        expect(() => normalizeSegment('   ')).toThrow(NormalizationError);
    });

    it('reports the offending name', () => {
        try {
            normalizeSegment('???');
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(NormalizationError);
            expect((err as NormalizationError).sourceName).toBe('???');
            expect((err as NormalizationError).code).toBe('NORMALIZATION_FAILURE');
        }
    });

    it('round-trips spacing for plain names', () => {
        for (const name of ['Fun Money', 'Car  Insurance', 'Emergency Fund 2', 'Gifts']) {
            expect(normalizeSegment(name).split('-').join(' ')).toBe(name);
        }
    });
});

describe('normalizeName', () => {
    it('prefixes the normalized group', () => {
        expect(normalizeName('Rent & Mortgage', 'Immediate Obligations')).toBe(
            'Immediate-Obligations:RentMortgage'
        );
    });

    it('returns a single component without a group', () => {
        expect(normalizeName('Checking Account')).toBe('Checking-Account');
    });

    it('treats an empty group as absent', () => {
        expect(normalizeName('Cash', '')).toBe('Cash');
    });

    it('throws when the group normalizes to nothing', () => {
        expect(() => normalizeName('Food', '!!')).toThrow(NormalizationError);
    });
});
