import { describe, it, expect } from 'vitest';
import { processTransaction, translateAll, SKIP_REASONS } from '../../src/ledger/policy.js';
import { renderJournal } from '../../src/ledger/render.js';
import { createResolutionContext } from '../../src/accounts/resolve.js';
import type { TranslationContext } from '../../src/ledger/types.js';
import type { RemoteAccount, RemoteTransaction } from '@budget-ledger/shared';

function makeCatalog(): RemoteAccount[] {
    return [
        { id: 'acct-checking', name: 'Checking', kind: 'account', on_budget: true },
        { id: 'acct-savings', name: 'Savings', kind: 'account', on_budget: true },
        { id: 'acct-mortgage', name: 'Mortgage', kind: 'account', on_budget: false },
        { id: 'cat-food', name: 'Food', kind: 'category', group_name: 'Everyday', on_budget: true },
        {
            id: 'cat-inflows',
            name: 'Inflow: Ready to Assign',
            kind: 'category',
            group_name: 'Internal Master Category',
            on_budget: true,
            reserved: 'inflows',
        },
    ];
}

function makeContext(overrides: Partial<TranslationContext> = {}): TranslationContext {
    return {
        resolution: createResolutionContext(makeCatalog(), new Map()),
        skipStartingBalances: false,
        ...overrides,
    };
}

function makeTxn(overrides: Partial<RemoteTransaction>): RemoteTransaction {
    return {
        id: 'txn-1',
        date: '2026-01-15',
        payee_name: 'Corner Shop',
        cleared: 'reconciled',
        amount: '-20',
        currency: 'USD',
        account_id: 'acct-checking',
        category_id: 'cat-food',
        legs: [],
        ...overrides,
    };
}

describe('processTransaction', () => {
    describe('Starting balances', () => {
        const startingBalance = makeTxn({
            id: 'txn-start',
            payee_name: 'Starting Balance',
            amount: '1000',
            // Would fail translation if it were ever attempted
            account_id: 'acct-unknown',
            category_id: 'cat-inflows',
        });

        it('skips them before translating when configured', () => {
            const outcome = processTransaction(startingBalance, makeContext({ skipStartingBalances: true }));
            expect(outcome).toEqual({
                status: 'skipped',
                transactionId: 'txn-start',
                reason: SKIP_REASONS.STARTING_BALANCE,
            });
        });

        it('imports them by default', () => {
            const outcome = processTransaction(
                { ...startingBalance, account_id: 'acct-checking' },
                makeContext()
            );
            expect(outcome.status).toBe('balanced');
        });

        it('requires an exact payee match', () => {
            const outcome = processTransaction(
                { ...startingBalance, account_id: 'acct-checking', payee_name: 'Starting Balance Refund' },
                makeContext({ skipStartingBalances: true })
            );
            expect(outcome.status).toBe('balanced');
        });
    });

    it('consolidates all inflows into one income account', () => {
        const context = makeContext();
        const accounts = ['Employer', 'Side Gig'].map((payee, i) => {
            const outcome = processTransaction(
                makeTxn({ id: `txn-${i}`, payee_name: payee, amount: '2000', category_id: 'cat-inflows' }),
                context
            );
            if (outcome.status !== 'balanced') throw new Error(`unexpected ${outcome.status}`);
            return outcome.transaction.postings[1].account;
        });
        expect(accounts).toEqual([
            'Income:Internal-Master-Category:Inflow-Ready-to-Assign',
            'Income:Internal-Master-Category:Inflow-Ready-to-Assign',
        ]);
    });

    it('emits single-leg tracking transactions with a warning', () => {
        const outcome = processTransaction(
            makeTxn({
                id: 'txn-e',
                date: '2026-02-01',
                payee_name: 'Principal Payment',
                account_id: 'acct-mortgage',
                amount: '850',
                category_id: undefined,
            }),
            makeContext()
        );

        expect(outcome.status).toBe('unbalanced');
        if (outcome.status !== 'unbalanced') return;
        expect(outcome.transaction.postings).toEqual([
            { account: 'Assets:Mortgage', amount: '850', currency: 'USD' },
        ]);
        expect(outcome.warning).toBe(
            'Unbalanced transaction 2026-02-01 "Principal Payment" (ynab-id txn-e): ' +
            'only one posting could be generated. Supply the missing leg manually.'
        );
    });

    it('accepts an all-zero split without a warning', () => {
        const outcome = processTransaction(
            makeTxn({
                amount: '0',
                category_id: undefined,
                legs: [{ id: 'leg-zero', amount: '0', category_id: 'cat-food' }],
            }),
            makeContext()
        );

        expect(outcome.status).toBe('balanced');
        if (outcome.status !== 'balanced') return;
        expect(outcome.transaction.postings).toEqual([
            { account: 'Assets:Checking', amount: '0', currency: 'USD' },
        ]);
    });

    it('warns when split legs do not add up', () => {
        const outcome = processTransaction(
            makeTxn({
                amount: '-30',
                category_id: undefined,
                legs: [{ id: 'leg-1', amount: '-25', category_id: 'cat-food' }],
            }),
            makeContext()
        );

        expect(outcome.status).toBe('unbalanced');
        if (outcome.status !== 'unbalanced') return;
        expect(outcome.warning).toContain('postings do not balance, residual -5 USD');
    });

    it('turns translation failures into error outcomes', () => {
        const outcome = processTransaction(makeTxn({ id: 'txn-bad', category_id: 'cat-gone' }), makeContext());

        expect(outcome.status).toBe('error');
        if (outcome.status !== 'error') return;
        expect(outcome.transactionId).toBe('txn-bad');
        expect(outcome.error.code).toBe('UNKNOWN_REFERENCE');
    });
});

describe('translateAll', () => {
    it('sorts output by date, then id', () => {
        const result = translateAll(
            [
                makeTxn({ id: 'b', date: '2026-03-02' }),
                makeTxn({ id: 'z', date: '2026-03-01' }),
                makeTxn({ id: 'a', date: '2026-03-02' }),
            ],
            makeContext()
        );

        expect(result.transactions.map(t => t.metadata['ynab-id'])).toEqual(['z', 'a', 'b']);
    });

    function transferPair(): RemoteTransaction[] {
        return [
            makeTxn({
                id: 't-out',
                amount: '-500',
                category_id: undefined,
                transfer_account_id: 'acct-savings',
                transfer_transaction_id: 't-in',
            }),
            makeTxn({
                id: 't-in',
                account_id: 'acct-savings',
                cleared: 'cleared',
                amount: '500',
                category_id: undefined,
                transfer_account_id: 'acct-checking',
                transfer_transaction_id: 't-out',
            }),
        ];
    }

    it('books a transfer once, from the side with the smaller id', () => {
        const result = translateAll(transferPair(), makeContext());

        expect(result.transactions).toHaveLength(1);
        expect(result.transactions[0].metadata['ynab-id']).toBe('t-in');
        expect(result.transactions[0].postings.map(p => p.account)).toEqual(['Assets:Savings', 'Assets:Checking']);
        expect(result.skipped).toEqual([{ transactionId: 't-out', reason: SKIP_REASONS.TRANSFER_COUNTERPART }]);
    });

    it('produces the same journal whatever order the transactions arrive in', () => {
        const forward = renderJournal(translateAll(transferPair(), makeContext()).transactions);
        const backward = renderJournal(translateAll(transferPair().reverse(), makeContext()).transactions);

        expect(backward).toBe(forward);
    });

    function splitWithTransfer(): RemoteTransaction {
        return makeTxn({
            id: 'split',
            amount: '-120',
            category_id: undefined,
            legs: [
                { id: 'leg-food', amount: '-20', category_id: 'cat-food' },
                {
                    id: 'leg-save',
                    amount: '-100',
                    transfer_account_id: 'acct-savings',
                    transfer_transaction_id: 'mirror',
                },
            ],
        });
    }

    function splitMirror(): RemoteTransaction {
        return makeTxn({
            id: 'mirror',
            account_id: 'acct-savings',
            amount: '100',
            category_id: undefined,
            transfer_account_id: 'acct-checking',
            transfer_transaction_id: 'leg-save',
        });
    }

    it('books a transfer made inside a split once', () => {
        const result = translateAll([splitWithTransfer(), splitMirror()], makeContext());

        expect(result.transactions).toHaveLength(1);
        expect(result.transactions[0].metadata['ynab-id']).toBe('split');
        expect(result.stats.skipped).toBe(1);
    });

    it('keeps the split when its mirror arrives first', () => {
        const result = translateAll([splitMirror(), splitWithTransfer()], makeContext());

        expect(result.transactions.map(t => t.metadata['ynab-id'])).toEqual(['split']);
        expect(result.skipped).toEqual([{ transactionId: 'mirror', reason: SKIP_REASONS.TRANSFER_COUNTERPART }]);
    });

    it('keeps the split even when only its mirror names the leg', () => {
        const split = splitWithTransfer();
        const legs = split.legs.map(({ transfer_transaction_id: _unused, ...leg }) => leg);

        const result = translateAll([splitMirror(), { ...split, legs }], makeContext());

        expect(result.transactions.map(t => t.metadata['ynab-id'])).toEqual(['split']);
    });

    it('books a transfer whose other side is outside the batch', () => {
        const [outgoing] = transferPair();
        expect(translateAll([outgoing], makeContext()).transactions).toHaveLength(1);
    });

    it('keeps going after a failure and counts every terminal state', () => {
        function* stream(): Generator<RemoteTransaction> {
            yield makeTxn({ id: 'ok' });
            yield makeTxn({ id: 'broken', category_id: 'cat-gone' });
            yield makeTxn({ id: 'start', payee_name: 'Starting Balance', category_id: 'cat-inflows', amount: '10' });
            yield makeTxn({ id: 'lonely', account_id: 'acct-mortgage', category_id: undefined });
        }

        const result = translateAll(stream(), makeContext({ skipStartingBalances: true }));

        expect(result.stats).toEqual({ fetched: 4, skipped: 1, balanced: 1, unbalanced: 1, failed: 1 });
        expect(result.transactions.map(t => t.metadata['ynab-id'])).toEqual(['lonely', 'ok']);
        expect(result.failures).toEqual([
            { transactionId: 'broken', code: 'UNKNOWN_REFERENCE', message: 'Unknown account or category id: cat-gone' },
        ]);
        expect(result.warnings).toHaveLength(1);
        expect(result.warnings[0]).toContain('(ynab-id lonely)');
    });
});
