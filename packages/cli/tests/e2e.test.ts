import { describe, it, expect, vi, beforeEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { importLedger } from '../src/commands/import.js';
import { listIds } from '../src/commands/list-ids.js';
import type { CommandDeps } from '../src/commands/common.js';
import { makeBudgetData, makeFakeSource, type FakeBudgetData } from './helpers/fake-source.js';

vi.mock('node:fs/promises', () => ({
    readFile: vi.fn(),
}));

// No config file anywhere up the tree
vi.mock('node:fs', () => ({
    existsSync: vi.fn(() => false),
    readFileSync: vi.fn(),
}));

const LEDGER = [
    'option "operating_currency" "USD"',
    '2020-01-01 open Assets:Bank:Checking USD',
    '  ynab-id: "acct-checking"',
].join('\n');

function makeDeps(data: FakeBudgetData = makeBudgetData()) {
    const source = makeFakeSource(data);
    const deps = {
        createSource: vi.fn((_token: string) => source),
        write: vi.fn((_text: string) => {}),
    } satisfies CommandDeps;
    return { source, deps };
}

describe('E2E Command Integration', () => {
    let stderr: string[];

    beforeEach(() => {
        vi.clearAllMocks();
        stderr = [];
        vi.spyOn(console, 'error').mockImplementation((message: string) => {
            stderr.push(message);
        });
        vi.mocked(readFile).mockImplementation(async () => LEDGER);
    });

    it('writes reconciled transactions to stdout', async () => {
        const { deps } = makeDeps();

        const code = await importLedger('/books/main.beancount', { ynabToken: 'test-secret' }, deps);

        expect(code).toBe(0);
        expect(deps.createSource).toHaveBeenCalledWith('test-secret');
        expect(deps.write).toHaveBeenCalledTimes(1);
        expect(deps.write).toHaveBeenCalledWith(
            '2026-01-15 * "Corner Shop"\n' +
            '  ynab-id: "txn-food"\n' +
            '  Assets:Bank:Checking' + ' '.repeat(30) + '     -12.5 USD\n' +
            '  Expenses:Everyday:Food' + ' '.repeat(28) + '      12.5 USD\n' +
            '\n'
        );
        // Quiet by default: nothing to warn about
        expect(stderr).toEqual([]);
    });

    it('flags cleared transactions when they are included', async () => {
        const { deps } = makeDeps();

        await importLedger('/books/main.beancount', { ynabToken: 'test-secret', includeCleared: true }, deps);

        const output = deps.write.mock.calls[0][0];
        expect(output).toContain('2026-01-16 ! "Cafe" "coffee"\n');
    });

    it('exits 1 without writing when the budget is ambiguous', async () => {
        const data = makeBudgetData();
        data.budgets.push({ id: 'budget-2', name: 'Travel', currency_format: { iso_code: 'EUR' } });
        const { deps } = makeDeps(data);

        const code = await importLedger('/books/main.beancount', { ynabToken: 'test-secret' }, deps);

        expect(code).toBe(1);
        expect(deps.write).not.toHaveBeenCalled();
        expect(stderr).toContain(
            '✖ ERROR [fetch]: Failed to fetch YNAB data: No budget specified; choose one with --budget: Household, Travel'
        );
    });

    it('still writes output when single transactions fail', async () => {
        const data = makeBudgetData();
        data.transactions.push({
            id: 'txn-orphan',
            date: '2026-01-19',
            amount: -2000,
            cleared: 'reconciled',
            payee_name: 'Somewhere',
            account_id: 'acct-unknown',
        });
        const { deps } = makeDeps(data);

        const code = await importLedger('/books/main.beancount', { ynabToken: 'test-secret' }, deps);

        expect(code).toBe(0);
        expect(deps.write).toHaveBeenCalledTimes(1);
        expect(stderr).toContain(
            '✖ ERROR [translate]: Transaction txn-orphan not imported [UNKNOWN_REFERENCE]: Unknown account or category id: acct-unknown'
        );
        expect(stderr[stderr.length - 1]).toBe(
            '⚠️  Import summary: 1 failed, 0 unbalanced of 2 fetched transactions.'
        );
    });

    it('fails before contacting YNAB without a token', async () => {
        vi.stubEnv('YNAB_TOKEN', '');
        const { deps } = makeDeps();

        const code = await importLedger('/books/main.beancount', {}, deps);

        expect(code).toBe(1);
        expect(deps.createSource).not.toHaveBeenCalled();
        expect(stderr).toEqual(['✖ Error: No YNAB token: pass --ynab-token or set YNAB_TOKEN.']);
        vi.unstubAllEnvs();
    });

    it('lists ids with their ledger accounts', async () => {
        const { deps } = makeDeps();

        const code = await listIds('/books/main.beancount', { ynabToken: 'test-secret' }, deps);

        expect(code).toBe(0);
        const lines = deps.write.mock.calls[0][0].split('\n');
        const indent = ' '.repeat(37);
        expect(lines.slice(0, 4)).toEqual([
            'acct-checking Checking',
            `${indent}Assets:Bank:Checking`,
            'acct-old-card Old Card',
            `${indent}(none)`,
        ]);
        expect(lines).toHaveLength(13);
    });
});
