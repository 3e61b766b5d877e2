import { LEDGER_FORMAT } from '@budget-ledger/shared';
import type { LedgerTransaction, Posting } from '@budget-ledger/shared';

/**
 * Quote a string for the ledger: backslashes and double quotes escaped.
 */
export function quote(value: string): string {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Comments run to end of line, so line breaks inside a memo become spaces.
 */
function flattenComment(comment: string): string {
    return comment.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

/**
 * One posting line: account left-aligned in 50 columns, amount
 * right-aligned in 10, currency, optional comment.
 */
export function renderPosting(posting: Posting): string {
    const account = posting.account.length < LEDGER_FORMAT.ACCOUNT_WIDTH
        ? posting.account.padEnd(LEDGER_FORMAT.ACCOUNT_WIDTH)
        : `${posting.account} `;
    let line = `${LEDGER_FORMAT.INDENT}${account}${posting.amount.padStart(LEDGER_FORMAT.AMOUNT_WIDTH)} ${posting.currency}`;

    const comment = posting.comment ? flattenComment(posting.comment) : '';
    if (comment) {
        line += ` ; ${comment}`;
    }
    return line;
}

/**
 * Render one transaction, header through last posting, without a trailing newline.
 *
 * @example
 * 2026-01-15 * "Landlord" "January"
 *   ynab-id: "7b1f..."
 *   Assets:Checking                                   -1200 USD
 *   Expenses:Immediate-Obligations:RentMortgage        1200 USD
 */
export function renderTransaction(transaction: LedgerTransaction): string {
    let header = `${transaction.date} ${transaction.flag} ${quote(transaction.payee)}`;
    if (transaction.memo) {
        header += ` ${quote(transaction.memo)}`;
    }

    const lines = [header];
    for (const [key, value] of Object.entries(transaction.metadata)) {
        lines.push(`${LEDGER_FORMAT.INDENT}${key}: ${quote(value)}`);
    }
    for (const posting of transaction.postings) {
        lines.push(renderPosting(posting));
    }
    return lines.join('\n');
}

/**
 * Render transactions separated by blank lines, ending with a newline.
 */
export function renderJournal(transactions: readonly LedgerTransaction[]): string {
    return transactions.map(t => `${renderTransaction(t)}\n\n`).join('');
}
