import { Decimal } from 'decimal.js';

/**
 * Plain decimal string, no exponent, no trailing zeros.
 * Zero is always '0', never '-0'.
 */
export function formatAmount(value: Decimal): string {
    return value.isZero() ? '0' : value.toFixed();
}

export function negateAmount(amount: string): string {
    return formatAmount(new Decimal(amount).negated());
}

export function isZeroAmount(amount: string): boolean {
    return new Decimal(amount).isZero();
}
