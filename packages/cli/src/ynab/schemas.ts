import { z } from 'zod';

/**
 * The parts of YNAB API payloads the importer reads.
 * Amounts are integer milliunits; unknown fields are dropped.
 */

export const WireBudgetSchema = z.object({
    id: z.string(),
    name: z.string(),
    currency_format: z.object({ iso_code: z.string() }).nullish(),
});

export type WireBudget = z.infer<typeof WireBudgetSchema>;

export const WireAccountSchema = z.object({
    id: z.string(),
    name: z.string(),
    on_budget: z.boolean(),
    closed: z.boolean().default(false),
    deleted: z.boolean().default(false),
});

export type WireAccount = z.infer<typeof WireAccountSchema>;

export const WireCategorySchema = z.object({
    id: z.string(),
    name: z.string(),
    deleted: z.boolean().default(false),
});

export const WireCategoryGroupSchema = z.object({
    id: z.string(),
    name: z.string(),
    deleted: z.boolean().default(false),
    categories: z.array(WireCategorySchema).default([]),
});

export type WireCategoryGroup = z.infer<typeof WireCategoryGroupSchema>;

export const WireSubTransactionSchema = z.object({
    id: z.string(),
    amount: z.number().int(),
    memo: z.string().nullish(),
    payee_name: z.string().nullish(),
    category_id: z.string().nullish(),
    transfer_account_id: z.string().nullish(),
    transfer_transaction_id: z.string().nullish(),
    deleted: z.boolean().default(false),
});

export type WireSubTransaction = z.infer<typeof WireSubTransactionSchema>;

export const WireTransactionSchema = z.object({
    id: z.string(),
    date: z.string(),
    amount: z.number().int(),
    memo: z.string().nullish(),
    cleared: z.enum(['cleared', 'uncleared', 'reconciled']),
    payee_name: z.string().nullish(),
    account_id: z.string(),
    category_id: z.string().nullish(),
    transfer_account_id: z.string().nullish(),
    transfer_transaction_id: z.string().nullish(),
    deleted: z.boolean().default(false),
    subtransactions: z.array(WireSubTransactionSchema).default([]),
});

export type WireTransaction = z.infer<typeof WireTransactionSchema>;

/**
 * Error body the client rejects with on HTTP failures.
 */
export const WireErrorSchema = z.object({
    error: z.object({
        id: z.string().optional(),
        name: z.string().optional(),
        detail: z.string(),
    }),
});
