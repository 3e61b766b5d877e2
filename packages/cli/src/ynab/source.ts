import * as ynab from 'ynab';

/**
 * Read-only view of a YNAB account. Every method returns the raw payload
 * list; the fetcher validates it. Tests substitute an in-memory source.
 */
export interface BudgetSource {
    listBudgets(): Promise<unknown>;
    listAccounts(budgetId: string): Promise<unknown>;
    listCategoryGroups(budgetId: string): Promise<unknown>;
    listTransactions(budgetId: string, sinceDate?: string): Promise<unknown>;
}

export type BudgetSourceFactory = (token: string) => BudgetSource;

/**
 * Budget source backed by the official YNAB API client.
 */
export const createYnabSource: BudgetSourceFactory = (token) => {
    const api = new ynab.API(token);

    return {
        async listBudgets() {
            const response = await api.budgets.getBudgets();
            return response.data.budgets;
        },
        async listAccounts(budgetId) {
            const response = await api.accounts.getAccounts(budgetId);
            return response.data.accounts;
        },
        async listCategoryGroups(budgetId) {
            const response = await api.categories.getCategories(budgetId);
            return response.data.category_groups;
        },
        async listTransactions(budgetId, sinceDate) {
            const response = await api.transactions.getTransactions(budgetId, sinceDate);
            return response.data.transactions;
        },
    };
};
