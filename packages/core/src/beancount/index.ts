/**
 * Beancount module: reading what the importer needs from an existing ledger.
 */

export { scanLedger, declaredAccounts } from './scan.js';
