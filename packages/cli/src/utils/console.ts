/**
 * Formatted console output helpers.
 *
 * Everything goes to stderr: stdout carries only ledger text.
 * Default level shows warnings and errors; --verbose adds progress,
 * --debug adds per-transaction detail.
 */

export type LogLevel = 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = { warn: 0, info: 1, debug: 2 };

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];
}

export function log(message: string): void {
    if (enabled('info')) console.error(message);
}

export function success(message: string): void {
    if (enabled('info')) console.error(`✓ ${message}`);
}

export function warn(message: string): void {
    console.error(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function info(message: string): void {
    if (enabled('info')) console.error(`ℹ ${message}`);
}

export function arrow(message: string): void {
    if (enabled('info')) console.error(`→ ${message}`);
}

export function debug(message: string): void {
    if (enabled('debug')) console.error(`  ${message}`);
}
