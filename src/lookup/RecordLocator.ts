/**
 * @file Record Locator
 *
 * Finds one record by device identifier. Exact match first, then a
 * substring scan. The substring stage returns the first row whose
 * identifier contains the query, which is a different device whenever
 * one identifier is embedded in another.
 *
 * @module lookup/RecordLocator
 */

import type { DatasetTable } from '../dataset/DatasetTable.js';
import { identifier_normalize, type IdentifierFaultHandler } from '../dataset/identifier.js';
import type { SearchOutcome } from './types.js';

/** Shortest identifier worth searching for. */
export const IDENTIFIER_MIN_LENGTH: number = 15;

export type LocatorFaultHandler = (stage: 'normalize' | 'fuzzy', raw: unknown, error: unknown) => void;

export interface LocatorOptions {
    minLength?: number;
    onFault?: LocatorFaultHandler;
}

/**
 * Index of the first identifier equal to `query`, or -1.
 */
export function exactMatch_find(identifiers: readonly string[], query: string): number {
    return identifiers.indexOf(query);
}

/**
 * Index of the first non-empty identifier containing `query`, or -1.
 */
export function fuzzyMatch_find(identifiers: readonly string[], query: string): number {
    return identifiers.findIndex((value: string): boolean => value !== '' && value.includes(query));
}

/**
 * Look up `query` in `table`.
 */
export function record_locate(query: string, table: DatasetTable, options: LocatorOptions = {}): SearchOutcome {
    const identifiers: readonly string[] | null = table.identifiers_get();
    if (!identifiers) {
        return { kind: 'NoIdentifierColumn', identifierColumn: table.identifierColumn };
    }

    const minLength: number = options.minLength ?? IDENTIFIER_MIN_LENGTH;
    const onNormalizeFault: IdentifierFaultHandler = (raw: unknown, error: unknown): void => {
        options.onFault?.('normalize', raw, error);
    };
    const normalized: string = identifier_normalize(query, onNormalizeFault);
    if (normalized.length < minLength) {
        return { kind: 'TooShort', query: normalized, minLength };
    }

    const exactIndex: number = exactMatch_find(identifiers, normalized);
    if (exactIndex >= 0) {
        return { kind: 'Found', query: normalized, match: 'exact', rowIndex: exactIndex, record: table.record_get(exactIndex) };
    }

    let fuzzyIndex: number = -1;
    try {
        fuzzyIndex = fuzzyMatch_find(identifiers, normalized);
    } catch (error: unknown) {
        options.onFault?.('fuzzy', normalized, error);
        fuzzyIndex = -1;
    }
    if (fuzzyIndex >= 0) {
        return { kind: 'Found', query: normalized, match: 'fuzzy', rowIndex: fuzzyIndex, record: table.record_get(fuzzyIndex) };
    }

    return { kind: 'NotFound', query: normalized };
}

/**
 * Stateful wrapper binding locator options once per session.
 */
export class RecordLocator {
    constructor(private readonly options: LocatorOptions = {}) {}

    locate(query: string, table: DatasetTable): SearchOutcome {
        return record_locate(query, table, this.options);
    }
}
