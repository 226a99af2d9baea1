/**
 * @file Lookup Type Definitions
 *
 * @module lookup/types
 */

import type { DatasetRecord } from '../dataset/types.js';

export type MatchKind = 'exact' | 'fuzzy';

export interface NoIdentifierColumnOutcome {
    kind: 'NoIdentifierColumn';
    identifierColumn: string;
}

export interface TooShortOutcome {
    kind: 'TooShort';
    query: string;
    minLength: number;
}

export interface NotFoundOutcome {
    kind: 'NotFound';
    query: string;
}

export interface FoundOutcome {
    kind: 'Found';
    query: string;
    match: MatchKind;
    rowIndex: number;
    record: DatasetRecord;
}

/** Tagged result of one lookup. None of these are errors. */
export type SearchOutcome = NoIdentifierColumnOutcome | TooShortOutcome | NotFoundOutcome | FoundOutcome;
