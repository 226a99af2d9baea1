/**
 * @file Dataset Type Definitions
 *
 * Shapes shared by the workbook reader, the loader and the locator.
 *
 * @module dataset/types
 */

import type { TransportAttempt, TransportFailure, UnrecognizedUrl } from '../transport/types.js';
import type { DatasetTable } from './DatasetTable.js';

/** One flattened spreadsheet cell. */
export type CellValue = string | number | boolean | Date | null;

/** A standalone copy of one row, keyed by original column name, in column order. */
export type DatasetRecord = ReadonlyMap<string, CellValue>;

/** A named column as read from the header row. */
export interface RawColumn {
    name: string;
    values: CellValue[];
}

/** Operator-provided spreadsheet bytes. */
export interface UploadedPayload {
    name: string;
    bytes: Uint8Array;
}

/**
 * Where spreadsheet data comes from. An upload takes priority over the URL
 * when both are set.
 */
export interface RawSource {
    url?: string;
    upload?: UploadedPayload;
}

export interface ParseFailure {
    kind: 'ParseFailure';
    message: string;
}

export type LoadFailure = UnrecognizedUrl | TransportFailure | ParseFailure;

export type LoadOrigin = 'upload' | 'network' | 'cache';

/** Troubleshooting summary of a loaded table. */
export interface TableDiagnostics {
    rowCount: number;
    columns: string[];
    excludedColumns: string[];
    identifierColumn: string;
    identifierColumnPresent: boolean;
    identifierSample: string[];
}

export type LoadResult =
    | {
        ok: true;
        table: DatasetTable;
        diagnostics: TableDiagnostics;
        origin: LoadOrigin;
        attempts: TransportAttempt[];
    }
    | {
        ok: false;
        failure: LoadFailure;
        attempts: TransportAttempt[];
    };
