/**
 * @file Dataset Table
 *
 * Immutable, column-ordered snapshot of one loaded spreadsheet. Built whole
 * by the loader and never mutated afterwards; a refresh produces a new table.
 *
 * The identifier column is held separately as `readonly string[]` so that
 * no numeric value can ever sit in it.
 *
 * @module dataset/table
 */

import type { CellValue, DatasetRecord, RawColumn, TableDiagnostics } from './types.js';

interface TableColumn {
    name: string;
    values: readonly CellValue[];
}

export interface DatasetTableInit {
    columns: RawColumn[];
    rowCount: number;
    identifierColumn: string;
    /** Normalized identifier values; required when the identifier column is among `columns`. */
    identifiers: string[] | null;
    excludedColumns?: string[];
}

export class DatasetTable {
    public readonly rowCount: number;
    public readonly identifierColumn: string;
    public readonly excludedColumns: readonly string[];
    private readonly columns: readonly TableColumn[];
    private readonly identifiers: readonly string[] | null;

    constructor(init: DatasetTableInit) {
        this.rowCount = init.rowCount;
        this.identifierColumn = init.identifierColumn;
        this.excludedColumns = Object.freeze([...(init.excludedColumns ?? [])]);
        this.identifiers = init.identifiers ? Object.freeze([...init.identifiers]) : null;
        this.columns = Object.freeze(init.columns.map((column: RawColumn): TableColumn => ({
            name: column.name,
            values: column.name === init.identifierColumn && this.identifiers
                ? this.identifiers
                : Object.freeze([...column.values])
        })));
    }

    /** Column names in sheet order. */
    public columnNames_get(): string[] {
        return this.columns.map((column: TableColumn): string => column.name);
    }

    /** Normalized identifier values, or null when the table has no identifier column. */
    public identifiers_get(): readonly string[] | null {
        return this.identifiers;
    }

    /**
     * Copy one row into a standalone record.
     *
     * @throws {RangeError} If the index is outside the table.
     */
    public record_get(rowIndex: number): DatasetRecord {
        if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= this.rowCount) {
            throw new RangeError(`Row ${rowIndex} is outside a table of ${this.rowCount} rows`);
        }
        const record: Map<string, CellValue> = new Map();
        for (const column of this.columns) {
            record.set(column.name, column.values[rowIndex] ?? null);
        }
        return record;
    }

    /** First `count` rows as records, for raw-data display. */
    public head(count: number): DatasetRecord[] {
        const limit: number = Math.max(0, Math.min(count, this.rowCount));
        const rows: DatasetRecord[] = [];
        for (let i = 0; i < limit; i++) {
            rows.push(this.record_get(i));
        }
        return rows;
    }

    /**
     * Summary for troubleshooting displays. Not used by lookup.
     */
    public diagnostics_get(sampleSize: number = 10): TableDiagnostics {
        return {
            rowCount: this.rowCount,
            columns: this.columnNames_get(),
            excludedColumns: [...this.excludedColumns],
            identifierColumn: this.identifierColumn,
            identifierColumnPresent: this.identifiers !== null,
            identifierSample: this.identifiers ? this.identifiers.slice(0, sampleSize) : []
        };
    }
}
