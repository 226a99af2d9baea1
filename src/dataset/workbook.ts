/**
 * @file Workbook Reader
 *
 * Reads the first worksheet of an xlsx file into named columns.
 *
 * Header naming follows spreadsheet-export conventions so that downstream
 * field names stay stable across exports:
 * - a blank header at 0-based position `i` becomes `Unnamed: i`
 * - a repeated header `X` becomes `X.1`, `X.2`, ...
 *
 * Column exclusion runs on header names before any cell is read. The
 * identifier column is read straight into normalized text.
 *
 * @module dataset/workbook
 */

import ExcelJS from 'exceljs';
import type { CellValue, RawColumn } from './types.js';
import { identifier_normalize, type IdentifierFaultHandler } from './identifier.js';

export interface SheetReadOptions {
    identifierColumn: string;
    excludePatterns: readonly string[];
    onIdentifierFault?: IdentifierFaultHandler;
}

export interface SheetContent {
    columns: RawColumn[];
    rowCount: number;
    excludedColumns: string[];
    /** Normalized identifier column, or null when the sheet has none. */
    identifiers: string[] | null;
}

/**
 * Flatten an exceljs cell value (rich text, hyperlink, formula, error)
 * into a plain value.
 */
export function cellValue_flatten(value: ExcelJS.CellValue): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value;
    if ('richText' in value) {
        return value.richText.map((run: ExcelJS.RichText): string => run.text).join('');
    }
    if ('hyperlink' in value) {
        return typeof value.text === 'string' ? value.text : value.hyperlink;
    }
    if ('error' in value) return value.error;
    if ('formula' in value || 'sharedFormula' in value) {
        const result: unknown = value.result;
        if (result === undefined || result === null) return null;
        if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') return result;
        if (result instanceof Date) return result;
        if (typeof result === 'object' && 'error' in result) return String(result.error);
        return null;
    }
    return null;
}

/**
 * Name header cells, filling blanks and de-duplicating repeats.
 */
export function headerNames_resolve(raw: readonly CellValue[]): string[] {
    const seen: Map<string, number> = new Map();
    const taken: Set<string> = new Set();
    const names: string[] = [];

    raw.forEach((value: CellValue, index: number): void => {
        const text: string = value === null ? '' : value instanceof Date ? value.toISOString() : String(value);
        const base: string = text.trim() === '' ? `Unnamed: ${index}` : text;

        let name: string = base;
        let count: number = seen.get(base) ?? 0;
        while (taken.has(name)) {
            count += 1;
            name = `${base}.${count}`;
        }
        seen.set(base, count);
        taken.add(name);
        names.push(name);
    });

    return names;
}

/**
 * Whether a column name contains any exclusion pattern (case-sensitive).
 */
export function column_isExcluded(name: string, patterns: readonly string[]): boolean {
    return patterns.some((pattern: string): boolean => pattern !== '' && name.includes(pattern));
}

/**
 * Drop excluded names, keeping the order of the rest.
 */
export function columns_exclude(names: readonly string[], patterns: readonly string[]): string[] {
    return names.filter((name: string): boolean => !column_isExcluded(name, patterns));
}

function row_isBlank(row: ExcelJS.Row, columnCount: number): boolean {
    for (let c = 1; c <= columnCount; c++) {
        const value: CellValue = cellValue_flatten(row.getCell(c).value);
        if (value !== null && !(typeof value === 'string' && value.trim() === '')) return false;
    }
    return true;
}

/**
 * Read the first worksheet of a loaded workbook.
 *
 * @throws {Error} If the workbook has no worksheet.
 */
export function sheet_read(workbook: ExcelJS.Workbook, options: SheetReadOptions): SheetContent {
    const sheet: ExcelJS.Worksheet | undefined = workbook.worksheets[0];
    if (!sheet) {
        throw new Error('Workbook contains no worksheet');
    }

    const columnCount: number = sheet.columnCount;
    const header: ExcelJS.Row = sheet.getRow(1);
    const headerValues: CellValue[] = [];
    for (let c = 1; c <= columnCount; c++) {
        headerValues.push(cellValue_flatten(header.getCell(c).value));
    }
    const names: string[] = headerNames_resolve(headerValues);

    const keptNames: string[] = columns_exclude(names, options.excludePatterns);
    const excludedColumns: string[] = names.filter((name: string): boolean => !keptNames.includes(name));
    const kept: Array<{ name: string; position: number }> = keptNames.map((name: string): { name: string; position: number } => ({
        name,
        position: names.indexOf(name) + 1
    }));

    const columns: RawColumn[] = kept.map(({ name }): RawColumn => ({ name, values: [] }));
    const identifierIndex: number = kept.findIndex(({ name }): boolean => name === options.identifierColumn);
    const identifiers: string[] | null = identifierIndex >= 0 ? [] : null;

    let rowCount: number = 0;
    for (let r = 2; r <= sheet.rowCount; r++) {
        const row: ExcelJS.Row = sheet.getRow(r);
        if (row_isBlank(row, columnCount)) continue;

        kept.forEach(({ position }, index: number): void => {
            const value: CellValue = cellValue_flatten(row.getCell(position).value);
            if (index === identifierIndex && identifiers) {
                const text: string = identifier_normalize(value, options.onIdentifierFault);
                identifiers.push(text);
                columns[index].values.push(text);
            } else {
                columns[index].values.push(value);
            }
        });
        rowCount += 1;
    }

    return { columns, rowCount, excludedColumns, identifiers };
}

/**
 * Load an xlsx file from disk and read its first worksheet.
 */
export async function workbookFile_read(filePath: string, options: SheetReadOptions): Promise<SheetContent> {
    const workbook: ExcelJS.Workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    return sheet_read(workbook, options);
}
