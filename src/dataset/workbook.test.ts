import { describe, it, expect, vi } from 'vitest';
import {
    cellValue_flatten,
    column_isExcluded,
    columns_exclude,
    headerNames_resolve,
    sheet_read,
    type SheetContent
} from './workbook.js';
import { RETURNS_ROWS, workbook_build } from '../testing/fixtures.js';

const EXCLUDE: string[] = ['Unnamed: 34', 'Unnamed: 0', 'Dispute'];

describe('headerNames_resolve', (): void => {
    it('names blank headers by position and numbers repeats', (): void => {
        expect(headerNames_resolve(['A', null, 'A', 'B', '  ', 'A'])).toEqual(['A', 'Unnamed: 1', 'A.1', 'B', 'Unnamed: 4', 'A.2']);
    });
});

describe('column exclusion', (): void => {
    it('matches patterns as case-sensitive substrings', (): void => {
        expect(column_isExcluded('Dispute Reason', EXCLUDE)).toBe(true);
        expect(column_isExcluded('dispute reason', EXCLUDE)).toBe(false);
        expect(column_isExcluded('Unnamed: 0', EXCLUDE)).toBe(true);
    });

    it('keeps the order of surviving names', (): void => {
        expect(columns_exclude(['IMEI', 'Unnamed: 0', 'Dispute Reason'], EXCLUDE)).toEqual(['IMEI']);
        expect(columns_exclude(['Store', 'Dispute', 'IMEI'], EXCLUDE)).toEqual(['Store', 'IMEI']);
    });
});

describe('cellValue_flatten', (): void => {
    it('joins rich text runs', (): void => {
        expect(cellValue_flatten({ richText: [{ text: 'Phone ' }, { text: 'A' }] })).toBe('Phone A');
    });

    it('uses the display text of hyperlinks', (): void => {
        expect(cellValue_flatten({ text: 'track', hyperlink: 'https://track.example/1' })).toBe('track');
    });

    it('takes the cached result of formulas', (): void => {
        expect(cellValue_flatten({ formula: 'A1*2', result: 42, date1904: false })).toBe(42);
        expect(cellValue_flatten({ formula: 'A1*2', date1904: false })).toBeNull();
    });
});

describe('sheet_read', (): void => {
    it('drops excluded columns and normalizes identifiers to text', (): void => {
        const content: SheetContent = sheet_read(workbook_build(RETURNS_ROWS), {
            identifierColumn: 'IMEI',
            excludePatterns: EXCLUDE
        });

        expect(content.columns.map((column) => column.name)).toEqual(['Store ID', 'Item ', 'IMEI', 'Status', 'Status.1', 'Cost', 'Link']);
        expect(content.excludedColumns).toEqual(['Dispute Reason']);
        expect(content.rowCount).toBe(3);
        expect(content.identifiers).toEqual(['354653661425023', '012345678901234', '999490154203237518111']);
        expect(content.columns[5].values).toEqual([120.5, 80, null]);
    });

    it('exposes only IMEI for a sheet of junk columns', (): void => {
        const content: SheetContent = sheet_read(workbook_build([
            [null, 'IMEI', 'Dispute Reason'],
            [1, '354653661425023', 'chargeback']
        ]), { identifierColumn: 'IMEI', excludePatterns: EXCLUDE });

        expect(content.columns.map((column) => column.name)).toEqual(['IMEI']);
        expect(content.excludedColumns).toEqual(['Unnamed: 0', 'Dispute Reason']);
    });

    it('skips fully blank rows', (): void => {
        const content: SheetContent = sheet_read(workbook_build([
            ['IMEI', 'Store'],
            ['354653661425023', 'S-01'],
            [null, '  '],
            ['490154203237518', 'S-02']
        ]), { identifierColumn: 'IMEI', excludePatterns: [] });

        expect(content.rowCount).toBe(2);
        expect(content.identifiers).toEqual(['354653661425023', '490154203237518']);
    });

    it('reports a missing identifier column as null', (): void => {
        const content: SheetContent = sheet_read(workbook_build([['Store'], ['S-01']]), {
            identifierColumn: 'IMEI',
            excludePatterns: []
        });
        expect(content.identifiers).toBeNull();
        expect(content.rowCount).toBe(1);
    });

    it('strips the float suffix from text identifiers without a fault', (): void => {
        const onIdentifierFault = vi.fn();
        const content: SheetContent = sheet_read(workbook_build([['IMEI'], ['354653661425023.0']]), {
            identifierColumn: 'IMEI',
            excludePatterns: [],
            onIdentifierFault
        });
        expect(content.identifiers).toEqual(['354653661425023']);
        expect(onIdentifierFault).not.toHaveBeenCalled();
    });
});
