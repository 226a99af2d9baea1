import { describe, it, expect } from 'vitest';
import { DatasetTable } from './DatasetTable.js';

function table_create(): DatasetTable {
    return new DatasetTable({
        columns: [
            { name: 'Store', values: ['S-01', 'S-02', 'S-03'] },
            { name: 'IMEI', values: ['111111111111111', '222222222222222', '333333333333333'] },
            { name: 'Cost', values: [10, null, 30] }
        ],
        rowCount: 3,
        identifierColumn: 'IMEI',
        identifiers: ['111111111111111', '222222222222222', '333333333333333'],
        excludedColumns: ['Dispute Reason']
    });
}

describe('DatasetTable', (): void => {
    it('keeps columns in sheet order', (): void => {
        const table: DatasetTable = table_create();
        expect(table.columnNames_get()).toEqual(['Store', 'IMEI', 'Cost']);
    });

    it('copies a row into a standalone record', (): void => {
        const table: DatasetTable = table_create();
        const record = table.record_get(1);

        expect(Array.from(record.entries())).toEqual([
            ['Store', 'S-02'],
            ['IMEI', '222222222222222'],
            ['Cost', null]
        ]);
        expect(table.record_get(1)).not.toBe(record);
    });

    it('rejects row indexes outside the table', (): void => {
        const table: DatasetTable = table_create();
        expect((): unknown => table.record_get(3)).toThrow(RangeError);
        expect((): unknown => table.record_get(-1)).toThrow(RangeError);
    });

    it('is not affected by later changes to its inputs', (): void => {
        const identifiers: string[] = ['111111111111111'];
        const table: DatasetTable = new DatasetTable({
            columns: [{ name: 'IMEI', values: ['111111111111111'] }],
            rowCount: 1,
            identifierColumn: 'IMEI',
            identifiers
        });
        identifiers[0] = 'changed';
        expect(table.identifiers_get()).toEqual(['111111111111111']);
    });

    it('limits head to the available rows', (): void => {
        expect(table_create().head(10)).toHaveLength(3);
        expect(table_create().head(2)).toHaveLength(2);
    });

    it('summarizes itself for diagnostics', (): void => {
        expect(table_create().diagnostics_get(2)).toEqual({
            rowCount: 3,
            columns: ['Store', 'IMEI', 'Cost'],
            excludedColumns: ['Dispute Reason'],
            identifierColumn: 'IMEI',
            identifierColumnPresent: true,
            identifierSample: ['111111111111111', '222222222222222']
        });
    });
});
