import { describe, it, expect } from 'vitest';
import { RecordPresenter, ansi_strip, NOT_AVAILABLE } from './RecordPresenter.js';
import { SettingsService } from '../config/settings.js';
import type { CellValue, DatasetRecord } from '../dataset/types.js';
import type { TransportAttempt } from '../transport/types.js';

const presenter: RecordPresenter = new RecordPresenter(new SettingsService({}).defaults_get().presentation);

function record_create(): DatasetRecord {
    return new Map<string, CellValue>([
        ['Store ID', 'S-01'],
        ['Item ', 'Phone A'],
        ['IMEI', '354653661425023'],
        ['Status', 'Returned'],
        ['Status.1', 'DELIVERED'],
        ['Cost', 120.5],
        ['Link', 'https://track.example/1'],
        ['Notes', null],
        ['Return Date', new Date(Date.UTC(2024, 2, 5))]
    ]);
}

function lines_of(text: string): string[] {
    return ansi_strip(text).split('\n');
}

describe('RecordPresenter.value_format', (): void => {
    it('formats money fields with two decimals', (): void => {
        expect(presenter.value_format('Refund', '12.5')).toBe('$12.50');
        expect(presenter.value_format('Tax', 0)).toBe('$0.00');
        expect(presenter.value_format('Refund', 'pending')).toBe('pending');
    });

    it('formats date fields as calendar dates', (): void => {
        expect(presenter.value_format('Original Date', new Date(Date.UTC(2024, 0, 31)))).toBe('2024-01-31');
    });

    it('marks missing values', (): void => {
        expect(presenter.value_format('Notes', null)).toBe(NOT_AVAILABLE);
        expect(presenter.value_format('Notes', '   ')).toBe(NOT_AVAILABLE);
    });

    it('prints anything else as text', (): void => {
        expect(presenter.value_format('Active', true)).toBe('true');
        expect(presenter.value_format('Store', 'S-01')).toBe('S-01');
    });
});

describe('RecordPresenter.record_group', (): void => {
    it('groups fields by category and collects the rest', (): void => {
        const groups = presenter.record_group(record_create());

        expect(groups.map((group) => group.title)).toEqual([
            'Product Information',
            'Shipping Details',
            'Financial Information',
            'Return Information',
            'Additional Information'
        ]);
        expect(groups[0].fields.map((field) => field.field)).toEqual(['Store ID', 'Item ', 'IMEI', 'Status']);
        expect(groups[1].fields).toEqual([{ field: 'Status.1', label: 'Delivery Status', value: 'DELIVERED' }]);
        expect(groups[2].fields).toEqual([{ field: 'Cost', label: 'Cost', value: '$120.50' }]);
        expect(groups[3].fields).toEqual([{ field: 'Return Date', label: 'Return Date', value: '2024-03-05' }]);
        expect(groups[4].fields).toEqual([
            { field: 'Link', label: 'Link', value: 'https://track.example/1' },
            { field: 'Notes', label: 'Notes', value: NOT_AVAILABLE }
        ]);
    });

    it('drops categories with no fields present', (): void => {
        const groups = presenter.record_group(new Map<string, CellValue>([['Cost', 5]]));
        expect(groups.map((group) => group.title)).toEqual(['Financial Information']);
    });
});

describe('RecordPresenter.deliveryStatus_resolve', (): void => {
    it('maps the status field to a tone', (): void => {
        expect(presenter.deliveryStatus_resolve(record_create())).toEqual({ status: 'DELIVERED', tone: 'delivered' });
        expect(presenter.deliveryStatus_resolve(new Map<string, CellValue>([['Status.1', ' IN TRANSIT ']])))
            .toEqual({ status: 'IN TRANSIT', tone: 'in-transit' });
        expect(presenter.deliveryStatus_resolve(new Map<string, CellValue>())).toEqual({ status: 'Unknown', tone: 'pending' });
    });
});

describe('RecordPresenter.outcome_render', (): void => {
    it('renders a found record with banner, fields and tracking link', (): void => {
        const lines: string[] = lines_of(presenter.outcome_render({
            kind: 'Found', query: '354653661425023', match: 'exact', rowIndex: 0, record: record_create()
        }));

        expect(lines[0]).toBe('● DELIVERED');
        expect(lines).toContain('  Delivery Status: DELIVERED');
        expect(lines).toContain('  Cost: $120.50');
        expect(lines[lines.length - 1]).toBe('» Tracking Link: https://track.example/1');
    });

    it('flags substring matches', (): void => {
        const lines: string[] = lines_of(presenter.outcome_render({
            kind: 'Found', query: '354653661425023', match: 'fuzzy', rowIndex: 0, record: record_create()
        }));
        expect(lines[1]).toBe('>> WARNING: No exact match; showing first record containing 354653661425023');
    });

    it('lists up to five sample identifiers when nothing matched', (): void => {
        const lines: string[] = lines_of(presenter.outcome_render(
            { kind: 'NotFound', query: '867530900000001' },
            ['a1', 'a2', 'a3', 'a4', 'a5', 'a6']
        ));

        expect(lines).toEqual([
            '>> ERROR: IMEI not found: 867530900000001',
            '○ Some available IMEI values for search:',
            '   1. a1',
            '   2. a2',
            '   3. a3',
            '   4. a4',
            '   5. a5'
        ]);
    });

    it('renders the non-match signals', (): void => {
        expect(ansi_strip(presenter.outcome_render({ kind: 'TooShort', query: '12345', minLength: 15 })))
            .toBe('>> WARNING: IMEI number must have at least 15 digits!');
        expect(ansi_strip(presenter.outcome_render({ kind: 'NoData' })))
            .toBe('>> ERROR: Cannot search. Data not available!');
        expect(ansi_strip(presenter.outcome_render({ kind: 'NoIdentifierColumn', identifierColumn: 'IMEI' })))
            .toBe('>> ERROR: IMEI column not found in the data!');
    });
});

describe('RecordPresenter load and diagnostics views', (): void => {
    const attempt: TransportAttempt = {
        strategy: 'export',
        url: 'https://x.test',
        status: 403,
        statusText: 'Forbidden',
        bytes: 12,
        contentType: 'text/html',
        accepted: false,
        reason: 'HTTP 403'
    };

    it('renders one line per attempt', (): void => {
        expect(ansi_strip(presenter.attempts_render([attempt])))
            .toBe(`  ○ ${'export'.padEnd(16)} HTTP 403, 12 bytes, text/html - HTTP 403`);
        expect(ansi_strip(presenter.attempts_render([]))).toBe('○ No network requests were made.');
    });

    it('renders a load failure with its attempts and a hint', (): void => {
        const lines: string[] = lines_of(presenter.loadResult_render({
            ok: false,
            failure: { kind: 'TransportFailure', status: 403, reason: 'HTTP 403', message: 'All retrieval strategies failed for abc.' },
            attempts: [attempt]
        }));

        expect(lines[0]).toBe('>> ERROR: TransportFailure: All retrieval strategies failed for abc.');
        expect(lines).toHaveLength(3);
        expect(lines[2]).toBe('» Try another URL with "source <url>" or load a local file with "upload <path>".');
    });

    it('renders table diagnostics', (): void => {
        const lines: string[] = lines_of(presenter.diagnostics_render({
            rowCount: 2,
            columns: ['IMEI', 'Store'],
            excludedColumns: ['Dispute Reason'],
            identifierColumn: 'IMEI',
            identifierColumnPresent: true,
            identifierSample: ['111111111111111', '222222222222222']
        }));

        expect(lines).toEqual([
            'Dataset',
            '  Records: 2',
            '  Columns (2): IMEI, Store',
            '  Excluded: Dispute Reason',
            '  Sample IMEI values: 111111111111111, 222222222222222'
        ]);
    });

    it('renders raw rows compactly', (): void => {
        const rows: DatasetRecord[] = [new Map<string, CellValue>([['IMEI', '111111111111111'], ['Cost', null]])];
        expect(ansi_strip(presenter.rows_render(rows))).toBe('  [0] IMEI=111111111111111 | Cost=');
    });
});
