/**
 * @file Record Presenter
 *
 * Terminal rendering for load results, diagnostics and search outcomes.
 * Found records are grouped into display categories; fields that no
 * category names fall into the catch-all group.
 *
 * @module ui/RecordPresenter
 */

import chalk from 'chalk';
import type { PresentationSettings } from '../config/settings.js';
import type { CellValue, DatasetRecord, LoadFailure, LoadResult, TableDiagnostics } from '../dataset/types.js';
import type { TransportAttempt } from '../transport/types.js';
import type { SessionSearchOutcome } from '../session/ReturnsSession.js';
import type { DiagnosticEvent } from '../telemetry/DiagnosticLog.js';

/**
 * Standard markers for the terminal dialect.
 */
export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>> ERROR:',
    WARNING: '>> WARNING:',
    HINT: '»',
};

export const NOT_AVAILABLE: string = 'Not available';

export interface DisplayField {
    field: string;
    label: string;
    value: string;
}

export interface DisplayGroup {
    title: string;
    fields: DisplayField[];
}

export type DeliveryTone = 'delivered' | 'in-transit' | 'pending';

export interface DeliveryStatus {
    status: string;
    tone: DeliveryTone;
}

/** Strip ANSI codes from a string. */
export function ansi_strip(str: string): string {
    return str.replace(/\x1b\[[0-9;]*m/g, '');
}

function keyword_matches(field: string, keywords: readonly string[]): boolean {
    const lower: string = field.toLowerCase();
    return keywords.some((keyword: string): boolean => lower.includes(keyword.toLowerCase()));
}

function date_render(value: Date): string {
    return value.toISOString().slice(0, 10);
}

export class RecordPresenter {
    constructor(private readonly presentation: PresentationSettings) {}

    /**
     * Format one field value for display.
     *
     * Money-like fields (by name keyword) render as `$0.00` when numeric;
     * date-like fields render Date values as `YYYY-MM-DD`.
     */
    public value_format(field: string, value: CellValue): string {
        if (value === null) return NOT_AVAILABLE;
        if (typeof value === 'string' && value.trim() === '') return NOT_AVAILABLE;

        if (keyword_matches(field, this.presentation.moneyKeywords)) {
            const amount: number = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
            if (Number.isFinite(amount)) return `$${amount.toFixed(2)}`;
        }

        if (value instanceof Date) {
            return keyword_matches(field, this.presentation.dateKeywords) ? date_render(value) : value.toISOString();
        }
        return String(value);
    }

    /** Display label for a column name. */
    public label_resolve(field: string): string {
        return this.presentation.labels[field] ?? field;
    }

    /**
     * Group a record's fields by category, keeping category order for named
     * fields and record order for the catch-all group. Empty groups are dropped.
     */
    public record_group(record: DatasetRecord): DisplayGroup[] {
        const assigned: Set<string> = new Set();
        const groups: DisplayGroup[] = [];

        for (const category of this.presentation.categories) {
            category.fields.forEach((field: string): void => { assigned.add(field); });
            const fields: DisplayField[] = category.fields
                .filter((field: string): boolean => record.has(field))
                .map((field: string): DisplayField => this.field_display(field, record.get(field) ?? null));
            if (fields.length > 0) groups.push({ title: category.title, fields });
        }

        const remaining: DisplayField[] = [];
        for (const [field, value] of record) {
            if (!assigned.has(field)) remaining.push(this.field_display(field, value));
        }
        if (remaining.length > 0) groups.push({ title: this.presentation.catchAllTitle, fields: remaining });

        return groups;
    }

    /**
     * Delivery banner state from the configured status field.
     */
    public deliveryStatus_resolve(record: DatasetRecord): DeliveryStatus {
        const raw: CellValue = record.get(this.presentation.statusField) ?? null;
        const status: string = raw === null || String(raw).trim() === '' ? 'Unknown' : String(raw).trim();
        if (status === 'DELIVERED') return { status, tone: 'delivered' };
        if (status === 'IN TRANSIT') return { status, tone: 'in-transit' };
        return { status, tone: 'pending' };
    }

    /**
     * Render a search outcome.
     *
     * @param samples - Identifier values offered when nothing matched.
     */
    public outcome_render(outcome: SessionSearchOutcome, samples: readonly string[] = []): string {
        switch (outcome.kind) {
            case 'NoData':
                return chalk.red(`${MARKERS.ERROR} Cannot search. Data not available!`);
            case 'NoIdentifierColumn':
                return chalk.red(`${MARKERS.ERROR} ${outcome.identifierColumn} column not found in the data!`);
            case 'TooShort':
                return chalk.yellow(`${MARKERS.WARNING} IMEI number must have at least ${outcome.minLength} digits!`);
            case 'NotFound': {
                const lines: string[] = [chalk.red(`${MARKERS.ERROR} IMEI not found: ${outcome.query}`)];
                if (samples.length > 0) {
                    lines.push(chalk.white(`${MARKERS.INFO} Some available IMEI values for search:`));
                    samples.slice(0, 5).forEach((sample: string, index: number): void => {
                        lines.push(`   ${index + 1}. ${sample}`);
                    });
                }
                return lines.join('\n');
            }
            case 'Found':
                return this.record_render(outcome.record, outcome.match === 'fuzzy' ? outcome.query : null);
        }
    }

    /**
     * Render a found record: delivery banner, grouped fields, tracking link.
     *
     * @param partialQuery - Set when the record came from a substring match.
     */
    public record_render(record: DatasetRecord, partialQuery: string | null = null): string {
        const lines: string[] = [];
        const delivery: DeliveryStatus = this.deliveryStatus_resolve(record);
        lines.push(this.deliveryBanner_render(delivery));

        if (partialQuery !== null) {
            lines.push(chalk.yellow(`${MARKERS.WARNING} No exact match; showing first record containing ${partialQuery}`));
        }

        for (const group of this.record_group(record)) {
            lines.push('');
            lines.push(chalk.bold(group.title));
            for (const field of group.fields) {
                lines.push(`  ${chalk.cyan(`${field.label}:`)} ${field.value}`);
            }
        }

        const link: CellValue = record.get(this.presentation.trackingLinkField) ?? null;
        if (typeof link === 'string' && link.trim() !== '') {
            lines.push('');
            lines.push(`${MARKERS.HINT} Tracking Link: ${chalk.underline(link.trim())}`);
        }
        return lines.join('\n');
    }

    /**
     * Render the outcome of a load or refresh.
     */
    public loadResult_render(result: LoadResult): string {
        if (result.ok) {
            const origin: string = result.origin === 'cache' ? ' (cached)' : result.origin === 'upload' ? ' (uploaded file)' : '';
            const lines: string[] = [chalk.cyan(`${MARKERS.AFFIRMATIVE} Successfully loaded ${result.diagnostics.rowCount} records${origin}`)];
            if (!result.diagnostics.identifierColumnPresent) {
                lines.push(chalk.yellow(`${MARKERS.WARNING} ${result.diagnostics.identifierColumn} column not found; search is disabled for this data.`));
            } else if (result.diagnostics.rowCount === 0) {
                lines.push(chalk.yellow(`${MARKERS.WARNING} The sheet has no records to search.`));
            }
            return lines.join('\n');
        }

        const failure: LoadFailure = result.failure;
        const lines: string[] = [chalk.red(`${MARKERS.ERROR} ${failure.kind}: ${failure.message}`)];
        if (result.attempts.length > 0) {
            lines.push(this.attempts_render(result.attempts));
        }
        if (failure.kind !== 'ParseFailure') {
            lines.push(chalk.white(`${MARKERS.HINT} Try another URL with "source <url>" or load a local file with "upload <path>".`));
        }
        return lines.join('\n');
    }

    /**
     * One line per transport attempt.
     */
    public attempts_render(attempts: readonly TransportAttempt[]): string {
        if (attempts.length === 0) return chalk.white(`${MARKERS.INFO} No network requests were made.`);
        return attempts.map((attempt: TransportAttempt): string => {
            const marker: string = attempt.accepted ? chalk.cyan(MARKERS.AFFIRMATIVE) : chalk.red(MARKERS.INFO);
            const status: string = attempt.status === null ? 'no response' : `HTTP ${attempt.status}`;
            const detail: string = `${status}, ${attempt.bytes} bytes, ${attempt.contentType || 'no content type'}`;
            const reason: string = attempt.reason ? ` - ${attempt.reason}` : '';
            return `  ${marker} ${attempt.strategy.padEnd(16)} ${detail}${reason}`;
        }).join('\n');
    }

    /**
     * Troubleshooting view of a loaded table.
     */
    public diagnostics_render(diagnostics: TableDiagnostics): string {
        const lines: string[] = [
            chalk.bold('Dataset'),
            `  Records: ${diagnostics.rowCount}`,
            `  Columns (${diagnostics.columns.length}): ${diagnostics.columns.join(', ')}`
        ];
        if (diagnostics.excludedColumns.length > 0) {
            lines.push(`  Excluded: ${diagnostics.excludedColumns.join(', ')}`);
        }
        if (diagnostics.identifierColumnPresent) {
            lines.push(`  Sample ${diagnostics.identifierColumn} values: ${diagnostics.identifierSample.join(', ') || '(none)'}`);
        } else {
            lines.push(chalk.yellow(`  ${MARKERS.WARNING} ${diagnostics.identifierColumn} column missing`));
        }
        return lines.join('\n');
    }

    /**
     * Compact rendering of the first rows.
     */
    public rows_render(records: readonly DatasetRecord[]): string {
        if (records.length === 0) return chalk.white(`${MARKERS.INFO} No rows.`);
        return records.map((record: DatasetRecord, index: number): string => {
            const cells: string[] = [];
            for (const [field, value] of record) {
                cells.push(`${field}=${value === null ? '' : value instanceof Date ? date_render(value) : String(value)}`);
            }
            return `  [${index}] ${cells.join(' | ')}`;
        }).join('\n');
    }

    /**
     * Single-line rendering of a diagnostic event for verbose mode.
     */
    public event_render(event: DiagnosticEvent): string {
        switch (event.type) {
            case 'load_start':
                return chalk.gray(`${MARKERS.INFO} load ${event.source}${event.refresh ? ' (refresh)' : ''}`);
            case 'transport_attempt':
                return chalk.gray(`${MARKERS.INFO} ${event.attempt.strategy} ${event.attempt.status ?? '-'} ${event.attempt.bytes}B ${event.attempt.reason}`.trimEnd());
            case 'cache_hit':
                return chalk.gray(`${MARKERS.INFO} cache hit ${event.key}`);
            case 'load_complete':
                return chalk.gray(`${MARKERS.INFO} loaded ${event.rowCount} rows from ${event.origin}${event.identifierColumnPresent ? '' : ' (no identifier column)'}`);
            case 'load_failed':
                return chalk.gray(`${MARKERS.INFO} load failed ${event.kind}`);
            case 'identifier_fault':
                return chalk.gray(`${MARKERS.INFO} identifier fault (${event.context}) ${event.raw}: ${event.error}`);
            case 'search':
                return chalk.gray(`${MARKERS.INFO} search ${event.query} -> ${event.outcome}`);
        }
    }

    private deliveryBanner_render(delivery: DeliveryStatus): string {
        switch (delivery.tone) {
            case 'delivered':
                return chalk.green.bold(`${MARKERS.AFFIRMATIVE} ${delivery.status}`);
            case 'in-transit':
                return chalk.blue.bold(`${MARKERS.HINT} ${delivery.status}`);
            case 'pending':
                return chalk.yellow.bold(`${MARKERS.INFO} ${delivery.status}`);
        }
    }

    private field_display(field: string, value: CellValue): DisplayField {
        return { field, label: this.label_resolve(field), value: this.value_format(field, value) };
    }
}
