/**
 * @file Dataset Loader
 *
 * Turns a RawSource into a clean DatasetTable:
 *
 *   upload bytes ──┐
 *                  ├─> stage ─> parse ─> exclude columns ─> normalize IMEI ─> table
 *   url ─> handle ─> cache/transport ─┘
 *
 * Every failure comes back as a tagged LoadFailure; nothing is thrown to
 * the caller.
 *
 * @module dataset/DatasetLoader
 */

import type {
    LoadFailure,
    LoadOrigin,
    LoadResult,
    RawSource,
    TableDiagnostics,
    UploadedPayload
} from './types.js';
import type { ResourceHandle, TransportAttempt } from '../transport/types.js';
import type { Result } from '../core/result.js';
import { errorMessage_resolve, result_fail, result_ok } from '../core/result.js';
import { DatasetTable } from './DatasetTable.js';
import { workbookFile_read, type SheetContent } from './workbook.js';
import { handle_resolve, handleKey_resolve } from '../transport/handle.js';
import type { TransportResolver } from '../transport/TransportResolver.js';
import type { CachedFetchOutcome, PayloadCache } from '../transport/PayloadCache.js';
import { payload_stage } from '../transport/staging.js';
import { identifierFault_emit, type DiagnosticLog } from '../telemetry/DiagnosticLog.js';

export interface DatasetLoaderOptions {
    identifierColumn: string;
    excludePatterns: readonly string[];
    /** Identifier values shown in diagnostics. */
    sampleSize: number;
}

export interface LoadOptions {
    /** Drop the cached payload for this source and fetch again. */
    refresh?: boolean;
}

interface AcquiredBytes {
    bytes: Uint8Array;
    fileName: string;
    origin: LoadOrigin;
    attempts: TransportAttempt[];
}

type Acquisition = { ok: true; value: AcquiredBytes } | { ok: false; failure: LoadFailure; attempts: TransportAttempt[] };

export class DatasetLoader {
    constructor(
        private readonly options: DatasetLoaderOptions,
        private readonly transport: TransportResolver,
        private readonly cache: PayloadCache,
        private readonly log: DiagnosticLog
    ) {}

    /**
     * Load and clean a dataset.
     */
    async load(source: RawSource, options: LoadOptions = {}): Promise<LoadResult> {
        const refresh: boolean = options.refresh === true;
        this.log.emit({ type: 'load_start', source: source_describe(source), refresh });

        const acquired: Acquisition = await this.bytes_acquire(source, refresh);
        if (!acquired.ok) {
            return this.failure_report(acquired.failure, acquired.attempts);
        }

        const { bytes, fileName, origin, attempts } = acquired.value;
        const parsed: Result<DatasetTable, LoadFailure> = await this.bytes_parse(bytes, fileName);
        if (!parsed.ok) {
            return this.failure_report(parsed.error, attempts);
        }

        const table: DatasetTable = parsed.value;
        const diagnostics: TableDiagnostics = table.diagnostics_get(this.options.sampleSize);
        this.log.emit({
            type: 'load_complete',
            origin,
            rowCount: diagnostics.rowCount,
            columns: diagnostics.columns,
            identifierColumnPresent: diagnostics.identifierColumnPresent,
            identifierSample: diagnostics.identifierSample
        });
        return { ok: true, table, diagnostics, origin, attempts };
    }

    /**
     * Parse spreadsheet bytes into a table. Exposed for callers that already
     * hold the bytes. Staging I/O errors and unreadable workbooks both come
     * back as ParseFailure, with distinct messages.
     */
    async bytes_parse(bytes: Uint8Array, fileName: string = 'payload.xlsx'): Promise<Result<DatasetTable, LoadFailure>> {
        let read: Result<SheetContent, string>;
        try {
            read = await payload_stage(bytes, (filePath: string): Promise<Result<SheetContent, string>> =>
                this.sheet_read(filePath, fileName), fileName);
        } catch (error: unknown) {
            return result_fail({ kind: 'ParseFailure', message: `Could not stage spreadsheet for reading: ${errorMessage_resolve(error)}` });
        }
        if (!read.ok) {
            return result_fail({ kind: 'ParseFailure', message: `Could not read spreadsheet: ${read.error}` });
        }

        const content: SheetContent = read.value;
        return result_ok(new DatasetTable({
            columns: content.columns,
            rowCount: content.rowCount,
            identifierColumn: this.options.identifierColumn,
            identifiers: content.identifiers,
            excludedColumns: content.excludedColumns
        }));
    }

    private async sheet_read(filePath: string, fileName: string): Promise<Result<SheetContent, string>> {
        try {
            return result_ok(await workbookFile_read(filePath, {
                identifierColumn: this.options.identifierColumn,
                excludePatterns: this.options.excludePatterns,
                onIdentifierFault: (raw: unknown, error: unknown): void => {
                    identifierFault_emit(this.log, `parse ${fileName}`, raw, error);
                }
            }));
        } catch (error: unknown) {
            return result_fail(errorMessage_resolve(error));
        }
    }

    private async bytes_acquire(source: RawSource, refresh: boolean): Promise<Acquisition> {
        if (source.upload) {
            return { ok: true, value: upload_acquire(source.upload) };
        }

        const handle: Result<ResourceHandle, LoadFailure> = handle_resolve(source.url ?? '');
        if (!handle.ok) {
            return { ok: false, failure: handle.error, attempts: [] };
        }

        const key: string = handleKey_resolve(handle.value);
        if (refresh) {
            this.cache.invalidate(key);
        }

        const fetched: CachedFetchOutcome = await this.cache.payload_get(key, () => this.transport.payload_fetch(handle.value));
        if (!fetched.ok) {
            return { ok: false, failure: fetched.error, attempts: fetched.attempts };
        }
        if (fetched.fromCache) {
            this.log.emit({ type: 'cache_hit', key });
        }

        return {
            ok: true,
            value: {
                bytes: fetched.value.bytes,
                fileName: `${handle.value.id}.xlsx`,
                origin: fetched.fromCache ? 'cache' : 'network',
                attempts: fetched.value.attempts
            }
        };
    }

    private failure_report(failure: LoadFailure, attempts: TransportAttempt[]): LoadResult {
        this.log.emit({
            type: 'load_failed',
            kind: failure.kind,
            message: failure.message,
            status: failure.kind === 'TransportFailure' ? failure.status : null
        });
        return { ok: false, failure, attempts };
    }
}

function upload_acquire(upload: UploadedPayload): AcquiredBytes {
    return { bytes: upload.bytes, fileName: upload.name || 'upload.xlsx', origin: 'upload', attempts: [] };
}

function source_describe(source: RawSource): string {
    if (source.upload) return `upload:${source.upload.name}`;
    return source.url ? `url:${source.url}` : 'none';
}
