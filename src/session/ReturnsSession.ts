/**
 * @file Returns Session
 *
 * Root of the lookup pipeline for one operator. Built once from the
 * resolved settings; the only state it keeps is the current source, the
 * payload cache and the replaceable table reference.
 *
 * A successful load swaps the table reference in one assignment. A failed
 * load clears it; searches then return `NoData`.
 *
 * @module session/ReturnsSession
 */

import type { ReturnsSettings } from '../config/settings.js';
import type { LoadResult, RawSource, TableDiagnostics, UploadedPayload } from '../dataset/types.js';
import type { DatasetTable } from '../dataset/DatasetTable.js';
import { DatasetLoader, type LoadOptions } from '../dataset/DatasetLoader.js';
import { TransportResolver } from '../transport/TransportResolver.js';
import { PayloadCache } from '../transport/PayloadCache.js';
import type { HttpFetch, TransportAttempt } from '../transport/types.js';
import { RecordLocator } from '../lookup/RecordLocator.js';
import type { SearchOutcome } from '../lookup/types.js';
import { DiagnosticLog, identifierFault_emit } from '../telemetry/DiagnosticLog.js';

export interface SessionDeps {
    http?: HttpFetch;
    log?: DiagnosticLog;
    clock?: () => number;
}

/** Search attempted before any table was loaded. */
export interface NoDataOutcome {
    kind: 'NoData';
}

export type SessionSearchOutcome = SearchOutcome | NoDataOutcome;

export class ReturnsSession {
    private readonly log: DiagnosticLog;
    private readonly cache: PayloadCache;
    private readonly loader: DatasetLoader;
    private readonly locator: RecordLocator;
    private source: RawSource;
    private table: DatasetTable | null = null;
    private lastLoad: LoadResult | null = null;

    constructor(private readonly settings: ReturnsSettings, deps: SessionDeps = {}) {
        const clock: () => number = deps.clock ?? Date.now;
        this.log = deps.log ?? new DiagnosticLog(clock);
        this.cache = new PayloadCache(settings.transport.cacheTtlSeconds * 1000, clock);

        const transport: TransportResolver = new TransportResolver(
            {
                timeoutMs: settings.transport.timeoutMs,
                minBytes: settings.transport.minBytes,
                cacheBust: settings.transport.cacheBust
            },
            deps.http,
            this.log,
            clock
        );
        this.loader = new DatasetLoader(
            {
                identifierColumn: settings.dataset.identifierColumn,
                excludePatterns: settings.dataset.excludeColumns,
                sampleSize: settings.dataset.sampleSize
            },
            transport,
            this.cache,
            this.log
        );
        this.locator = new RecordLocator({
            minLength: settings.lookup.minLength,
            onFault: (stage: string, raw: unknown, error: unknown): void => {
                identifierFault_emit(this.log, `search ${stage}`, raw, error);
            }
        });
        this.source = settings.source.url ? { url: settings.source.url } : {};
    }

    public log_get(): DiagnosticLog {
        return this.log;
    }

    public source_get(): RawSource {
        return this.source;
    }

    /**
     * Point the session at a URL. Clears any upload, since uploads win.
     */
    public url_set(url: string): void {
        this.source = { url };
    }

    /**
     * Use operator-provided bytes instead of the network. The URL is kept
     * so that `upload_clear` can fall back to it.
     */
    public upload_set(upload: UploadedPayload): void {
        this.source = { ...this.source, upload };
    }

    public upload_clear(): void {
        this.source = this.source.url ? { url: this.source.url } : {};
    }

    /**
     * Load the current source and replace the table reference.
     */
    public async load(options: LoadOptions = {}): Promise<LoadResult> {
        const result: LoadResult = await this.loader.load(this.source, options);
        this.lastLoad = result;
        this.table = result.ok ? result.table : null;
        return result;
    }

    /**
     * Invalidate every cached payload and reload from scratch.
     */
    public async refresh(): Promise<LoadResult> {
        this.cache.invalidate();
        return this.load({ refresh: true });
    }

    /**
     * Search the current table.
     */
    public search(query: string): SessionSearchOutcome {
        if (!this.table) {
            this.log.emit({ type: 'search', query, outcome: 'NoData', rowIndex: null });
            return { kind: 'NoData' };
        }
        const outcome: SearchOutcome = this.locator.locate(query, this.table);
        this.log.emit({
            type: 'search',
            query,
            outcome: outcome.kind === 'Found' ? `Found:${outcome.match}` : outcome.kind,
            rowIndex: outcome.kind === 'Found' ? outcome.rowIndex : null
        });
        return outcome;
    }

    public table_get(): DatasetTable | null {
        return this.table;
    }

    public diagnostics_get(): TableDiagnostics | null {
        return this.table ? this.table.diagnostics_get(this.settings.dataset.sampleSize) : null;
    }

    /** Transport attempts of the most recent load. */
    public attempts_get(): TransportAttempt[] {
        return this.lastLoad ? [...this.lastLoad.attempts] : [];
    }
}
