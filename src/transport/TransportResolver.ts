/**
 * @file Transport Resolver
 *
 * Retrieves spreadsheet bytes for a resolved handle by trying retrieval
 * strategies in fixed priority order:
 *
 *   1. `export`: spreadsheet export-as-xlsx link
 *   2. `download`: generic download-by-id link. When the response is the
 *      large-file interstitial, the confirmation code is lifted from the
 *      body and the request reissued once (`download-confirm`).
 *
 * A response only counts as success if it is 2xx, at least `minBytes`
 * long, and not an HTML page. Every request is recorded as a
 * TransportAttempt so callers can show what happened.
 *
 * @module transport/TransportResolver
 */

import type {
    FetchOutcome,
    HttpFetch,
    HttpRequestInit,
    ResourceHandle,
    StrategyId,
    TransportAttempt,
    TransportOptions
} from './types.js';
import type { DiagnosticLog } from '../telemetry/DiagnosticLog.js';
import { errorMessage_resolve } from '../core/result.js';

/** Marker the download interstitial embeds in its confirmation link. */
export const CONFIRM_MARKER: string = 'confirm=';

const CONFIRM_PATTERN: RegExp = /confirm=([0-9A-Za-z_-]+)/;

interface AttemptResult {
    attempt: TransportAttempt;
    body: Uint8Array | null;
}

/** Export-as-xlsx link for a spreadsheet document. */
export function exportUrl_build(id: string): string {
    return `https://docs.google.com/spreadsheets/d/${encodeURIComponent(id)}/export?format=xlsx`;
}

/** Generic download-by-id link. */
export function downloadUrl_build(id: string): string {
    return `https://drive.google.com/uc?export=download&id=${encodeURIComponent(id)}`;
}

/**
 * Decide whether a response is spreadsheet data.
 *
 * @returns Rejection reason, or an empty string when acceptable.
 */
export function responseRejection_resolve(
    status: number,
    bytes: number,
    contentType: string,
    minBytes: number
): string {
    if (status < 200 || status >= 300) return `HTTP ${status}`;
    if (contentType.toLowerCase().includes('text/html')) return `HTML response (${contentType})`;
    if (bytes < minBytes) return `Body too small (${bytes} < ${minBytes} bytes)`;
    return '';
}

/**
 * Pull the interstitial confirmation code out of a response body.
 */
export function confirmCode_extract(body: Uint8Array): string | null {
    const text: string = Buffer.from(body).toString('utf-8');
    if (!text.includes(CONFIRM_MARKER)) return null;
    const match: RegExpMatchArray | null = text.match(CONFIRM_PATTERN);
    return match ? match[1] : null;
}

export class TransportResolver {
    /**
     * @param options - Timeout, size threshold and cache-bust switch.
     * @param http - HTTP client; global fetch by default.
     * @param log - Receives one `transport_attempt` event per request.
     * @param clock - Millisecond clock used for cache-busting stamps.
     */
    constructor(
        private readonly options: TransportOptions,
        private readonly http: HttpFetch = (url: string, init: HttpRequestInit): Promise<Response> => fetch(url, init),
        private readonly log: DiagnosticLog | null = null,
        private readonly clock: () => number = Date.now
    ) {}

    /**
     * Fetch the spreadsheet for `handle`, stopping at the first accepted response.
     */
    async payload_fetch(handle: ResourceHandle): Promise<FetchOutcome> {
        const attempts: TransportAttempt[] = [];

        const exported: AttemptResult = await this.attempt_run('export', exportUrl_build(handle.id));
        attempts.push(exported.attempt);
        if (exported.attempt.accepted && exported.body) {
            return { ok: true, value: { bytes: exported.body, strategy: 'export', attempts } };
        }

        const downloaded: AttemptResult = await this.attempt_run('download', downloadUrl_build(handle.id));
        attempts.push(downloaded.attempt);
        if (downloaded.attempt.accepted && downloaded.body) {
            return { ok: true, value: { bytes: downloaded.body, strategy: 'download', attempts } };
        }

        const code: string | null = downloaded.body ? confirmCode_extract(downloaded.body) : null;
        if (code) {
            const confirmUrl: string = `${downloadUrl_build(handle.id)}&confirm=${encodeURIComponent(code)}`;
            const confirmed: AttemptResult = await this.attempt_run('download-confirm', confirmUrl);
            attempts.push(confirmed.attempt);
            if (confirmed.attempt.accepted && confirmed.body) {
                return { ok: true, value: { bytes: confirmed.body, strategy: 'download-confirm', attempts } };
            }
        }

        const last: TransportAttempt = attempts[attempts.length - 1];
        return {
            ok: false,
            error: {
                kind: 'TransportFailure',
                status: last.status,
                reason: last.reason,
                message: `All retrieval strategies failed for ${handle.id}. Last: ${last.strategy} ${last.status ?? 'no response'} (${last.reason})`
            },
            attempts
        };
    }

    private url_stamp(url: string): string {
        if (!this.options.cacheBust) return url;
        return `${url}&_ts=${Math.floor(this.clock() / 1000)}`;
    }

    private async attempt_run(strategy: StrategyId, baseUrl: string): Promise<AttemptResult> {
        const url: string = this.url_stamp(baseUrl);
        let result: AttemptResult;
        try {
            const response: Response = await this.http(url, {
                signal: AbortSignal.timeout(this.options.timeoutMs),
                headers: { Accept: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet,*/*' },
                redirect: 'follow'
            });
            const body: Uint8Array = new Uint8Array(await response.arrayBuffer());
            const contentType: string = response.headers.get('content-type') ?? '';
            const reason: string = responseRejection_resolve(response.status, body.byteLength, contentType, this.options.minBytes);
            result = {
                attempt: {
                    strategy,
                    url,
                    status: response.status,
                    statusText: response.statusText,
                    bytes: body.byteLength,
                    contentType,
                    accepted: reason === '',
                    reason
                },
                body
            };
        } catch (error: unknown) {
            result = {
                attempt: {
                    strategy,
                    url,
                    status: null,
                    statusText: '',
                    bytes: 0,
                    contentType: '',
                    accepted: false,
                    reason: errorMessage_resolve(error)
                },
                body: null
            };
        }
        this.log?.emit({ type: 'transport_attempt', attempt: result.attempt });
        return result;
    }
}
