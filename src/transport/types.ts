/**
 * @file Transport Type Definitions
 *
 * Contracts for turning a source URL into spreadsheet bytes.
 *
 * @module transport/types
 */

/** Recognized URL shapes, in match priority order. */
export type HandleShape = 'document-link' | 'id-param' | 'spreadsheet-path';

/**
 * Opaque resource id extracted from a source URL.
 */
export interface ResourceHandle {
    id: string;
    shape: HandleShape;
    url: string;
}

export type StrategyId = 'export' | 'download' | 'download-confirm';

/**
 * One HTTP request and what came back. Kept for diagnostics on both
 * success and failure paths.
 */
export interface TransportAttempt {
    strategy: StrategyId;
    url: string;
    /** HTTP status, or null when the request never produced a response. */
    status: number | null;
    statusText: string;
    bytes: number;
    contentType: string;
    accepted: boolean;
    /** Why the response was rejected; empty when accepted. */
    reason: string;
}

export interface UnrecognizedUrl {
    kind: 'UnrecognizedUrl';
    url: string;
    message: string;
}

export interface TransportFailure {
    kind: 'TransportFailure';
    /** Status of the last attempt, or null if it never got a response. */
    status: number | null;
    reason: string;
    message: string;
}

export interface FetchedPayload {
    bytes: Uint8Array;
    strategy: StrategyId;
    attempts: TransportAttempt[];
}

export type FetchOutcome =
    | { ok: true; value: FetchedPayload }
    | { ok: false; error: TransportFailure; attempts: TransportAttempt[] };

/** Minimal request options the transport passes to its HTTP client. */
export interface HttpRequestInit {
    signal: AbortSignal;
    headers: Record<string, string>;
    redirect: 'follow';
}

/**
 * HTTP client seam. Defaults to global `fetch`; tests inject an
 * in-process stand-in.
 */
export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<Response>;

export interface TransportOptions {
    timeoutMs: number;
    minBytes: number;
    cacheBust: boolean;
}
