/**
 * @file Diagnostic Log
 *
 * Event bus for load and search diagnostics. Typed facade over Node's
 * EventEmitter; subscribers include the terminal renderer and the
 * append-only JSONL file sink.
 *
 * @module telemetry/DiagnosticLog
 */

import { EventEmitter } from 'events';
import type { TransportAttempt } from '../transport/types.js';
import { errorMessage_resolve } from '../core/result.js';

export type DiagnosticEventBody =
    | { type: 'load_start'; source: string; refresh: boolean }
    | { type: 'transport_attempt'; attempt: TransportAttempt }
    | { type: 'cache_hit'; key: string }
    | {
        type: 'load_complete';
        origin: string;
        rowCount: number;
        columns: string[];
        identifierColumnPresent: boolean;
        identifierSample: string[];
    }
    | { type: 'load_failed'; kind: string; message: string; status: number | null }
    | { type: 'identifier_fault'; raw: string; error: string; context: string }
    | { type: 'search'; query: string; outcome: string; rowIndex: number | null };

export type DiagnosticEvent = DiagnosticEventBody & { timestamp: string };

export type DiagnosticObserver = (event: DiagnosticEvent) => void;

const CHANNEL = 'diagnostic' as const;

export class DiagnosticLog {
    private readonly emitter: EventEmitter;

    constructor(private readonly clock: () => number = Date.now) {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to diagnostic events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: DiagnosticObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    /**
     * Stamp and broadcast one event.
     */
    emit(body: DiagnosticEventBody): void {
        const event: DiagnosticEvent = { ...body, timestamp: new Date(this.clock()).toISOString() };
        this.emitter.emit(CHANNEL, event);
    }
}

/**
 * Printable form of a raw value for fault records. Must not throw on
 * the same values that made the normalizer fail.
 */
export function rawValue_describe(raw: unknown): string {
    try {
        return typeof raw === 'string' ? raw : JSON.stringify(raw) ?? typeof raw;
    } catch {
        return `<unprintable ${typeof raw}>`;
    }
}

/**
 * Record an identifier value the normalizer could not render.
 */
export function identifierFault_emit(log: DiagnosticLog, context: string, raw: unknown, error: unknown): void {
    log.emit({ type: 'identifier_fault', raw: rawValue_describe(raw), error: errorMessage_resolve(error), context });
}
