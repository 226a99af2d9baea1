/**
 * @file Diagnostic File Sink
 *
 * Appends every diagnostic event to a JSONL file. Never read back by the
 * application.
 *
 * @module telemetry/DiagnosticFileSink
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import type { DiagnosticEvent, DiagnosticLog } from './DiagnosticLog.js';
import { errorMessage_resolve } from '../core/result.js';

export class DiagnosticFileSink {
    private disabled: boolean = false;
    private directoryReady: boolean = false;
    private unsubscribe: (() => void) | null = null;

    constructor(private readonly filePath: string) {}

    /**
     * Start appending events from `log`.
     */
    attach(log: DiagnosticLog): void {
        this.detach();
        this.unsubscribe = log.subscribe((event: DiagnosticEvent): void => this.event_write(event));
    }

    detach(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;
    }

    /**
     * Append one event. A failed write is reported once on stderr and the
     * sink stops writing.
     */
    event_write(event: DiagnosticEvent): void {
        if (this.disabled) return;
        try {
            if (!this.directoryReady) {
                fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
                this.directoryReady = true;
            }
            fs.appendFileSync(this.filePath, `${JSON.stringify(event)}\n`, 'utf-8');
        } catch (error: unknown) {
            this.disabled = true;
            console.error(chalk.yellow(`>> WARNING: diagnostic log disabled (${this.filePath}): ${errorMessage_resolve(error)}`));
        }
    }
}
