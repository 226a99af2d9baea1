/**
 * @file Returns Lookup REPL
 *
 * Interactive readline loop over a ReturnsSession. Lines are parsed into
 * `ReplCommand` values; anything that is not a known command is treated
 * as an IMEI search.
 *
 * @module cli/Repl
 */

import * as readline from 'readline';
import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import type { ReturnsSession, SessionSearchOutcome } from '../session/ReturnsSession.js';
import type { DatasetRecord, LoadResult, TableDiagnostics } from '../dataset/types.js';
import type { DatasetTable } from '../dataset/DatasetTable.js';
import { MARKERS, type RecordPresenter } from '../ui/RecordPresenter.js';
import { spinner_start } from '../ui/spinner.js';
import { errorMessage_resolve } from '../core/result.js';

// ─── Command Parsing ────────────────────────────────────────────────────────

export type ReplCommand =
    | { kind: 'empty' }
    | { kind: 'search'; query: string }
    | { kind: 'refresh' }
    | { kind: 'upload'; path: string }
    | { kind: 'upload-clear' }
    | { kind: 'source'; url: string | null }
    | { kind: 'info' }
    | { kind: 'columns' }
    | { kind: 'raw'; count: number }
    | { kind: 'attempts' }
    | { kind: 'help' }
    | { kind: 'quit' }
    | { kind: 'invalid'; message: string };

export const RAW_DEFAULT_ROWS: number = 5;

const HELP_LINES: readonly string[] = [
    'search <imei>    Look up a return by IMEI (a bare IMEI works too)',
    'refresh          Drop cached data and reload the sheet',
    'upload <path>    Use a local .xlsx file instead of the URL',
    'upload clear     Go back to the configured URL',
    'source [url]     Show or change the spreadsheet URL',
    'info             Dataset summary',
    'columns          Column names',
    'raw [n]          First n rows',
    'attempts         Network attempts of the last load',
    'help             This list',
    'quit             Exit'
];

/**
 * Parse one input line into a command.
 */
export function command_parse(line: string): ReplCommand {
    const input: string = line.trim();
    if (!input) return { kind: 'empty' };

    const spaceIdx: number = input.search(/\s/);
    const verb: string = (spaceIdx === -1 ? input : input.slice(0, spaceIdx)).toLowerCase();
    const rest: string = spaceIdx === -1 ? '' : input.slice(spaceIdx + 1).trim();

    switch (verb) {
        case 'search':
            return rest ? { kind: 'search', query: rest } : { kind: 'invalid', message: 'Usage: search <imei>' };
        case 'refresh':
            return { kind: 'refresh' };
        case 'upload':
            if (!rest) return { kind: 'invalid', message: 'Usage: upload <path.xlsx> | upload clear' };
            return rest.toLowerCase() === 'clear' ? { kind: 'upload-clear' } : { kind: 'upload', path: rest };
        case 'source':
            return { kind: 'source', url: rest || null };
        case 'info':
            return { kind: 'info' };
        case 'columns':
            return { kind: 'columns' };
        case 'raw': {
            if (!rest) return { kind: 'raw', count: RAW_DEFAULT_ROWS };
            const count: number = Number.parseInt(rest, 10);
            if (!/^\d+$/.test(rest) || count < 1) {
                return { kind: 'invalid', message: 'Usage: raw [rows], rows must be a positive integer' };
            }
            return { kind: 'raw', count };
        }
        case 'attempts':
            return { kind: 'attempts' };
        case 'help':
        case '?':
            return { kind: 'help' };
        case 'quit':
        case 'exit':
        case 'q':
            return { kind: 'quit' };
        default:
            return { kind: 'search', query: input };
    }
}

// ─── Command Execution ──────────────────────────────────────────────────────

export interface ReplOptions {
    /** Show a spinner while loads run. */
    spinner?: boolean;
    write?: (text: string) => void;
}

/**
 * Executes parsed commands against a session and writes rendered output.
 */
export class ReturnsRepl {
    private readonly write: (text: string) => void;
    private readonly spinnerEnabled: boolean;

    constructor(
        private readonly session: ReturnsSession,
        private readonly presenter: RecordPresenter,
        options: ReplOptions = {}
    ) {
        this.write = options.write ?? ((text: string): void => { console.log(text); });
        this.spinnerEnabled = options.spinner ?? false;
    }

    /**
     * Run one command.
     *
     * @returns false when the loop should stop.
     */
    public async command_execute(command: ReplCommand): Promise<boolean> {
        try {
            return await this.command_dispatch(command);
        } catch (error: unknown) {
            this.write(chalk.red(`${MARKERS.ERROR} ${errorMessage_resolve(error)}`));
            return true;
        }
    }

    /**
     * Load the current source with a spinner and print the result.
     */
    public async load_run(refresh: boolean = false): Promise<LoadResult> {
        const stop: (() => void) | null = this.spinnerEnabled
            ? spinner_start(refresh ? 'Refreshing data' : 'Loading data')
            : null;
        let result: LoadResult;
        try {
            result = refresh ? await this.session.refresh() : await this.session.load();
        } finally {
            if (stop) stop();
        }
        this.write(this.presenter.loadResult_render(result));
        return result;
    }

    /**
     * Start the interactive loop on stdin/stdout. Resolves when the operator quits
     * or input closes.
     */
    public start(): Promise<void> {
        return new Promise<void>((resolve): void => {
            const rl: readline.Interface = readline.createInterface({
                input: process.stdin,
                output: process.stdout,
                prompt: `${chalk.cyan('returns')}> `,
                completer: (line: string): [string[], string] => this.completions_resolve(line)
            });

            rl.on('line', (line: string): void => {
                rl.pause();
                this.command_execute(command_parse(line)).then((keepGoing: boolean): void => {
                    if (keepGoing) {
                        rl.resume();
                        rl.prompt();
                    } else {
                        rl.close();
                    }
                }, (error: unknown): void => {
                    this.write(chalk.red(`${MARKERS.ERROR} ${errorMessage_resolve(error)}`));
                    rl.close();
                });
            });
            rl.on('close', (): void => {
                this.write(chalk.gray('Goodbye.'));
                resolve();
            });

            rl.prompt();
        });
    }

    private async command_dispatch(command: ReplCommand): Promise<boolean> {
        switch (command.kind) {
            case 'empty':
                return true;
            case 'quit':
                return false;
            case 'help':
                this.write(HELP_LINES.map((line: string): string => `  ${line}`).join('\n'));
                return true;
            case 'invalid':
                this.write(chalk.yellow(`${MARKERS.WARNING} ${command.message}`));
                return true;
            case 'search':
                this.search_run(command.query);
                return true;
            case 'refresh':
                await this.load_run(true);
                return true;
            case 'upload': {
                const filePath: string = path.resolve(command.path);
                const bytes: Buffer = await fs.promises.readFile(filePath);
                this.session.upload_set({ name: path.basename(filePath), bytes: new Uint8Array(bytes) });
                await this.load_run();
                return true;
            }
            case 'upload-clear':
                this.session.upload_clear();
                await this.load_run();
                return true;
            case 'source': {
                if (command.url === null) {
                    const current: string = this.session.source_get().upload?.name ?? this.session.source_get().url ?? '(none)';
                    this.write(`${MARKERS.INFO} Source: ${current}`);
                    return true;
                }
                this.session.url_set(command.url);
                await this.load_run();
                return true;
            }
            case 'info': {
                const diagnostics: TableDiagnostics | null = this.session.diagnostics_get();
                this.write(diagnostics ? this.presenter.diagnostics_render(diagnostics) : this.noData_message());
                return true;
            }
            case 'columns': {
                const table: DatasetTable | null = this.session.table_get();
                this.write(table ? table.columnNames_get().map((name: string, i: number): string => `  ${i + 1}. ${name}`).join('\n') : this.noData_message());
                return true;
            }
            case 'raw': {
                const table: DatasetTable | null = this.session.table_get();
                const rows: DatasetRecord[] | null = table ? table.head(command.count) : null;
                this.write(rows ? this.presenter.rows_render(rows) : this.noData_message());
                return true;
            }
            case 'attempts':
                this.write(this.presenter.attempts_render(this.session.attempts_get()));
                return true;
        }
    }

    private search_run(query: string): void {
        const outcome: SessionSearchOutcome = this.session.search(query);
        const samples: string[] = outcome.kind === 'NotFound'
            ? (this.session.diagnostics_get()?.identifierSample ?? [])
            : [];
        this.write(this.presenter.outcome_render(outcome, samples));
    }

    private noData_message(): string {
        return chalk.red(`${MARKERS.ERROR} No data loaded. Use "source <url>" or "upload <path>".`);
    }

    private completions_resolve(line: string): [string[], string] {
        const verbs: string[] = ['search', 'refresh', 'upload', 'source', 'info', 'columns', 'raw', 'attempts', 'help', 'quit'];
        if (/\s/.test(line)) return [[], line];
        return [verbs.filter((verb: string): boolean => verb.startsWith(line)), line];
    }
}
