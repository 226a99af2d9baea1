#!/usr/bin/env node
/**
 * @file Returns Tracker CLI Entry Point
 *
 * Resolves settings, performs the initial load and starts the REPL.
 *
 * Usage:
 *   npx tsx src/cli/main.ts --url https://docs.google.com/spreadsheets/d/<id>/edit
 *   npx tsx src/cli/main.ts --file ./returns.xlsx --verbose
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { args_parse, USAGE, type ArgsParseResult } from './args.js';
import { ReturnsRepl } from './Repl.js';
import { SettingsService, type ReturnsSettings } from '../config/settings.js';
import type { SettingsFile } from '../config/schemas.js';
import type { Result } from '../core/result.js';
import { errorMessage_resolve } from '../core/result.js';
import { ReturnsSession } from '../session/ReturnsSession.js';
import { RecordPresenter, MARKERS } from '../ui/RecordPresenter.js';
import { DiagnosticFileSink } from '../telemetry/DiagnosticFileSink.js';
import type { DiagnosticEvent } from '../telemetry/DiagnosticLog.js';

async function main(): Promise<number> {
    const parsed: ArgsParseResult = args_parse(process.argv.slice(2));
    if (!parsed.ok) {
        console.error(chalk.red(`${MARKERS.ERROR} ${parsed.error}`));
        console.error(USAGE);
        return 2;
    }
    if (parsed.value.help) {
        console.log(USAGE);
        return 0;
    }

    const service: SettingsService = new SettingsService();
    const file: Result<SettingsFile, string[]> = service.file_load(parsed.value.configPath);
    if (!file.ok) {
        console.error(chalk.red(`${MARKERS.ERROR} Invalid settings file`));
        file.error.forEach((issue: string): void => { console.error(`  ${issue}`); });
        return 1;
    }
    const settings: ReturnsSettings = service.resolve(file.value, parsed.value.overrides);

    const session: ReturnsSession = new ReturnsSession(settings);
    const presenter: RecordPresenter = new RecordPresenter(settings.presentation);

    const sink: DiagnosticFileSink | null = settings.log.file ? new DiagnosticFileSink(settings.log.file) : null;
    sink?.attach(session.log_get());
    if (parsed.value.verbose) {
        session.log_get().subscribe((event: DiagnosticEvent): void => {
            console.log(presenter.event_render(event));
        });
    }

    if (settings.source.file) {
        const filePath: string = path.resolve(settings.source.file);
        const bytes: Buffer = await fs.promises.readFile(filePath);
        session.upload_set({ name: path.basename(filePath), bytes: new Uint8Array(bytes) });
    }

    console.log(chalk.cyan.bold('Returns Tracker'));
    console.log(chalk.gray(`Source: ${settings.source.file ?? settings.source.url ?? '(none)'} [${service.sourceUrl_source(file.value, parsed.value.overrides)}]`));
    console.log(chalk.gray('Type "help" for commands, or enter an IMEI to search.\n'));

    const repl: ReturnsRepl = new ReturnsRepl(session, presenter, { spinner: process.stdout.isTTY === true });
    await repl.load_run();
    await repl.start();

    sink?.detach();
    return 0;
}

main().then((code: number): void => {
    process.exit(code);
}, (error: unknown): void => {
    console.error(chalk.red(`Fatal error: ${errorMessage_resolve(error)}`));
    process.exit(1);
});
