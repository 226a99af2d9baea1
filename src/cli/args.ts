/**
 * @file CLI Argument Parsing
 *
 * @module cli/args
 */

import type { SettingsOverrides } from '../config/settings.js';

export const DEFAULT_CONFIG_PATH: string = 'config/returns.yaml';

export interface CliOptions {
    configPath: string;
    overrides: SettingsOverrides;
    verbose: boolean;
    help: boolean;
}

export type ArgsParseResult = { ok: true; value: CliOptions } | { ok: false; error: string };

export const USAGE: string = [
    'Usage: returns-tracker [options]',
    '',
    '  --config <path>   Settings file (default: config/returns.yaml)',
    '  --url <url>       Spreadsheet share URL',
    '  --file <path>     Local .xlsx file, used instead of the URL',
    '  --log <path>      Diagnostic JSONL log file',
    '  --verbose         Print diagnostic events as they happen',
    '  --help            Show this help'
].join('\n');

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function args_parse(args: readonly string[]): ArgsParseResult {
    const options: CliOptions = { configPath: DEFAULT_CONFIG_PATH, overrides: {}, verbose: false, help: false };

    for (let i = 0; i < args.length; i++) {
        const arg: string = args[i];
        if (arg === '--verbose' || arg === '-v') {
            options.verbose = true;
            continue;
        }
        if (arg === '--help' || arg === '-h') {
            options.help = true;
            continue;
        }

        if (arg !== '--config' && arg !== '--url' && arg !== '--file' && arg !== '--log') {
            return { ok: false, error: `Unknown option: ${arg}` };
        }
        const value: string | undefined = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
            return { ok: false, error: `Option ${arg} needs a value` };
        }
        i++;

        switch (arg) {
            case '--config': options.configPath = value; break;
            case '--url': options.overrides.url = value; break;
            case '--file': options.overrides.file = value; break;
            case '--log': options.overrides.logFile = value; break;
        }
    }
    return { ok: true, value: options };
}
