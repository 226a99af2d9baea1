/**
 * @file Runtime Settings Service
 *
 * Resolves the settings struct handed to the session at startup, with
 * deterministic precedence (CLI flag > env > config file > defaults) and
 * central validation/clamping.
 *
 * @module
 */

import fs from 'fs';
import yaml from 'js-yaml';
import type { Result } from '../core/result.js';
import { errorMessage_resolve, result_fail, result_ok } from '../core/result.js';
import { SettingsFileSchema, schemaIssues_format, type SettingsFile } from './schemas.js';

export interface CategorySettings {
    title: string;
    fields: string[];
}

export interface PresentationSettings {
    /** Field whose value drives the delivery banner. */
    statusField: string;
    trackingLinkField: string;
    catchAllTitle: string;
    categories: CategorySettings[];
    /** Display labels for anonymous or renamed columns. */
    labels: Record<string, string>;
    moneyKeywords: string[];
    dateKeywords: string[];
}

export interface ReturnsSettings {
    source: { url: string | null; file: string | null };
    transport: { timeoutMs: number; minBytes: number; cacheTtlSeconds: number; cacheBust: boolean };
    dataset: { identifierColumn: string; excludeColumns: string[]; sampleSize: number };
    lookup: { minLength: number };
    log: { file: string | null };
    presentation: PresentationSettings;
}

/** Values given on the command line. */
export interface SettingsOverrides {
    url?: string;
    file?: string;
    logFile?: string;
}

export type NumericSettingKey = 'timeoutMs' | 'minBytes' | 'cacheTtlSeconds' | 'minLength' | 'sampleSize';

export type SettingSource = 'flag' | 'env' | 'file' | 'default';

interface NumericBounds {
    min: number;
    max: number;
}

export type EnvMap = Record<string, string | undefined>;

const ENV_KEYS = {
    url: 'RETURNS_SOURCE_URL',
    cacheTtlSeconds: 'RETURNS_CACHE_TTL_SECONDS',
    timeoutMs: 'RETURNS_TIMEOUT_MS',
    logFile: 'RETURNS_LOG_FILE',
    minLength: 'RETURNS_MIN_IDENTIFIER_LENGTH'
} as const;

export class SettingsService {
    private readonly bounds: Record<NumericSettingKey, NumericBounds> = {
        timeoutMs: { min: 1000, max: 120000 },
        minBytes: { min: 0, max: 10 * 1024 * 1024 },
        cacheTtlSeconds: { min: 0, max: 86400 },
        minLength: { min: 1, max: 64 },
        sampleSize: { min: 1, max: 100 }
    };

    constructor(private readonly env: EnvMap = process.env) {}

    /**
     * Built-in defaults.
     */
    public defaults_get(): ReturnsSettings {
        return {
            source: { url: null, file: null },
            transport: { timeoutMs: 30000, minBytes: 1000, cacheTtlSeconds: 300, cacheBust: true },
            dataset: {
                identifierColumn: 'IMEI',
                excludeColumns: ['Unnamed: 34', 'Unnamed: 0', 'Dispute'],
                sampleSize: 10
            },
            lookup: { minLength: 15 },
            log: { file: 'logs/returns-diagnostics.jsonl' },
            presentation: {
                statusField: 'Status.1',
                trackingLinkField: 'Link',
                catchAllTitle: 'Additional Information',
                categories: [
                    { title: 'Product Information', fields: ['Store ID', 'Store', 'Item ', 'SKU', 'IMEI', 'Exchange IMEI', 'Status'] },
                    { title: 'Shipping Details', fields: ['Tracking number', 'Status.1', 'Unnamed: 20', 'Unnamed: 21', 'Unnamed: 22'] },
                    { title: 'Financial Information', fields: ['Cost', 'Price', 'Refund', 'Exchange Price', 'Total', 'Tax', 'Restocking Fee', 'Shipping'] },
                    { title: 'Return Information', fields: ['Return Invoice', 'Return Date', 'Case Number', 'Name', 'Original Invoice', 'Original Date'] }
                ],
                labels: {
                    'Unnamed: 20': 'Shipping Company',
                    'Unnamed: 21': 'Delivery Date',
                    'Unnamed: 22': 'Delivery Location',
                    'Status.1': 'Delivery Status'
                },
                moneyKeywords: ['cost', 'price', 'amount', 'fee', 'value', 'tax', 'refund', 'shipping', 'total'],
                dateKeywords: ['date', 'time']
            }
        };
    }

    /**
     * Read and validate a YAML settings file. A missing file is not an
     * error and yields an empty override set.
     */
    public file_load(filePath: string): Result<SettingsFile, string[]> {
        if (!fs.existsSync(filePath)) {
            return result_ok({});
        }

        let parsed: unknown;
        try {
            parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
        } catch (error: unknown) {
            return result_fail([`${filePath}: ${errorMessage_resolve(error)}`]);
        }

        const validated: ReturnType<typeof SettingsFileSchema.safeParse> = SettingsFileSchema.safeParse(parsed ?? {});
        if (!validated.success) {
            return result_fail(schemaIssues_format(validated.error).map((issue: string): string => `${filePath}: ${issue}`));
        }
        return result_ok(validated.data);
    }

    /**
     * Merge defaults, file values, environment and flags into one struct.
     */
    public resolve(file: SettingsFile = {}, overrides: SettingsOverrides = {}): ReturnsSettings {
        const defaults: ReturnsSettings = this.defaults_get();

        const url: string | null = overrides.url ?? this.envString_resolve(ENV_KEYS.url) ?? file.source?.url ?? defaults.source.url;
        const sourceFile: string | null = overrides.file ?? file.source?.file ?? defaults.source.file;
        const logFile: string | null = overrides.logFile ?? this.envString_resolve(ENV_KEYS.logFile)
            ?? (file.log?.file !== undefined ? file.log.file : defaults.log.file);

        return {
            source: { url, file: sourceFile },
            transport: {
                timeoutMs: this.value_clamp('timeoutMs',
                    this.envNumeric_resolve(ENV_KEYS.timeoutMs) ?? file.transport?.timeoutMs ?? defaults.transport.timeoutMs),
                minBytes: this.value_clamp('minBytes', file.transport?.minBytes ?? defaults.transport.minBytes),
                cacheTtlSeconds: this.value_clamp('cacheTtlSeconds',
                    this.envNumeric_resolve(ENV_KEYS.cacheTtlSeconds) ?? file.transport?.cacheTtlSeconds ?? defaults.transport.cacheTtlSeconds),
                cacheBust: file.transport?.cacheBust ?? defaults.transport.cacheBust
            },
            dataset: {
                identifierColumn: file.dataset?.identifierColumn ?? defaults.dataset.identifierColumn,
                excludeColumns: file.dataset?.excludeColumns ?? defaults.dataset.excludeColumns,
                sampleSize: this.value_clamp('sampleSize', file.dataset?.sampleSize ?? defaults.dataset.sampleSize)
            },
            lookup: {
                minLength: this.value_clamp('minLength',
                    this.envNumeric_resolve(ENV_KEYS.minLength) ?? file.lookup?.minLength ?? defaults.lookup.minLength)
            },
            log: { file: logFile },
            presentation: { ...defaults.presentation, ...file.presentation }
        };
    }

    /**
     * Report where the effective source URL came from.
     */
    public sourceUrl_source(file: SettingsFile = {}, overrides: SettingsOverrides = {}): SettingSource {
        if (overrides.url !== undefined) return 'flag';
        if (this.envString_resolve(ENV_KEYS.url) !== undefined) return 'env';
        if (typeof file.source?.url === 'string') return 'file';
        return 'default';
    }

    private envString_resolve(key: string): string | undefined {
        const raw: string | undefined = this.env[key];
        if (raw === undefined) return undefined;
        const trimmed: string = raw.trim();
        return trimmed ? trimmed : undefined;
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.envString_resolve(key);
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private value_clamp(key: NumericSettingKey, value: number): number {
        const bounds: NumericBounds = this.bounds[key];
        return Math.max(bounds.min, Math.min(bounds.max, Math.round(value)));
    }
}
