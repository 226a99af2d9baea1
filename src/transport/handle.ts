/**
 * @file Source Handle Resolution
 *
 * Extracts the document id from a hosted spreadsheet URL. Shapes are tried
 * in order and the first match wins.
 *
 * @module transport/handle
 */

import type { Result } from '../core/result.js';
import { result_fail, result_ok } from '../core/result.js';
import type { HandleShape, ResourceHandle, UnrecognizedUrl } from './types.js';

interface HandlePattern {
    shape: HandleShape;
    pattern: RegExp;
}

const HANDLE_PATTERNS: readonly HandlePattern[] = [
    { shape: 'document-link', pattern: /\/d\/([A-Za-z0-9_-]+)/ },
    { shape: 'id-param', pattern: /[?&]id=([A-Za-z0-9_-]+)/ },
    { shape: 'spreadsheet-path', pattern: /\/spreadsheets\/d\/([A-Za-z0-9_-]+)/ }
];

/**
 * Resolve a resource handle from a source URL.
 */
export function handle_resolve(url: string): Result<ResourceHandle, UnrecognizedUrl> {
    const trimmed: string = url.trim();
    if (!trimmed) {
        return result_fail({
            kind: 'UnrecognizedUrl',
            url: trimmed,
            message: 'No spreadsheet source configured. Set a source URL or upload a file.'
        });
    }

    for (const { shape, pattern } of HANDLE_PATTERNS) {
        const match: RegExpMatchArray | null = trimmed.match(pattern);
        if (match) {
            return result_ok({ id: match[1], shape, url: trimmed });
        }
    }

    return result_fail({
        kind: 'UnrecognizedUrl',
        url: trimmed,
        message: `Unrecognized spreadsheet URL: ${trimmed}. Try a share link of the form .../d/<id>/... or upload the file directly.`
    });
}

/** Cache key for a resolved handle. */
export function handleKey_resolve(handle: ResourceHandle): string {
    return `id:${handle.id}`;
}
