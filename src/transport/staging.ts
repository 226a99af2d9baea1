/**
 * @file Payload Staging
 *
 * Scoped temporary file for spreadsheet bytes. The directory is removed
 * when the callback settles, whether it resolved or threw.
 *
 * @module transport/staging
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

const STAGING_PREFIX: string = 'returns-tracker-';

/**
 * Write `bytes` to a fresh temp file, run `consume` on its path, then
 * delete the file and its directory.
 *
 * @param bytes - Payload to stage.
 * @param consume - Reader of the staged file.
 * @param fileName - Name of the staged file inside the temp directory.
 */
export async function payload_stage<T>(
    bytes: Uint8Array,
    consume: (filePath: string) => Promise<T>,
    fileName: string = 'payload.xlsx'
): Promise<T> {
    const dir: string = await fs.promises.mkdtemp(path.join(os.tmpdir(), STAGING_PREFIX));
    try {
        const filePath: string = path.join(dir, path.basename(fileName));
        await fs.promises.writeFile(filePath, bytes);
        return await consume(filePath);
    } finally {
        await fs.promises.rm(dir, { recursive: true, force: true });
    }
}
