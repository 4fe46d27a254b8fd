/// <reference path="./7zip-min.d.ts" />
import { mkdtemp, readdir, rm } from "node:fs/promises";
import path from "node:path";

import { ensureDir, getTmpDir } from "./fs.js";
import { createLogger } from "./logger.js";

type SevenZipModule = {
    unpack(source: string, destination: string, callback: (error?: Error | null) => void): void;
};

let cachedModule: SevenZipModule | undefined;
type SevenZipLoader = () => Promise<SevenZipModule>;

const logger = createLogger("archive");

const defaultLoader: SevenZipLoader = async () => {
    if (!cachedModule) {
        cachedModule = await import("7zip-min");
    }
    return cachedModule;
};

let customLoader: SevenZipLoader | undefined;

async function loadSevenZip(): Promise<SevenZipModule> {
    if (customLoader) {
        return await customLoader();
    }
    return await defaultLoader();
}

async function unpack(source: string, destination: string): Promise<void> {
    const module = await loadSevenZip();

    try {
        await new Promise<void>((resolve, reject) => {
            module.unpack(source, destination, (error?: Error | null) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    } catch (error) {
        const errorDetails = [
            `7zip-min failed to extract archive ${path.basename(source)} to ${destination}`,
            `Error: ${error instanceof Error ? error.message : String(error)}`,
            `Source: ${source}`,
            `Destination: ${destination}`
        ].join('\n  ');

        throw new Error(errorDetails, { cause: error });
    }
}

/**
 * Extracts a gzip-compressed tar archive into `destination`.
 *
 * 7-Zip treats the gzip and tar layers as separate archives, so the inner
 * .tar is first unpacked into a private staging directory under the temp
 * root and removed once its contents are in place.
 */
export async function extractTarGzArchive(archivePath: string, destination: string): Promise<void> {
    await ensureDir(destination);
    const staging = await mkdtemp(path.join(getTmpDir(), "detfetch-extract-"));

    try {
        logger.debug(`Decompressing ${path.basename(archivePath)}`);
        await unpack(archivePath, staging);

        const entries = await readdir(staging);
        const tarball = entries.find((entry) => entry.toLowerCase().endsWith(".tar")) ?? entries[0];
        if (tarball === undefined) {
            throw new Error(`Archive ${path.basename(archivePath)} decompressed to nothing`);
        }

        logger.debug(`Unpacking ${tarball} to ${destination}`);
        await unpack(path.join(staging, tarball), destination);
    } finally {
        await rm(staging, { recursive: true, force: true });
    }
}

/* c8 ignore start */
export function __setSevenZipLoaderForTest(loader?: SevenZipLoader): void {
    cachedModule = undefined;
    customLoader = loader;
}
/* c8 ignore stop */
