import { promises as fs } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import { env } from './config/env';
import { errorMessage } from './lib/errors';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const EXTENSION = '.json.gz';

/**
 * Compress a string
 */
export async function compress(data: string): Promise<Buffer> {
    return gzipAsync(Buffer.from(data, 'utf8'));
}

/**
 * Decompress to a string
 */
export async function decompress(data: Buffer): Promise<string> {
    const raw = await gunzipAsync(data);
    return raw.toString('utf8');
}

export function cacheFileName(key: string): string {
    return `${key.replace(/[^A-Za-z0-9._-]+/g, '_')}${EXTENSION}`;
}

export interface FileCacheOptions {
    dir?: string;
    /** Entries older than this are ignored; 0 turns the cache off. */
    ttlMs?: number;
    now?: () => number;
}

/**
 * Gzip-compressed JSON documents on disk, one file per key.
 */
export class FileCache {
    readonly dir: string;
    readonly ttlMs: number;
    private readonly now: () => number;

    constructor(options: FileCacheOptions = {}) {
        this.dir = options.dir ?? env.cacheDir;
        this.ttlMs = options.ttlMs ?? env.cacheTtlMs;
        this.now = options.now ?? Date.now;
    }

    get enabled(): boolean {
        return this.ttlMs > 0;
    }

    pathFor(key: string): string {
        return path.join(this.dir, cacheFileName(key));
    }

    /**
     * The stored document, or undefined when missing, expired or unreadable.
     */
    async get(key: string): Promise<unknown> {
        if (!this.enabled) return undefined;

        const file = this.pathFor(key);
        const stat = await fs.stat(file).catch((error: unknown) => {
            if (isMissingFile(error)) return null;
            throw error;
        });
        if (!stat) return undefined;

        if (this.now() - stat.mtimeMs > this.ttlMs) {
            console.log(`[FileCache] Expired: ${key}`);
            return undefined;
        }

        try {
            const json = await decompress(await fs.readFile(file));
            return JSON.parse(json);
        } catch (error) {
            console.warn(`[FileCache] Unreadable entry ${key}, discarding:`, errorMessage(error));
            await fs.rm(file, { force: true });
            return undefined;
        }
    }

    async put(key: string, value: unknown): Promise<void> {
        if (!this.enabled) return;

        await fs.mkdir(this.dir, { recursive: true });
        await fs.writeFile(this.pathFor(key), await compress(JSON.stringify(value)));
    }

    async clear(): Promise<void> {
        let files: string[];
        try {
            files = await fs.readdir(this.dir);
        } catch (error) {
            if (isMissingFile(error)) return;
            throw error;
        }
        await Promise.all(files.filter((f) => f.endsWith(EXTENSION)).map((f) => fs.rm(path.join(this.dir, f))));
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
