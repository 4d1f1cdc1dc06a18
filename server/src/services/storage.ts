import { readFile, writeFile, readdir, mkdir, unlink } from 'fs/promises';
import { join, resolve, sep } from 'path';

export interface StorageService {
    /** File contents, or `null` when no regular file exists under `key`. */
    get(key: string): Promise<ArrayBuffer | null>;
    put(key: string, data: ArrayBuffer): Promise<void>;
    delete(key: string): Promise<void>;
    /** Names of the regular files at the top level, sorted. */
    list(): Promise<string[]>;
}

function errorCode(e: unknown): string | undefined {
    return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

const MISSING_CODES = new Set(['ENOENT', 'EISDIR', 'ENOTDIR']);

// Path separators, characters reserved on common filesystems, and control characters.
const RESERVED_CHARS = /[\/\\?%*:|"<>\x00-\x1f\x7f]/g;

/**
 * Reduce a client-supplied name to a single path segment of the flat namespace.
 * Returns an empty string when nothing usable is left.
 */
export function sanitizeFilename(name: string): string {
    // Truncate by code point so a surrogate pair is never split.
    const cleaned = Array.from(name.replace(RESERVED_CHARS, '').trim())
        .slice(0, 255)
        .join('')
        .replace(/[. ]+$/, '');
    return cleaned === '.' || cleaned === '..' ? '' : cleaned;
}

// Local File System Storage (Node.js)
export class LocalStorageService implements StorageService {
    private storageDir: string;

    constructor(storageDir: string) {
        this.storageDir = resolve(storageDir);
    }

    private pathFor(key: string): string {
        const path = resolve(join(this.storageDir, key));
        if (!path.startsWith(this.storageDir + sep)) {
            throw new Error(`[LocalStorage] Key escapes storage directory: ${key}`);
        }
        return path;
    }

    async get(key: string): Promise<ArrayBuffer | null> {
        try {
            const buffer = await readFile(this.pathFor(key));
            const copy = new ArrayBuffer(buffer.byteLength);
            new Uint8Array(copy).set(buffer);
            return copy;
        } catch (e) {
            if (MISSING_CODES.has(errorCode(e) ?? '')) return null;
            throw e;
        }
    }

    async put(key: string, data: ArrayBuffer): Promise<void> {
        const path = this.pathFor(key);
        try {
            await mkdir(this.storageDir, { recursive: true });
            await writeFile(path, new Uint8Array(data));
        } catch (e) {
            console.error(`[LocalStorage] Failed to put ${key}`, e);
            throw e;
        }
    }

    async delete(key: string): Promise<void> {
        try {
            await unlink(this.pathFor(key));
        } catch (e) {
            if (errorCode(e) !== 'ENOENT') throw e;
        }
    }

    async list(): Promise<string[]> {
        try {
            const entries = await readdir(this.storageDir, { withFileTypes: true });
            return entries
                .filter((entry) => entry.isFile())
                .map((entry) => entry.name)
                .sort();
        } catch (e) {
            if (errorCode(e) === 'ENOENT') return [];
            throw e;
        }
    }
}
