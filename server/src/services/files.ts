import { assertAllowed, type Principal } from '../auth/policy.js';
import { notFound } from '../errors.js';
import { sanitizeFilename, type StorageService } from './storage.js';
import { FALLBACK_MIME_TYPE, IMAGE_MIME_TYPES } from '../../../shared/config.js';

export interface FileEntry {
    filename: string;
}

export interface FileContent {
    filename: string;
    contentType: string;
    body: ArrayBuffer;
}

// GET /image. Any verified principal, no ownership.
export async function listFiles(files: StorageService, requester: Principal | undefined): Promise<FileEntry[]> {
    assertAllowed('authenticated', requester);
    const names = await files.list();
    return names.map((filename) => ({ filename }));
}

// GET /image/:filename. Any verified principal, no ownership.
export async function readFile(
    files: StorageService,
    requester: Principal | undefined,
    requested: string,
): Promise<FileContent> {
    assertAllowed('authenticated', requester);

    const filename = sanitizeFilename(requested);
    if (!filename) throw notFound('Image not found');

    const body = await files.get(filename);
    if (!body) {
        console.warn(`[Files] Image not found: ${filename}`);
        throw notFound('Image not found');
    }

    const extension = filename.split('.').pop()?.toLowerCase() ?? '';
    return { filename, contentType: IMAGE_MIME_TYPES[extension] ?? FALLBACK_MIME_TYPE, body };
}
