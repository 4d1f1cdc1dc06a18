/**
 * Device Forge Shared Configuration
 */

/** Page size used by listing endpoints when `limit` is omitted. */
export const DEFAULT_PAGE_LIMIT = 100;

/** Largest `limit` a listing endpoint accepts. */
export const MAX_PAGE_LIMIT = 1000;

/** Largest image upload accepted [bytes]. */
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

/** Largest multipart upload request accepted: the image plus framing and metadata [bytes]. */
export const MAX_UPLOAD_BODY_BYTES = MAX_IMAGE_BYTES + 64 * 1024;

/** Default bcrypt cost factor for stored credentials. */
export const DEFAULT_BCRYPT_ROUNDS = 12;

/** Longest credential accepted [UTF-8 bytes]; bcrypt ignores anything past this. */
export const PASSWORD_MAX_BYTES = 72;

/** Realm announced in `WWW-Authenticate` challenges. */
export const AUTH_REALM = 'device-forge';

/** Content types of the image formats accepted for upload, by extension. */
export const IMAGE_MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
};

/** Content type served for files whose extension is not an image format. */
export const FALLBACK_MIME_TYPE = 'application/octet-stream';
