import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './app.js';
import { CONFIG } from './config.js';
import { openDb } from './db/index.js';
import { ensureAdmin } from './db/seed.js';
import { LocalStorageService } from './services/storage.js';

async function main() {
  const db = openDb(CONFIG.DB_URL);

  if (CONFIG.ADMIN_NAME && CONFIG.ADMIN_PASSWORD) {
    await ensureAdmin(db, { name: CONFIG.ADMIN_NAME, email: CONFIG.ADMIN_EMAIL, password: CONFIG.ADMIN_PASSWORD });
  }

  const app = createApp({
    db,
    files: new LocalStorageService(CONFIG.FILES_DIR),
    uploads: new LocalStorageService(CONFIG.UPLOAD_DIR),
  });

  console.log(`[Boot] Files: ${CONFIG.FILES_DIR}`);
  console.log(`[Boot] Uploads: ${CONFIG.UPLOAD_DIR}`);
  console.log(`Server is running on port ${CONFIG.PORT}`);

  serve({
    fetch: app.fetch,
    port: CONFIG.PORT,
  });
}

main().catch((e) => {
  console.error('[Boot] Failed to start', e);
  process.exitCode = 1;
});
