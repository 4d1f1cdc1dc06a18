import type { DB } from './db/index.js';
import type { Principal } from './auth/policy.js';
import type { StorageService } from './services/storage.js';

/** Collaborators handed to every request by the context middleware. */
export interface AppDeps {
  db: DB;
  /** Flat file namespace served under `/image`. */
  files: StorageService;
  /** Bytes of uploaded image resources. */
  uploads: StorageService;
}

// Hono environment shared by the app, the middleware and every route module
export type AppEnv = {
  Variables: AppDeps & {
    principal?: Principal;
  };
};
