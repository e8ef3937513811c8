// fitsync - library entry point
export { loadConfig, type AppConfig } from "./config.js";
export * from "./errors.js";
export { createConnection, type DatabaseConnection } from "./db/connection.js";
export { runMigration } from "./db/migrate.js";
export {
  FitbitSourceClient,
  type SourceClient,
  type TokenRefreshCallback,
} from "./source/client.js";
export {
  FileCredentialStore,
  type CredentialStore,
} from "./source/credentials.js";
export * from "./services/sync/index.js";
export { ExportImporter } from "./services/export/importer.js";
export type * from "./types/index.js";
