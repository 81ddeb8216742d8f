export { SettingsStorage, resolveSettingsDir, storage } from "./store";
export { EngineConfigSchema, MAX_WINDOW_RADIUS, StoredConfigSchema } from "./schema";
export type { StoredConfig } from "./schema";
