import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { EngineConfig } from "@numdrill/types";
import { StoredConfigSchema, StoredConfig } from "./schema";

const SETTINGS_DIR_NAME = ".numdrill";
const CONFIG_FILE = "config.json";

export function resolveSettingsDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.NUMDRILL_HOME || path.join(homedir(), SETTINGS_DIR_NAME);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class SettingsStorage {
  private dir: string;

  constructor(dir: string = resolveSettingsDir()) {
    this.dir = dir;
  }

  get configPath(): string {
    return path.join(this.dir, CONFIG_FILE);
  }

  async loadConfig(): Promise<StoredConfig | null> {
    let raw: string;
    try {
      raw = await readFile(this.configPath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null; // First run
      console.warn(`[Storage] Could not read ${this.configPath}:`, error);
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      console.warn(`[Storage] ${this.configPath} is not valid JSON, using defaults`);
      return null;
    }

    const result = StoredConfigSchema.safeParse(data);
    if (!result.success) {
      console.warn(`[Storage] Ignoring invalid settings in ${this.configPath}:`, result.error.issues);
      return null;
    }
    return result.data;
  }

  async saveConfig(config: EngineConfig): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.configPath, JSON.stringify(config, null, 2) + "\n", "utf8");
  }
}

export const storage = new SettingsStorage();
