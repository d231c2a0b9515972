import fs from "fs";
import os from "os";
import path from "path";
import { ConfigurationError, describeError } from "../helpers/errors";
import { isRecord } from "../helpers/frontMatter";
import { createLogger } from "../helpers/logger";
import { BackendName } from "../types";
import MarkdownStore from "./MarkdownStore";
import SqliteStore, { DATABASE_FILE_NAME } from "./SqliteStore";
import { Store } from "./Store";

const pino = createLogger("SettingsManager");

const APP_DIR_NAME = "feedkeeper";
const SETTINGS_FILE_NAME = "config.json";

const BACKENDS: readonly BackendName[] = ["sqlite", "markdown"];

interface StoredSettings {
  backend?: string;
  data_dir?: string;
}

export interface SettingsManagerOptions {
  env?: NodeJS.ProcessEnv;
}

function isBackendName(value: string): value is BackendName {
  return BACKENDS.some((backend) => backend === value);
}

/**
 * Reads the user's config file, choosing and saving first-run defaults
 * when there is none, and opens the store it names.
 */
export default class SettingsManager {
  private static instance: SettingsManager | undefined;

  private readonly settings: StoredSettings;

  private readonly settingsFilePath: string;

  private readonly env: NodeJS.ProcessEnv;

  constructor(options: SettingsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.settingsFilePath = path.join(this.configHome(), APP_DIR_NAME, SETTINGS_FILE_NAME);

    if (fs.existsSync(this.settingsFilePath)) {
      this.settings = this.loadSettings();
      pino.debug({ path: this.settingsFilePath }, "Settings loaded from disk");
    } else {
      this.settings = this.firstRunSettings();
      this.saveSettings();
    }
  }

  public static getInstance(): SettingsManager {
    if (!SettingsManager.instance) {
      SettingsManager.instance = new SettingsManager();
    }
    return SettingsManager.instance;
  }

  /** Expands a leading `~` to the home directory. */
  public static expandPath(value: string, home: string): string {
    if (value === "~") {
      return home;
    }
    if (value.startsWith("~/")) {
      return path.join(home, value.slice(2));
    }
    return value;
  }

  public static openStoreAt(backend: BackendName, dataDir: string): Store {
    return backend === "sqlite"
      ? new SqliteStore(path.join(dataDir, DATABASE_FILE_NAME))
      : new MarkdownStore(dataDir);
  }

  public getConfigPath(): string {
    return this.settingsFilePath;
  }

  public getBackend(): BackendName {
    const backend = this.settings.backend || "sqlite";
    if (!isBackendName(backend)) {
      throw new ConfigurationError(
        `unknown backend "${backend}" in ${this.settingsFilePath}: expected "sqlite" or "markdown"`
      );
    }
    return backend;
  }

  public getDataDir(): string {
    return this.settings.data_dir ? this.resolvePath(this.settings.data_dir) : this.defaultDataDir();
  }

  /** Expands `~` against this manager's home directory. */
  public resolvePath(value: string): string {
    return SettingsManager.expandPath(value, this.home());
  }

  public openStore(): Store {
    const backend = this.getBackend();
    const dataDir = this.getDataDir();
    pino.debug({ backend, dataDir }, "Opening store");
    return SettingsManager.openStoreAt(backend, dataDir);
  }

  private home(): string {
    return this.env.HOME || os.homedir();
  }

  private configHome(): string {
    return this.env.XDG_CONFIG_HOME || path.join(this.home(), ".config");
  }

  private defaultDataDir(): string {
    const dataHome = this.env.XDG_DATA_HOME || path.join(this.home(), ".local", "share");
    return path.join(dataHome, APP_DIR_NAME);
  }

  private loadSettings(): StoredSettings {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.settingsFilePath, "utf-8"));
    } catch (err) {
      throw new ConfigurationError(
        `cannot read ${this.settingsFilePath}: ${describeError(err)}`,
        { cause: err }
      );
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`${this.settingsFilePath} must contain a JSON object`);
    }

    const settings: StoredSettings = {};
    for (const key of ["backend", "data_dir"] as const) {
      const value = parsed[key];
      if (value === undefined) {
        continue;
      }
      if (typeof value !== "string") {
        throw new ConfigurationError(`"${key}" in ${this.settingsFilePath} must be a string`);
      }
      settings[key] = value;
    }
    return settings;
  }

  /** Existing database users stay on sqlite; everyone else starts on markdown. */
  private firstRunSettings(): StoredSettings {
    const legacyDatabase = path.join(this.defaultDataDir(), DATABASE_FILE_NAME);
    const backend: BackendName = fs.existsSync(legacyDatabase) ? "sqlite" : "markdown";
    pino.debug({ backend }, "No settings file, using first-run defaults");
    return { backend };
  }

  private saveSettings(): void {
    try {
      fs.mkdirSync(path.dirname(this.settingsFilePath), { recursive: true });
      fs.writeFileSync(this.settingsFilePath, `${JSON.stringify(this.settings, null, 2)}\n`);
      pino.debug("Settings saved to disk");
    } catch (error) {
      pino.warn({ err: error }, "Failed to save settings");
    }
  }
}
