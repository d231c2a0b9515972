import fs from "fs";
import path from "path";
import { makeTempDir } from "../testing/fixtures";
import MarkdownStore from "./MarkdownStore";
import SettingsManager from "./SettingsManager";
import SqliteStore from "./SqliteStore";

describe("SettingsManager", () => {
  let root: string;
  let env: NodeJS.ProcessEnv;
  let configPath: string;

  beforeEach(() => {
    root = makeTempDir("settings");
    env = {
      HOME: path.join(root, "home"),
      XDG_CONFIG_HOME: path.join(root, "config"),
      XDG_DATA_HOME: path.join(root, "data"),
    };
    configPath = path.join(root, "config", "feedkeeper", "config.json");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const writeConfig = (content: string) => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, content);
  };

  it("writes markdown defaults on first run", () => {
    const manager = new SettingsManager({ env });

    expect(manager.getConfigPath()).toBe(configPath);
    expect(manager.getBackend()).toBe("markdown");
    expect(manager.getDataDir()).toBe(path.join(root, "data", "feedkeeper"));
    expect(JSON.parse(fs.readFileSync(configPath, "utf-8"))).toEqual({
      backend: "markdown",
    });
  });

  it("keeps sqlite for an existing database on first run", () => {
    const dataDir = path.join(root, "data", "feedkeeper");
    fs.mkdirSync(dataDir, { recursive: true });
    fs.writeFileSync(path.join(dataDir, "feedkeeper.db"), "");

    const manager = new SettingsManager({ env });

    expect(manager.getBackend()).toBe("sqlite");
    expect(JSON.parse(fs.readFileSync(configPath, "utf-8"))).toEqual({
      backend: "sqlite",
    });
  });

  it("falls back to HOME when XDG directories are unset", () => {
    const manager = new SettingsManager({ env: { HOME: env.HOME } });

    expect(manager.getConfigPath()).toBe(
      path.join(root, "home", ".config", "feedkeeper", "config.json")
    );
    expect(manager.getDataDir()).toBe(
      path.join(root, "home", ".local", "share", "feedkeeper")
    );
  });

  it("reads the backend and expands a home-relative data dir", () => {
    writeConfig(JSON.stringify({ backend: "sqlite", data_dir: "~/feeds" }));

    const manager = new SettingsManager({ env });

    expect(manager.getBackend()).toBe("sqlite");
    expect(manager.getDataDir()).toBe(path.join(root, "home", "feeds"));
  });

  it("defaults to sqlite when the file names no backend", () => {
    writeConfig("{}");

    expect(new SettingsManager({ env }).getBackend()).toBe("sqlite");
  });

  it("rejects an unknown backend", () => {
    writeConfig(JSON.stringify({ backend: "postgres" }));
    const manager = new SettingsManager({ env });

    expect(() => manager.getBackend()).toThrow(`unknown backend "postgres" in ${configPath}`);
  });

  it("rejects a file that is not a JSON object", () => {
    writeConfig("[1, 2]");

    expect(() => new SettingsManager({ env })).toThrow(
      `${configPath} must contain a JSON object`
    );
  });

  it("rejects malformed JSON and non-string fields", () => {
    writeConfig("{ backend: ");
    expect(() => new SettingsManager({ env })).toThrow(`cannot read ${configPath}`);

    writeConfig(JSON.stringify({ data_dir: 42 }));
    expect(() => new SettingsManager({ env })).toThrow(
      `"data_dir" in ${configPath} must be a string`
    );
  });

  it("expands only a leading tilde", () => {
    expect(SettingsManager.expandPath("~", "/home/u")).toBe("/home/u");
    expect(SettingsManager.expandPath("~/a/b", "/home/u")).toBe(path.join("/home/u", "a/b"));
    expect(SettingsManager.expandPath("/srv/~data", "/home/u")).toBe("/srv/~data");
    expect(SettingsManager.expandPath("~other/x", "/home/u")).toBe("~other/x");
  });

  it("opens the configured backend in the data dir", () => {
    const dataDir = path.join(root, "store");
    writeConfig(JSON.stringify({ backend: "sqlite", data_dir: dataDir }));

    const sqlite = new SettingsManager({ env }).openStore();
    try {
      expect(sqlite).toBeInstanceOf(SqliteStore);
      expect(fs.existsSync(path.join(dataDir, "feedkeeper.db"))).toBe(true);
    } finally {
      sqlite.close();
    }

    writeConfig(JSON.stringify({ backend: "markdown", data_dir: dataDir }));
    const markdown = new SettingsManager({ env }).openStore();
    expect(markdown).toBeInstanceOf(MarkdownStore);
    markdown.close();
  });

  it("returns the same singleton instance", () => {
    const previous = process.env.XDG_CONFIG_HOME;
    process.env.XDG_CONFIG_HOME = path.join(root, "config");
    try {
      const instanceA = SettingsManager.getInstance();
      const instanceB = SettingsManager.getInstance();

      expect(instanceA).toBe(instanceB);
    } finally {
      if (previous === undefined) {
        delete process.env.XDG_CONFIG_HOME;
      } else {
        process.env.XDG_CONFIG_HOME = previous;
      }
    }
  });
});
