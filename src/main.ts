import { describeError } from "./helpers/errors";
import { createLogger } from "./helpers/logger";
import FeedUpdater, { FeedUpdateResult, FeedUpdaterDependencies } from "./modules/FeedUpdater";
import SettingsManager from "./modules/SettingsManager";
import { Store, feedDisplayName } from "./modules/Store";
import { isDirNonEmpty, migrateData } from "./modules/StoreMigrator";
import { BackendName } from "./types";
import { VERSION } from "./version";

const pino = createLogger("main");

const USAGE = `Usage: feedkeeper <command> [options]

Commands:
  add <url> [--folder=<name>] [--title=<title>] [--no-discover]
      Subscribe to a feed, discovering it from a web page if needed.
  fetch [url] [--force]
      Fetch new entries from every feed, or from the feed with this URL.
  migrate --to=<sqlite|markdown> [--data-dir=<dir>] [--force]
      Copy all feeds and entries into another storage backend.
  version
      Print the version.
`;

export interface Output {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: Output;
  stderr: Output;
}

export interface CliContext {
  settings?: SettingsManager;
  updater?: FeedUpdaterDependencies;
  signal?: AbortSignal;
}

interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

class UsageError extends Error {}

function parseArgs(args: string[], allowedFlags: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (const arg of args) {
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const separator = arg.indexOf("=");
    const name = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    if (!allowedFlags.includes(name)) {
      throw new UsageError(`unknown option --${name}`);
    }
    flags.set(name, separator === -1 ? true : arg.slice(separator + 1));
  }

  return { positionals, flags };
}

function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  if (value === true) {
    throw new UsageError(`--${name} needs a value: --${name}=<value>`);
  }
  return value;
}

function isBackendName(value: string): value is BackendName {
  return value === "sqlite" || value === "markdown";
}

function withStore<T>(settings: SettingsManager, fn: (store: Store) => Promise<T>): Promise<T> {
  const store = settings.openStore();
  return fn(store).finally(() => store.close());
}

function describeResult(result: FeedUpdateResult): string {
  if (result.status === "error") {
    return `✗ ${result.error ?? "failed"}`;
  }
  if (result.status === "cached") {
    return "- cached";
  }
  return result.newEntries > 0 ? `✓ ${result.newEntries} new` : "✓ no new entries";
}

async function fetchCommand(args: string[], io: CliIO, context: CliContext): Promise<number> {
  const parsed = parseArgs(args, ["force"]);
  if (parsed.positionals.length > 1) {
    throw new UsageError("fetch takes at most one feed URL");
  }
  const url = parsed.positionals.at(0);
  const settings = context.settings ?? SettingsManager.getInstance();

  return withStore(settings, async (store) => {
    if (store.listFeeds().length === 0) {
      io.stdout.write("No feeds found. Add a feed with 'feedkeeper add <url>'\n");
      return 0;
    }

    const updater = new FeedUpdater(store, context.updater);
    const summary = await updater.updateFeeds({
      url,
      force: parsed.flags.has("force"),
      signal: context.signal,
      onResult: (result) => {
        io.stdout.write(`Syncing ${feedDisplayName(result.feed)}... ${describeResult(result)}\n`);
      },
    });

    io.stdout.write(`\nSummary: ${summary.total} feed(s) synced\n`);
    if (summary.newEntries > 0) {
      io.stdout.write(`  ✓ ${summary.newEntries} new entries\n`);
    }
    if (summary.cached > 0) {
      io.stdout.write(`  - ${summary.cached} cached (not modified)\n`);
    }
    if (summary.errors > 0) {
      io.stdout.write(`  ✗ ${summary.errors} errors\n`);
      return 1;
    }
    return 0;
  });
}

async function addCommand(args: string[], io: CliIO, context: CliContext): Promise<number> {
  const parsed = parseArgs(args, ["folder", "title", "no-discover"]);
  if (parsed.positionals.length !== 1) {
    throw new UsageError("add takes exactly one URL");
  }
  const [url] = parsed.positionals;
  const folder = stringFlag(parsed, "folder");
  const settings = context.settings ?? SettingsManager.getInstance();

  return withStore(settings, async (store) => {
    const updater = new FeedUpdater(store, context.updater);
    const feed = await updater.subscribe(url, {
      folder,
      title: stringFlag(parsed, "title"),
      discover: !parsed.flags.has("no-discover"),
      signal: context.signal,
    });

    if (feed.url !== url) {
      io.stdout.write(`Found feed: ${feed.url}\n`);
    }
    const where = folder ? ` to folder '${folder}'` : "";
    io.stdout.write(`Added feed${where}: ${feedDisplayName(feed)}\n`);
    io.stdout.write(`Feed ID: ${feed.id}\n`);
    return 0;
  });
}

async function migrateCommand(args: string[], io: CliIO, context: CliContext): Promise<number> {
  const parsed = parseArgs(args, ["to", "data-dir", "force"]);
  if (parsed.positionals.length > 0) {
    throw new UsageError("migrate takes no arguments");
  }
  const target = stringFlag(parsed, "to");
  if (target === undefined) {
    throw new UsageError("migrate needs --to=<sqlite|markdown>");
  }
  if (!isBackendName(target)) {
    throw new UsageError(`invalid target backend "${target}": must be "sqlite" or "markdown"`);
  }

  const settings = context.settings ?? SettingsManager.getInstance();
  const sourceBackend = settings.getBackend();
  if (target === sourceBackend) {
    throw new UsageError(`target backend "${target}" is the same as the current backend`);
  }

  const dataDirFlag = stringFlag(parsed, "data-dir");
  const targetDir = dataDirFlag ? settings.resolvePath(dataDirFlag) : settings.getDataDir();
  if (isDirNonEmpty(targetDir) && !parsed.flags.has("force")) {
    throw new UsageError(`target directory "${targetDir}" is not empty; use --force to overwrite`);
  }

  return withStore(settings, async (source) => {
    const destination = SettingsManager.openStoreAt(target, targetDir);
    try {
      io.stdout.write("Migrating feed data:\n");
      io.stdout.write(`  Source:  ${sourceBackend} (${settings.getDataDir()})\n`);
      io.stdout.write(`  Target:  ${target} (${targetDir})\n\n`);

      const summary = migrateData(source, destination);

      io.stdout.write("Migration complete!\n");
      io.stdout.write(`  Feeds:   ${summary.feeds}\n`);
      io.stdout.write(`  Entries: ${summary.entries}\n\n`);
      io.stdout.write("Note: the config file was NOT updated. To switch to the new backend, edit:\n");
      io.stdout.write(`  ${settings.getConfigPath()}\n`);
      const dataDirHint = dataDirFlag ? ` and "data_dir": ${JSON.stringify(dataDirFlag)}` : "";
      io.stdout.write(`  Set "backend": ${JSON.stringify(target)}${dataDirHint}\n`);
      return 0;
    } finally {
      destination.close();
    }
  });
}

/** Runs one command and returns the process exit code. */
export async function run(
  argv: string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr },
  context: CliContext = {}
): Promise<number> {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case "fetch":
        return await fetchCommand(args, io, context);
      case "add":
        return await addCommand(args, io, context);
      case "migrate":
        return await migrateCommand(args, io, context);
      case "version":
      case "--version":
        io.stdout.write(`feedkeeper ${VERSION}\n`);
        return 0;
      case "help":
      case "--help":
        io.stdout.write(USAGE);
        return 0;
      case undefined:
        io.stderr.write(USAGE);
        return 1;
      default:
        throw new UsageError(`unknown command "${command}"`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr.write(`Error: ${err.message}\n\n${USAGE}`);
      return 1;
    }
    if (context.signal?.aborted) {
      io.stderr.write("Interrupted\n");
      return 1;
    }
    pino.debug({ err, command }, "Command failed");
    io.stderr.write(`Error: ${describeError(err)}\n`);
    return 1;
  }
}

export function main(): void {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  void run(process.argv.slice(2), undefined, { signal: controller.signal }).then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      pino.fatal({ err }, "Unhandled failure");
      process.exitCode = 1;
    }
  );
}

if (require.main === module) {
  main();
}
