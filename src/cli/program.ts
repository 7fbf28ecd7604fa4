import { Command } from "commander";
import type { CatalogApi } from "../catalog/types.js";
import type { ExifCodec, ReconcileProgressEvent } from "../photo/types.js";
import type { ReadlinePrompter } from "./prompt.js";
import { createCatalogClient } from "../catalog/client.js";
import { CatalogError } from "../catalog/errors.js";
import {
  DEFAULT_PROFILE,
  type Profile,
  type ProfileStore,
  createProfileStore,
  ensureProfile,
} from "../config/profiles.js";
import { createSubsystemLogger, setLogLevel } from "../logging/subsystem.js";
import { formatDiff, formatRunSummary } from "../photo/diff-report.js";
import { createExifCodec } from "../photo/exif-codec.js";
import { reconcileFiles } from "../photo/reconcile.js";
import { VERSION } from "../version.js";
import { createReadlinePrompter } from "./prompt.js";

const log = createSubsystemLogger("cli");

export type TagCommandOptions = {
  file?: string;
  auto?: boolean;
  yes?: boolean;
  dryRun?: boolean;
  profile: string;
  verbose?: boolean;
};

/** Collaborators of the tag command; tests swap them for in-process fakes. */
export type TagCommandDeps = {
  store?: ProfileStore;
  createPrompter?: () => ReadlinePrompter;
  createCatalog?: (profile: Profile) => CatalogApi;
  createCodec?: () => ExifCodec & { close(): Promise<void> };
  write?: (text: string) => void;
};

/**
 * Run one tagging pass over the given files. Resolves to the process exit code:
 * 1 when any file could not be read, fetched or written, else 0. Configuration and
 * credential problems reject.
 */
export async function runTagCommand(
  files: readonly string[],
  options: TagCommandOptions,
  deps: TagCommandDeps = {},
): Promise<number> {
  const write = deps.write ?? ((text: string) => console.log(text));
  if (options.verbose) {
    setLogLevel("debug");
  }

  const targets = [...(options.file ? [options.file] : []), ...files];
  if (targets.length === 0) {
    write("No files given");
    return 0;
  }

  const prompter = (deps.createPrompter ?? createReadlinePrompter)();
  const codec = (deps.createCodec ?? createExifCodec)();
  try {
    const store = deps.store ?? createProfileStore();
    const profile = await ensureProfile(store, options.profile, prompter);
    const catalog = (deps.createCatalog ?? createCatalogClient)(profile);

    if (!(await catalog.testCredentials())) {
      throw new CatalogError(
        "unauthorized",
        `Credentials for profile '${options.profile}' were rejected by ${profile.server}`,
      );
    }
    log.info(`Credentials OK for ${profile.server}`);

    const onProgress = (event: ReconcileProgressEvent) => {
      if (event.type === "reconcile.file.start") {
        write(`Processing ${event.file} (${event.index + 1}/${event.total})`);
      } else if (event.type === "reconcile.diff") {
        write(formatDiff(event.diff, event.desired));
      } else if (event.type === "reconcile.file.done" && event.outcome.status === "unchanged") {
        write(`${event.outcome.file} is up to date`);
      }
    };

    const summary = await reconcileFiles(
      targets,
      { catalog, codec, prompter },
      { auto: options.auto ?? false, yes: options.yes ?? false, dry_run: options.dryRun ?? false },
      onProgress,
    );
    write(formatRunSummary(summary));
    return summary.totals.error > 0 || summary.totals.fetch_failed > 0 ? 1 : 0;
  } finally {
    prompter.close();
    await codec.close();
  }
}

export function buildProgram(deps: TagCommandDeps = {}): Command {
  const program = new Command();
  program
    .name("scan-tagger")
    .description("Write catalog metadata for film scans into their EXIF tags")
    .version(VERSION, "-V, --version")
    .argument("[files...]", "image files to tag")
    .option("-f, --file <path>", "image file to be tagged")
    .option("-a, --auto", "never prompt to identify scans, only guess from the filename")
    .option("-y, --yes", "accept all changes")
    .option("-d, --dry-run", "show the changes without writing any tags")
    .option("-p, --profile <name>", "catalog connection profile", DEFAULT_PROFILE)
    .option("--verbose", "log debug output")
    .action(async (files: string[], options: TagCommandOptions) => {
      process.exitCode = await runTagCommand(files, options, deps);
    });
  return program;
}
