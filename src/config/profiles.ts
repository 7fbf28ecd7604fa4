import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Prompter } from "../photo/types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { resolveConfigPath } from "./paths.js";

const log = createSubsystemLogger("config");

export const DEFAULT_PROFILE = "prod";
export const DEFAULT_SERVER = "https://camerahub.info/api";

const ProfileSchema = Type.Object({
  server: Type.String({ minLength: 1 }),
  username: Type.String(),
  password: Type.String(),
});

const ProfilesFileSchema = Type.Object({
  profiles: Type.Record(Type.String(), ProfileSchema),
});

export type Profile = Static<typeof ProfileSchema>;
export type ProfilesFile = Static<typeof ProfilesFileSchema>;

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export type ProfileStore = {
  readonly configPath: string;
  load(): ProfilesFile;
  getProfile(name: string): Profile | undefined;
  saveProfile(name: string, profile: Profile): void;
};

export function createProfileStore(
  opts: { env?: NodeJS.ProcessEnv; homedir?: () => string } = {},
): ProfileStore {
  const configPath = resolveConfigPath(opts.env ?? process.env, opts.homedir ?? os.homedir);

  const load = (): ProfilesFile => {
    let raw: string;
    try {
      raw = fs.readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { profiles: {} };
      }
      throw new ConfigError(configPath, `Cannot read ${configPath}`, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(configPath, `${configPath} is not valid JSON`, { cause: err });
    }
    if (!Value.Check(ProfilesFileSchema, parsed)) {
      const first = Value.Errors(ProfilesFileSchema, parsed).First();
      throw new ConfigError(
        configPath,
        `${configPath} is invalid${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`,
      );
    }
    return parsed;
  };

  return {
    configPath,
    load,
    getProfile(name) {
      return load().profiles[name];
    },
    saveProfile(name, profile) {
      const file = load();
      file.profiles[name] = profile;
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(file, null, 2) + "\n", { mode: 0o600 });
      log.info(`Saved profile '${name}' to ${configPath}`);
    },
  };
}

/**
 * Return the named profile, asking for server and credentials and saving them
 * when it does not exist yet.
 */
export async function ensureProfile(
  store: ProfileStore,
  name: string,
  prompter: Prompter,
): Promise<Profile> {
  const existing = store.getProfile(name);
  if (existing) {
    return existing;
  }
  log.info(`Profile '${name}' not found in ${store.configPath}, creating it`);
  const server =
    (
      await prompter.text(
        `Enter catalog server for profile '${name}' (default ${DEFAULT_SERVER}): `,
        DEFAULT_SERVER,
      )
    ).trim() || DEFAULT_SERVER;
  const username = (await prompter.text(`Enter username for ${server}: `)).trim();
  const password = await prompter.secret(`Enter password for ${server}: `);
  const profile: Profile = { server, username, password };
  store.saveProfile(name, profile);
  return profile;
}
