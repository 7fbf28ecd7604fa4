import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".scan-tagger";
const CONFIG_FILENAME = "profiles.json";

/**
 * Home directory for state and config. SCAN_TAGGER_HOME wins over the OS home so that
 * services and tests can relocate everything at once.
 */
export function resolveRequiredHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.SCAN_TAGGER_HOME?.trim();
  if (override) {
    return path.resolve(expandHomePrefix(override, homedir()));
  }
  const home = homedir();
  if (!home) {
    throw new Error("Cannot determine the home directory; set SCAN_TAGGER_HOME");
  }
  return path.resolve(home);
}

function expandHomePrefix(input: string, home: string): string {
  if (input === "~") {
    return home;
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(home, input.slice(2));
  }
  return input;
}

function resolveUserPath(input: string, home: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  return path.resolve(expandHomePrefix(trimmed, home));
}

/**
 * State directory for profiles and other local data.
 * Can be overridden via SCAN_TAGGER_STATE_DIR.
 * Default: ~/.scan-tagger
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const home = resolveRequiredHomeDir(env, homedir);
  const override = env.SCAN_TAGGER_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, home);
  }
  return path.join(home, STATE_DIRNAME);
}

/**
 * Profiles file path (JSON).
 * Can be overridden via SCAN_TAGGER_CONFIG_PATH.
 * Default: ~/.scan-tagger/profiles.json
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.SCAN_TAGGER_CONFIG_PATH?.trim();
  if (override) {
    return resolveUserPath(override, resolveRequiredHomeDir(env, homedir));
  }
  return path.join(resolveStateDir(env, homedir), CONFIG_FILENAME);
}
