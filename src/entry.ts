#!/usr/bin/env node
import { CatalogError } from "./catalog/errors.js";
import { emitCliBanner } from "./cli/banner.js";
import { buildProgram } from "./cli/program.js";
import { ConfigError } from "./config/profiles.js";
import { VERSION } from "./version.js";

emitCliBanner(VERSION);

try {
  await buildProgram().parseAsync(process.argv);
} catch (err) {
  if (err instanceof CatalogError || err instanceof ConfigError) {
    console.error(`error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
}
