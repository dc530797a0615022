import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { parse as parseToml } from "smol-toml";
import { ConfigError } from "../errors.js";
import { describeError, errorCode } from "../logger.js";
import type { Logger } from "../logger.js";
import { validateConfigFile } from "./config-validator.js";
import { loadDefaultPatterns } from "./default-patterns.js";
import { CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE } from "./types.js";
import type { ConfigFile, KekConfig, LoadConfigOptions } from "./types.js";

export interface ConfigLocation {
  readonly path: string;
  /** True when the path came from the environment rather than the default. */
  readonly explicit: boolean;
}

export function resolveConfigPath(options: LoadConfigOptions = {}): ConfigLocation {
  const workingDir = options.workingDir ?? process.cwd();
  const fromEnv = (options.env ?? process.env)[CONFIG_ENV_VAR];
  if (fromEnv) {
    return { path: path.resolve(workingDir, fromEnv), explicit: true };
  }
  return { path: path.resolve(workingDir, DEFAULT_CONFIG_FILE), explicit: false };
}

/**
 * Load the configuration file, falling back to built-in defaults when it
 * does not exist. Anything wrong with a file that does exist is a
 * `ConfigError`.
 */
export async function loadConfig(
  logger: Logger,
  options: LoadConfigOptions = {},
): Promise<KekConfig> {
  const location = resolveConfigPath(options);
  const file = await readConfigFile(location, logger);
  const defaults = await loadDefaultPatterns();

  return {
    scan: file?.scan ?? ["."],
    category: {
      docs: file?.category?.docs ?? defaults.docs,
      src: file?.category?.src ?? defaults.src,
    },
    source: file ? location.path : null,
  };
}

async function readConfigFile(
  location: ConfigLocation,
  logger: Logger,
): Promise<ConfigFile | null> {
  let raw: string;
  try {
    raw = await fs.readFile(location.path, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      if (location.explicit) {
        logger.warn(
          `Config file ${location.path} from ${CONFIG_ENV_VAR} not found. Using defaults.`,
        );
      }
      return null;
    }
    throw new ConfigError(
      `Failed to read config file ${location.path}: ${describeError(error)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parseConfigText(raw, location.path);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse configuration file ${location.path}: ${describeError(error)}`,
    );
  }

  try {
    return validateConfigFile(parsed);
  } catch (error) {
    throw new ConfigError(
      `Invalid configuration file ${location.path}: ${describeError(error)}`,
    );
  }
}

function parseConfigText(raw: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") {
    return yaml.load(raw);
  }
  return parseToml(raw);
}
