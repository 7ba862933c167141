import * as fs from "fs";
import * as path from "path";
import type { Config, EntityPriority } from "@taskledger/types";
import { DEFAULT_ROOT_DIR, configPath } from "./layout.js";
import { isPlainObject, isValidPriority } from "./validation.js";
import { VERSION } from "./version.js";

export const ROOT_ENV_VAR = "TASKLEDGER_ROOT";

/**
 * Configuration with every default filled in
 */
export interface ResolvedConfig {
  version: string;
  defaultPriority: EntityPriority;
  historyEnabled: boolean;
  actor: string;
}

/**
 * Read config file (version-controlled). A missing file is created with
 * defaults.
 *
 * @throws Error when the file is not valid JSON or has ill-typed settings
 */
function readConfig(rootDir: string): Config {
  const filePath = configPath(rootDir);

  if (!fs.existsSync(filePath)) {
    const defaultConfig: Config = {
      version: VERSION,
    };
    if (fs.existsSync(rootDir)) {
      writeConfig(rootDir, defaultConfig);
    }
    return defaultConfig;
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return validateConfig(parsed, filePath);
}

function validateConfig(value: unknown, filePath: string): Config {
  const invalid = (detail: string): never => {
    throw new Error(`Invalid config ${filePath}: ${detail}`);
  };

  if (!isPlainObject(value)) {
    return invalid("expected a JSON object");
  }
  const config: Config = {
    version: typeof value.version === "string" ? value.version : VERSION,
  };

  if (value.defaults !== undefined) {
    if (!isPlainObject(value.defaults)) {
      return invalid("defaults must be an object");
    }
    const priority = value.defaults.priority;
    if (priority !== undefined) {
      if (typeof priority !== "string" || !isValidPriority(priority)) {
        return invalid(`unknown default priority "${String(priority)}"`);
      }
      config.defaults = { priority };
    }
  }

  if (value.history !== undefined) {
    if (!isPlainObject(value.history)) {
      return invalid("history must be an object");
    }
    const { enabled, actor } = value.history;
    const history: NonNullable<Config["history"]> = {};
    if (enabled !== undefined) {
      if (typeof enabled !== "boolean") {
        return invalid("history.enabled must be a boolean");
      }
      history.enabled = enabled;
    }
    if (actor !== undefined) {
      if (typeof actor !== "string") {
        return invalid("history.actor must be a string");
      }
      history.actor = actor;
    }
    config.history = history;
  }

  return config;
}

/**
 * Write config file (version-controlled)
 */
function writeConfig(rootDir: string, config: Config): void {
  fs.writeFileSync(
    configPath(rootDir),
    JSON.stringify(config, null, 2) + "\n",
    "utf8"
  );
}

/**
 * Get current config
 */
export function getConfig(rootDir: string): Config {
  return readConfig(rootDir);
}

export function resolveConfig(rootDir: string): ResolvedConfig {
  const config = readConfig(rootDir);
  return {
    version: config.version,
    defaultPriority: config.defaults?.priority ?? "medium",
    historyEnabled: config.history?.enabled ?? true,
    actor: config.history?.actor ?? "taskledger",
  };
}

/**
 * Find the store root: `explicit`, then $TASKLEDGER_ROOT, then the nearest
 * .fstrent_spec_tasks directory at or above `cwd`. Falls back to
 * `cwd/.fstrent_spec_tasks` when none exists yet.
 */
export function findStoreRoot(
  cwd: string = process.cwd(),
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (explicit) {
    return path.resolve(cwd, explicit);
  }
  const fromEnv = env[ROOT_ENV_VAR];
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }

  let currentDir = path.resolve(cwd);
  const root = path.parse(currentDir).root;
  while (true) {
    const candidate = path.join(currentDir, DEFAULT_ROOT_DIR);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
    if (currentDir === root) break;
    currentDir = path.dirname(currentDir);
  }

  return path.join(path.resolve(cwd), DEFAULT_ROOT_DIR);
}
