/**
 * CLI handlers for init command
 */

import chalk from "chalk";
import * as fs from "fs";
import { getConfig } from "../config.js";
import { configPath, entityDir, ledgerPath } from "../layout.js";
import { IndexLedger } from "../ledger.js";
import { EntityStore } from "../store.js";
import { NAMESPACES } from "../vocabulary.js";
import { fail } from "./output.js";

export interface InitOptions {
  rootDir: string;
  jsonOutput?: boolean;
}

/**
 * Check if a task store is initialized in a directory
 */
export function isInitialized(rootDir: string): boolean {
  return (
    fs.existsSync(configPath(rootDir)) &&
    NAMESPACES.every((ns) => fs.existsSync(entityDir(rootDir, ns)))
  );
}

/**
 * Create the store layout. Existing files are preserved; ledgers are only
 * written where missing.
 */
export function performInitialization(rootDir: string): {
  created: string[];
  preserved: string[];
} {
  const created: string[] = [];
  const preserved: string[] = [];

  fs.mkdirSync(rootDir, { recursive: true });
  const hadConfig = fs.existsSync(configPath(rootDir));
  getConfig(rootDir);
  (hadConfig ? preserved : created).push("config.json");

  const ledger = new IndexLedger(new EntityStore(rootDir));
  for (const ns of NAMESPACES) {
    fs.mkdirSync(entityDir(rootDir, ns), { recursive: true });
    const file = ledgerPath(rootDir, ns);
    if (fs.existsSync(file)) {
      preserved.push(file);
    } else {
      ledger.rebuild(ns);
      created.push(file);
    }
  }

  return { created, preserved };
}

export async function handleInit(options: InitOptions): Promise<void> {
  try {
    const { created, preserved } = performInitialization(options.rootDir);

    if (options.jsonOutput) {
      console.log(
        JSON.stringify({ rootDir: options.rootDir, created, preserved }, null, 2)
      );
      return;
    }

    console.log(chalk.green("✓ Initialized task store in"), chalk.cyan(options.rootDir));
    if (preserved.length > 0) {
      console.log(chalk.gray(`  Preserved: ${preserved.join(", ")}`));
    }
  } catch (error) {
    fail("Failed to initialize", error);
  }
}
