#!/usr/bin/env node

/**
 * taskledger CLI - consistent task, feature and bug files for every tool
 */

import { Command } from "commander";
import chalk from "chalk";
import { findStoreRoot } from "./config.js";
import { createCoordinator, type ConsistencyCoordinator } from "./coordinator.js";

// Import command handlers
import {
  handleCreate,
  handleList,
  handleShow,
  handleUpdate,
  handleStatus,
  handleReopen,
} from "./cli/entity-commands.js";
import { handleReady, handleBlocked } from "./cli/query-commands.js";
import {
  handleValidate,
  handleReconcile,
  handleRebuild,
} from "./cli/ledger-commands.js";
import { handleHistory } from "./cli/history-commands.js";
import { handleWatch } from "./cli/watch-commands.js";
import { handleInit } from "./cli/init-commands.js";
import type { CommandContext } from "./cli/args.js";
import { VERSION } from "./version.js";

// Global state
let coordinator: ConsistencyCoordinator | null = null;
let rootDir: string = "";
let jsonOutput: boolean = false;

/**
 * Open the store found from --root, TASKLEDGER_ROOT or the working directory
 */
function initCoordinator() {
  try {
    coordinator = createCoordinator(rootDir, {
      onLog: (message) => {
        if (!jsonOutput) console.log(chalk.gray(message));
      },
      onWarn: (message) => console.error(chalk.yellow(`⚠ ${message}`)),
    });
  } catch (error) {
    console.error(chalk.red("Error: Failed to open task store"));
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Get command context
 */
function getContext(): CommandContext {
  if (!coordinator) {
    console.error(chalk.red("Error: Task store not opened"));
    process.exit(1);
  }
  return { coordinator, rootDir, jsonOutput };
}

// Create main program
const program = new Command();

program
  .name("taskledger")
  .description("taskledger - keep .fstrent_spec_tasks consistent across tools")
  .version(VERSION)
  .option("--root <path>", "Task store directory (default: auto-discover)")
  .option("--json", "Output in JSON format")
  .hook("preAction", (_thisCommand: Command, actionCommand: Command) => {
    const opts = actionCommand.optsWithGlobals();
    rootDir = findStoreRoot(
      process.cwd(),
      typeof opts.root === "string" ? opts.root : undefined
    );
    if (opts.json) jsonOutput = true;

    // init creates the store, so there is nothing to open yet
    if (actionCommand.name() !== "init") {
      initCoordinator();
    }
  });

// ============================================================================
// INIT COMMAND
// ============================================================================

program
  .command("init")
  .description("Create the task store layout, config and empty ledgers")
  .action(async () => {
    await handleInit({ rootDir, jsonOutput });
  });

// ============================================================================
// ENTITY COMMANDS
// ============================================================================

program
  .command("create <title>")
  .description("Create a task, feature or bug")
  .option("-n, --ns <namespace>", "Namespace (tasks, features, bugs)", "tasks")
  .option("-t, --type <type>", "Entity type")
  .option("-p, --priority <priority>", "Priority (critical, high, medium, low)")
  .option("-d, --description <desc>", "Body text")
  .option("--parent <id>", "Parent id (creates a sub-entity)")
  .option("--deps <ids>", "Comma-separated dependency ids")
  .option("--subsystems <names>", "Comma-separated subsystems")
  .option("--feature <name>", "Feature name")
  .option("--actor <name>", "Actor recorded in history")
  .action(async (title, options) => {
    await handleCreate(getContext(), title, options);
  });

program
  .command("list")
  .description("List entities in file order")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .option("-s, --status <status>", "Filter by status")
  .option("-p, --priority <priority>", "Filter by priority")
  .option("-g, --grep <query>", "Search by title or body")
  .action(async (options) => {
    await handleList(getContext(), options);
  });

program
  .command("show <id>")
  .description("Show entity details")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .action(async (id, options) => {
    await handleShow(getContext(), id, options);
  });

program
  .command("update <id>")
  .description("Update entity fields (an empty --parent or --feature clears it)")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .option("--title <title>", "New title")
  .option("-t, --type <type>", "New type")
  .option("-p, --priority <priority>", "New priority")
  .option("-d, --description <desc>", "New body text")
  .option("--deps <ids>", "New comma-separated dependency ids")
  .option("--subsystems <names>", "New comma-separated subsystems")
  .option("--parent <id>", "New parent id")
  .option("--feature <name>", "New feature name")
  .option("--actor <name>", "Actor recorded in history")
  .action(async (id, options) => {
    await handleUpdate(getContext(), id, options);
  });

program
  .command("status <id> <status>")
  .description("Move an entity to a new status")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .option("-c, --comment <text>", "Comment recorded in history")
  .option("--actor <name>", "Actor recorded in history")
  .action(async (id, status, options) => {
    await handleStatus(getContext(), id, status, options);
  });

program
  .command("reopen <id>")
  .description("Move a completed or failed entity back to pending")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .option("-r, --reason <text>", "Reason recorded in history")
  .option("--actor <name>", "Actor recorded in history")
  .action(async (id, options) => {
    await handleReopen(getContext(), id, options);
  });

// ============================================================================
// QUERY COMMANDS
// ============================================================================

program
  .command("ready")
  .description("Show pending entities whose dependencies are completed")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .action(async (options) => {
    await handleReady(getContext(), options);
  });

program
  .command("blocked")
  .description("Show entities waiting on unfinished dependencies")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .action(async (options) => {
    await handleBlocked(getContext(), options);
  });

// ============================================================================
// LEDGER COMMANDS
// ============================================================================

program
  .command("validate")
  .description("Check ids, references, cycles and dependency gates")
  .option("-n, --ns <namespace>", "Namespace or all", "all")
  .action(async (options) => {
    await handleValidate(getContext(), options);
  });

program
  .command("reconcile")
  .description("Compare ledgers with entity files")
  .option("-n, --ns <namespace>", "Namespace or all", "all")
  .option("--repair", "Rewrite drifted ledgers from the entity files")
  .action(async (options) => {
    await handleReconcile(getContext(), options);
  });

program
  .command("rebuild")
  .description("Regenerate ledgers from the entity files")
  .option("-n, --ns <namespace>", "Namespace or all", "all")
  .action(async (options) => {
    await handleRebuild(getContext(), options);
  });

program
  .command("history [id]")
  .description("Show recorded lifecycle events")
  .option("-n, --ns <namespace>", "Namespace", "tasks")
  .option("--limit <num>", "Show the last N events", "50")
  .action(async (id, options) => {
    await handleHistory(getContext(), id, options);
  });

program
  .command("watch")
  .description("Update ledgers as entity files change")
  .option("-n, --ns <namespace>", "Namespace or all", "all")
  .option("--debounce <ms>", "Quiet period before applying changes", "200")
  .action(async (options) => {
    await handleWatch(getContext(), options);
  });

// Parse arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red("✗ Command failed"));
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
