/**
 * CLI handler for the watch command
 */

import chalk from "chalk";
import { startWatcher } from "../watcher.js";
import { parseCount, parseNamespaces, type CommandContext } from "./args.js";
import { fail } from "./output.js";

export interface WatchOptions {
  ns?: string;
  debounce?: string;
}

export async function handleWatch(
  ctx: CommandContext,
  options: WatchOptions
): Promise<void> {
  try {
    const namespaces = parseNamespaces(options.ns ?? "all");
    const debounceMs =
      options.debounce !== undefined
        ? parseCount(options.debounce, "--debounce")
        : undefined;
    const control = startWatcher({
      coordinator: ctx.coordinator,
      namespaces,
      debounceMs,
      onLog: (message) => console.log(chalk.gray(message)),
      onError: (error) => console.error(chalk.red(`✗ ${error.message}`)),
    });

    console.log(chalk.green("✓ Watching for changes"), chalk.gray("(Ctrl+C to stop)"));

    await new Promise<void>((resolve) => {
      process.once("SIGINT", () => {
        control
          .stop()
          .then(() => {
            const stats = control.getStats();
            console.log(
              chalk.gray(
                `\nStopped: ${stats.changesProcessed} changes, ${stats.batchesApplied} ledger updates, ${stats.errors} errors`
              )
            );
          })
          .catch((error: unknown) => fail("Failed to stop watcher", error))
          .finally(resolve);
      });
    });
  } catch (error) {
    fail("Failed to start watcher", error);
  }
}
