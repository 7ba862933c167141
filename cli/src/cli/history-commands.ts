/**
 * CLI handler for the history command
 */

import chalk from "chalk";
import { formatId } from "../entity-id.js";
import {
  parseCount,
  parseIdArg,
  parseNamespace,
  type CommandContext,
} from "./args.js";
import { fail } from "./output.js";

export interface HistoryOptions {
  ns?: string;
  limit?: string;
}

export async function handleHistory(
  ctx: CommandContext,
  idText: string | undefined,
  options: HistoryOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const entityId = idText ? formatId(parseIdArg(idText)) : undefined;
    const limit = options.limit !== undefined ? parseCount(options.limit, "--limit", 1) : 50;

    const events = await ctx.coordinator.history.read({ namespace, entityId });
    const shown = events.slice(-limit);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(shown, null, 2));
      return;
    }

    if (shown.length === 0) {
      console.log(chalk.gray("No history recorded"));
      return;
    }

    for (const event of shown) {
      const change =
        event.old_value !== null
          ? `${event.old_value} → ${event.new_value ?? ""}`
          : event.new_value ?? "";
      console.log(
        chalk.gray(event.created_at),
        chalk.cyan(event.entity_id),
        event.event_type,
        change,
        chalk.gray(`@${event.actor}`)
      );
      if (event.comment) {
        console.log(chalk.gray(`  ${event.comment}`));
      }
    }
  } catch (error) {
    fail("Failed to read history", error);
  }
}
