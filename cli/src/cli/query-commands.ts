/**
 * CLI handlers for query commands (ready, blocked)
 */

import chalk from "chalk";
import { formatId } from "../entity-id.js";
import { parseNamespace, type CommandContext } from "./args.js";
import { fail, toEntityJSON } from "./output.js";

export interface QueryOptions {
  ns?: string;
}

export async function handleReady(
  ctx: CommandContext,
  options: QueryOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const ready = ctx.coordinator.ready(namespace);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(ready.map(toEntityJSON), null, 2));
    } else {
      if (ready.length === 0) {
        console.log(chalk.gray(`\nNo ready ${namespace}`));
      } else {
        console.log(chalk.bold(`\nReady ${namespace} (${ready.length}):\n`));
        for (const entity of ready) {
          console.log(chalk.cyan(formatId(entity.id)), entity.title);
          console.log(chalk.gray(`  Priority: ${entity.priority}`));
        }
      }
      console.log();
    }
  } catch (error) {
    fail("Failed to get ready items", error);
  }
}

export async function handleBlocked(
  ctx: CommandContext,
  options: QueryOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const blocked = ctx.coordinator.blocked(namespace);

    if (ctx.jsonOutput) {
      console.log(
        JSON.stringify(
          blocked.map((b) => ({
            ...toEntityJSON(b.entity),
            blocking: b.blocking.map(formatId),
          })),
          null,
          2
        )
      );
    } else {
      if (blocked.length === 0) {
        console.log(chalk.gray(`\nNo blocked ${namespace}`));
      } else {
        console.log(chalk.bold(`\nBlocked ${namespace} (${blocked.length}):\n`));
        for (const { entity, blocking } of blocked) {
          console.log(chalk.cyan(formatId(entity.id)), entity.title);
          console.log(
            chalk.gray(`  Waiting on: ${blocking.map(formatId).join(", ")}`)
          );
        }
      }
      console.log();
    }
  } catch (error) {
    fail("Failed to get blocked items", error);
  }
}
