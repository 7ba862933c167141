/**
 * Shared terminal and JSON rendering for command handlers
 */

import chalk from "chalk";
import type { Entity, EntityStatus } from "@taskledger/types";
import { formatId } from "../entity-id.js";
import type { Violation } from "../errors.js";

/**
 * Entity with ids in their textual form, for --json output
 */
export interface EntityJSON {
  namespace: string;
  id: string;
  title: string;
  type: string;
  status: string;
  priority: string;
  parent_task: string | null;
  dependencies: string[];
  subsystems: string[];
  feature: string | null;
  created_at: string | null;
  updated_at: string | null;
  body: string;
}

export function toEntityJSON(entity: Entity): EntityJSON {
  return {
    namespace: entity.namespace,
    id: formatId(entity.id),
    title: entity.title,
    type: entity.type,
    status: entity.status,
    priority: entity.priority,
    parent_task: entity.parent_task ? formatId(entity.parent_task) : null,
    dependencies: entity.dependencies.map(formatId),
    subsystems: entity.subsystems,
    feature: entity.feature ?? null,
    created_at: entity.created_at ?? null,
    updated_at: entity.updated_at ?? null,
    body: entity.body,
  };
}

export function statusColor(status: EntityStatus): (text: string) => string {
  switch (status) {
    case "completed":
      return chalk.green;
    case "in_progress":
      return chalk.yellow;
    case "failed":
      return chalk.red;
    default:
      return chalk.gray;
  }
}

export function printViolation(v: Violation): void {
  const where = v.id ? chalk.cyan(v.id) : chalk.gray("-");
  console.log(`  ${chalk.red(v.code)} ${where} ${v.message}`);
  if (v.paths && v.paths.length > 0) {
    for (const p of v.paths) {
      console.log(chalk.gray(`    ${p}`));
    }
  }
}

/**
 * Print a failure the way every handler does and exit with status 1
 */
export function fail(action: string, error: unknown): void {
  console.error(chalk.red(`✗ ${action}`));
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
