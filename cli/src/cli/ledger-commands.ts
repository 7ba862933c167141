/**
 * CLI handlers for consistency commands (validate, reconcile, rebuild)
 */

import chalk from "chalk";
import type { Namespace } from "@taskledger/types";
import type { ReconcileReport, RepairResult } from "../coordinator.js";
import type { Violation } from "../errors.js";
import { getLayout } from "../layout.js";
import { parseNamespaces, type CommandContext } from "./args.js";
import { fail, printViolation } from "./output.js";

export interface ValidateOptions {
  ns?: string;
}

export async function handleValidate(
  ctx: CommandContext,
  options: ValidateOptions
): Promise<void> {
  let total = 0;
  try {
    const namespaces = parseNamespaces(options.ns);
    const results = namespaces.map((namespace) => ({
      namespace,
      violations: ctx.coordinator.validateAll(namespace).violations,
    }));
    total = results.reduce((n, r) => n + r.violations.length, 0);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(results, null, 2));
    } else {
      for (const { namespace, violations } of results) {
        if (violations.length === 0) {
          console.log(chalk.green("✓"), `${namespace}: no problems found`);
          continue;
        }
        console.log(
          chalk.red("✗"),
          `${namespace}: ${violations.length} problem(s)`
        );
        violations.forEach(printViolation);
      }
    }
  } catch (error) {
    fail("Failed to validate", error);
    return;
  }

  if (total > 0) {
    process.exit(1);
  }
}

export interface ReconcileOptions {
  ns?: string;
  repair?: boolean;
}

interface ReconcileOutput {
  namespace: Namespace;
  consistent: boolean;
  entityCount: number;
  ledgerEntryCount: number | null;
  repairable: Violation[];
  conflicts: Violation[];
  repair?: { mode: RepairResult["mode"]; repaired: number };
}

function summarize(report: ReconcileReport): ReconcileOutput {
  return {
    namespace: report.namespace,
    consistent: report.consistent,
    entityCount: report.entityCount,
    ledgerEntryCount: report.ledgerEntryCount,
    repairable: report.findings
      .filter((f) => f.repairable)
      .map((f) => f.error.toViolation()),
    conflicts: report.findings
      .filter((f) => !f.repairable)
      .map((f) => f.error.toViolation()),
  };
}

export async function handleReconcile(
  ctx: CommandContext,
  options: ReconcileOptions
): Promise<void> {
  let unresolved = false;
  try {
    const outputs: ReconcileOutput[] = [];

    for (const namespace of parseNamespaces(options.ns)) {
      const report = ctx.coordinator.reconcile(namespace);
      const before = summarize(report);

      if (options.repair) {
        const result = ctx.coordinator.repair(namespace, report);
        outputs.push({
          ...summarize(result.after),
          repair: { mode: result.mode, repaired: result.repaired },
        });
        if (!ctx.jsonOutput) {
          printReconcile(before);
        }
      } else {
        outputs.push(before);
        if (!ctx.jsonOutput) {
          printReconcile(before);
        }
      }
    }

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(outputs, null, 2));
    }

    unresolved = outputs.some((o) =>
      options.repair ? o.conflicts.length > 0 : !o.consistent
    );
  } catch (error) {
    fail("Failed to reconcile", error);
    return;
  }

  if (unresolved) {
    process.exit(1);
  }
}

// The repair itself is reported through the coordinator's onLog
function printReconcile(before: ReconcileOutput): void {
  if (before.consistent) {
    console.log(
      chalk.green("✓"),
      `${before.namespace}: ${before.entityCount} entities, ledger in sync`
    );
    return;
  }

  console.log(chalk.yellow("!"), `${before.namespace}:`);
  if (before.repairable.length > 0) {
    console.log(chalk.bold(`  Drift (${before.repairable.length}):`));
    before.repairable.forEach(printViolation);
  }
  if (before.conflicts.length > 0) {
    console.log(
      chalk.bold(`  Conflicts needing manual resolution (${before.conflicts.length}):`)
    );
    before.conflicts.forEach(printViolation);
  }
}

export interface RebuildOptions {
  ns?: string;
}

export async function handleRebuild(
  ctx: CommandContext,
  options: RebuildOptions
): Promise<void> {
  try {
    const results = parseNamespaces(options.ns).map((namespace) => {
      const doc = ctx.coordinator.ledger.rebuild(namespace);
      return {
        namespace,
        ledger: getLayout(namespace).ledgerFile,
        entries: doc.entries.length,
      };
    });

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(results, null, 2));
    } else {
      for (const r of results) {
        console.log(chalk.green("✓ Rebuilt"), r.ledger, chalk.gray(`(${r.entries} entries)`));
      }
    }
  } catch (error) {
    fail("Failed to rebuild ledger", error);
  }
}
