/**
 * On-disk layout of a task store
 */

import * as path from "path";
import type { EntityType, Namespace } from "@taskledger/types";

export const DEFAULT_ROOT_DIR = ".fstrent_spec_tasks";

export interface NamespaceLayout {
  namespace: Namespace;
  /** Ledger file name, relative to the store root */
  ledgerFile: string;
  /** Entity directory, relative to the store root */
  directory: string;
  /** Entity file name prefix, e.g. "task" for task12_setup.md */
  filePrefix: string;
  /** Entity type given to new entities when none is specified */
  defaultType: EntityType;
  /** Top-level heading of the ledger document */
  heading: string;
}

const LAYOUTS: Record<Namespace, NamespaceLayout> = {
  tasks: {
    namespace: "tasks",
    ledgerFile: "TASKS.md",
    directory: "tasks",
    filePrefix: "task",
    defaultType: "task",
    heading: "Tasks",
  },
  features: {
    namespace: "features",
    ledgerFile: "PLAN.md",
    directory: "features",
    filePrefix: "feature",
    defaultType: "feature",
    heading: "Plan",
  },
  bugs: {
    namespace: "bugs",
    ledgerFile: "BUGS.md",
    directory: "bugs",
    filePrefix: "bug",
    defaultType: "bug_fix",
    heading: "Bugs",
  },
};

export function getLayout(namespace: Namespace): NamespaceLayout {
  return LAYOUTS[namespace];
}

export function entityDir(rootDir: string, namespace: Namespace): string {
  return path.join(rootDir, LAYOUTS[namespace].directory);
}

export function ledgerPath(rootDir: string, namespace: Namespace): string {
  return path.join(rootDir, LAYOUTS[namespace].ledgerFile);
}

export function historyPath(rootDir: string): string {
  return path.join(rootDir, "history.jsonl");
}

export function configPath(rootDir: string): string {
  return path.join(rootDir, "config.json");
}
