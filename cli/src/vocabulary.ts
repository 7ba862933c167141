/**
 * Value lists of the entity enums, for runtime checks and ordering
 */

import type {
  EntityPriority,
  EntityStatus,
  EntityType,
  Namespace,
} from "@taskledger/types";

export const NAMESPACES: readonly Namespace[] = ["tasks", "features", "bugs"];

export const ENTITY_TYPES: readonly EntityType[] = ["task", "bug_fix", "feature"];

/**
 * Ledger section order
 */
export const ENTITY_STATUSES: readonly EntityStatus[] = [
  "pending",
  "in_progress",
  "completed",
  "failed",
];

/**
 * Most urgent first
 */
export const ENTITY_PRIORITIES: readonly EntityPriority[] = [
  "critical",
  "high",
  "medium",
  "low",
];
