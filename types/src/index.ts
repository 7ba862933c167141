/**
 * Core entity types for taskledger
 */

/**
 * Namespaces are independent id domains. Each one owns an entity
 * directory and a ledger file under the store root.
 */
export type Namespace = "tasks" | "features" | "bugs";

export type EntityType = "task" | "bug_fix" | "feature";

export type EntityStatus = "pending" | "in_progress" | "completed" | "failed";

export type EntityPriority = "critical" | "high" | "medium" | "low";

/**
 * Entity identifier.
 *
 * Top-level entities carry a plain integer (`id: 42`); sub-entities are
 * addressed relative to their parent and persisted as a dotted string
 * (`id: "42.1"`).
 */
export type EntityId = TopLevelId | SubEntityId;

export interface TopLevelId {
  scope: "top";
  value: number;
}

export interface SubEntityId {
  scope: "sub";
  parent: EntityId;
  value: number;
}

export interface Entity {
  namespace: Namespace;
  id: EntityId;
  title: string;
  type: EntityType;
  status: EntityStatus;
  priority: EntityPriority;
  parent_task?: EntityId;
  dependencies: EntityId[];
  subsystems: string[];
  /** Free-text feature reference, informational only */
  feature?: string;
  created_at?: string;
  updated_at?: string;
  body: string;
}

/**
 * One line of an Index Ledger
 */
export interface IndexEntry {
  id: EntityId;
  title: string;
  status: EntityStatus;
  priority: EntityPriority;
}

export type HistoryEventType =
  | "created"
  | "updated"
  | "status_changed"
  | "reopened";

export interface HistoryEvent {
  namespace: Namespace;
  entity_id: string;
  event_type: HistoryEventType;
  old_value: string | null;
  new_value: string | null;
  comment: string | null;
  actor: string;
  created_at: string;
}

export interface Config {
  version: string;
  defaults?: {
    /** Priority given to new entities (default "medium") */
    priority?: EntityPriority;
  };
  history?: {
    /** Append lifecycle events to history.jsonl (default true) */
    enabled?: boolean;
    /** Actor recorded when none is given (default "taskledger") */
    actor?: string;
  };
}
