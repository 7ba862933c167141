/**
 * Consistency Coordinator
 *
 * The only component that reasons about relationships between entities.
 * It validates edits against the whole namespace, sweeps the store against
 * the ledger, and owns every mutating path so that each write is followed
 * by a ledger update and an audit event.
 */

import * as path from "path";
import type {
  Entity,
  EntityId,
  EntityPriority,
  EntityStatus,
  EntityType,
  IndexEntry,
  Namespace,
} from "@taskledger/types";
import { resolveConfig } from "./config.js";
import { compareIds, formatId, idsEqual, impliedParent } from "./entity-id.js";
import {
  CycleError,
  DanglingReferenceError,
  DependencyNotSatisfiedError,
  DriftError,
  DuplicateIdError,
  EntityNotFoundError,
  InvalidTransitionError,
  ParseError,
  type TaskLedgerError,
  type Violation,
} from "./errors.js";
import { generateEntityFilename } from "./filename-generator.js";
import {
  cycleThrough,
  dependencyGraph,
  findAllCycles,
  parentGraph,
  toIds,
} from "./graph.js";
import { HistoryLog } from "./history.js";
import { entityDir, getLayout } from "./layout.js";
import { IndexLedger, ledgerTitle, type DeltaResult } from "./ledger.js";
import {
  INITIAL_STATUS,
  isAllowedTransition,
  isReopen,
  isTerminal,
} from "./lifecycle.js";
import { canonicalBody } from "./markdown.js";
import { EntityStore, type StoredEntity } from "./store.js";

export interface ValidationContext {
  /**
   * Current entities of the namespace. Defaults to the store content.
   */
  entities?: Entity[];
  /**
   * The entity as it was before the edit. Absent for a new entity.
   */
  previous?: Entity | null;
  /**
   * The edit is an explicit reopen
   */
  reopen?: boolean;
}

export interface ValidationResult {
  valid: boolean;
  errors: TaskLedgerError[];
  violations: Violation[];
}

export interface ReconcileFinding {
  error: TaskLedgerError;
  /**
   * Drift the ledger can be regenerated to fix. Anything else needs a
   * person to look at the entity files.
   */
  repairable: boolean;
}

export interface ReconcileReport {
  namespace: Namespace;
  entityCount: number;
  /** Null when the ledger is missing or corrupt */
  ledgerEntryCount: number | null;
  findings: ReconcileFinding[];
  consistent: boolean;
}

export interface RepairResult {
  namespace: Namespace;
  mode: "none" | DeltaResult["mode"];
  repaired: number;
  /** Reconcile report taken after the repair */
  after: ReconcileReport;
}

export interface BlockedEntity {
  entity: Entity;
  blocking: EntityId[];
}

export interface CreateEntityInput {
  namespace: Namespace;
  title: string;
  id?: EntityId;
  parent?: EntityId;
  type?: EntityType;
  status?: EntityStatus;
  priority?: EntityPriority;
  dependencies?: EntityId[];
  subsystems?: string[];
  feature?: string;
  body?: string;
}

export interface EntityPatch {
  title?: string;
  type?: EntityType;
  priority?: EntityPriority;
  body?: string;
  dependencies?: EntityId[];
  subsystems?: string[];
  /** null removes the parent */
  parent_task?: EntityId | null;
  /** null removes the feature reference */
  feature?: string | null;
}

export interface MutationOptions {
  actor?: string;
  comment?: string;
}

export interface CoordinatorOptions {
  store: EntityStore;
  ledger?: IndexLedger;
  history?: HistoryLog;
  defaultPriority?: EntityPriority;
  onLog?: (message: string) => void;
  onWarn?: (message: string) => void;
  now?: () => Date;
}

export class ConsistencyCoordinator {
  readonly store: EntityStore;
  readonly ledger: IndexLedger;
  readonly history: HistoryLog;
  private readonly defaultPriority: EntityPriority;
  private readonly onLog: (message: string) => void;
  private readonly now: () => Date;

  constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.onLog = options.onLog ?? console.log;
    this.now = options.now ?? (() => new Date());
    this.ledger =
      options.ledger ??
      new IndexLedger(options.store, { onWarn: options.onWarn });
    this.history =
      options.history ??
      new HistoryLog(options.store.rootDir, { now: this.now });
    this.defaultPriority = options.defaultPriority ?? "medium";
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  /**
   * Check one entity against the rest of its namespace. All problems are
   * collected; nothing is thrown.
   */
  validate(entity: Entity, context: ValidationContext = {}): ValidationResult {
    const ns = entity.namespace;
    const stored = context.entities
      ? context.entities.map((e) => ({ entity: e, path: this.expectedPath(e) }))
      : this.store.scan(ns).entities;
    const previous = context.previous ?? null;
    const errors: TaskLedgerError[] = [];

    // The namespace as it would be after the edit
    const sameId = stored.filter((s) => idsEqual(s.entity.id, entity.id));
    const others = stored.filter((s) => !idsEqual(s.entity.id, entity.id));
    const world = [...others.map((s) => s.entity), entity];
    const byId = new Map(world.map((e) => [formatId(e.id), e]));

    // Status transition and dependency gate
    const from = previous ? previous.status : INITIAL_STATUS;
    if (from !== entity.status) {
      if (previous && isReopen(from, entity.status)) {
        if (!context.reopen) {
          errors.push(
            new InvalidTransitionError(
              ns,
              entity.id,
              from,
              entity.status,
              "use reopen"
            )
          );
        }
      } else if (!isAllowedTransition(from, entity.status)) {
        errors.push(
          new InvalidTransitionError(ns, entity.id, from, entity.status)
        );
      }
    }
    if (entity.status === "in_progress" && from !== "in_progress") {
      const blocking = unmetDependencies(entity, byId);
      if (blocking.length > 0) {
        errors.push(new DependencyNotSatisfiedError(ns, entity.id, blocking));
      }
    }

    // Uniqueness
    const allowed = previous ? 1 : 0;
    if (sameId.length > allowed) {
      errors.push(
        new DuplicateIdError(ns, entity.id, [
          ...sameId.map((s) => ({ path: s.path, title: s.entity.title })),
          ...(previous
            ? []
            : [{ path: this.expectedPath(entity), title: entity.title }]),
        ])
      );
    }

    // Parent linkage
    const parentRef = entity.parent_task ?? impliedParent(entity.id);
    if (parentRef) {
      if (idsEqual(parentRef, entity.id)) {
        errors.push(
          new CycleError(ns, entity.id, "parent_task", [entity.id, entity.id])
        );
      } else if (!byId.has(formatId(parentRef))) {
        errors.push(
          new DanglingReferenceError(ns, entity.id, "parent_task", parentRef)
        );
      } else {
        const cycle = cycleThrough(parentGraph(world), formatId(entity.id));
        if (cycle) {
          errors.push(
            new CycleError(ns, entity.id, "parent_task", toIds(cycle))
          );
        }
      }
    }

    // Dependencies
    for (const dep of entity.dependencies) {
      if (!byId.has(formatId(dep))) {
        errors.push(
          new DanglingReferenceError(ns, entity.id, "dependencies", dep)
        );
      }
    }
    const depCycle = cycleThrough(dependencyGraph(world), formatId(entity.id));
    if (depCycle) {
      errors.push(
        new CycleError(ns, entity.id, "dependencies", toIds(depCycle))
      );
    }

    return toResult(errors);
  }

  /**
   * Validate every entity of a namespace, including files that do not
   * parse. Each cycle is reported once.
   */
  validateAll(namespace: Namespace): ValidationResult {
    const { entities, unreadable } = this.store.scan(namespace);
    const errors: TaskLedgerError[] = unreadable.map((u) => u.error);
    const world = entities.map((s) => s.entity);
    const byId = new Map(world.map((e) => [formatId(e.id), e]));

    errors.push(...duplicateErrors(namespace, entities));

    for (const entity of world) {
      const parentRef = entity.parent_task ?? impliedParent(entity.id);
      if (
        parentRef &&
        !idsEqual(parentRef, entity.id) &&
        !byId.has(formatId(parentRef))
      ) {
        errors.push(
          new DanglingReferenceError(namespace, entity.id, "parent_task", parentRef)
        );
      }
      for (const dep of entity.dependencies) {
        if (!byId.has(formatId(dep))) {
          errors.push(
            new DanglingReferenceError(namespace, entity.id, "dependencies", dep)
          );
        }
      }
      if (entity.status === "in_progress") {
        const blocking = unmetDependencies(entity, byId);
        if (blocking.length > 0) {
          errors.push(
            new DependencyNotSatisfiedError(namespace, entity.id, blocking)
          );
        }
      }
    }

    for (const [field, graph] of [
      ["parent_task", parentGraph(world)],
      ["dependencies", dependencyGraph(world)],
    ] as const) {
      for (const cycle of findAllCycles(graph)) {
        const ids = toIds(cycle);
        errors.push(new CycleError(namespace, ids[0], field, ids));
      }
    }

    return toResult(errors);
  }

  // ==========================================================================
  // RECONCILE
  // ==========================================================================

  /**
   * Compare the entity files of a namespace with its ledger
   */
  reconcile(namespace: Namespace): ReconcileReport {
    const { entities, unreadable } = this.store.scan(namespace);
    const findings: ReconcileFinding[] = [];
    const conflict = (error: TaskLedgerError) =>
      findings.push({ error, repairable: false });
    const drift = (error: DriftError, repairable = true) =>
      findings.push({ error, repairable });

    for (const file of unreadable) {
      conflict(file.error);
    }
    const duplicates = duplicateErrors(namespace, entities);
    duplicates.forEach(conflict);
    const duplicateIds = new Set(duplicates.map((d) => d.entityId));

    let ledgerEntries: IndexEntry[] | null = null;
    const ledgerFile = getLayout(namespace).ledgerFile;
    try {
      const doc = this.ledger.read(namespace);
      if (doc) {
        ledgerEntries = doc.entries;
      } else if (entities.length > 0) {
        drift(
          new DriftError(
            namespace,
            null,
            "ledger_missing",
            `${ledgerFile} is missing (${entities.length} entities)`
          )
        );
      }
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      drift(
        new DriftError(
          namespace,
          null,
          "ledger_corrupt",
          `${ledgerFile} is corrupt: ${error.message}`
        )
      );
    }

    if (ledgerEntries) {
      const stored = groupBy(entities, (s) => formatId(s.entity.id));
      const listed = groupBy(ledgerEntries, (e) => formatId(e.id));
      const unreadableIds = new Set(
        unreadable.flatMap((u) => (u.filenameId ? [formatId(u.filenameId)] : []))
      );

      for (const [id, lines] of listed) {
        const matches = stored.get(id) ?? [];
        if (matches.length === 0) {
          drift(
            new DriftError(
              namespace,
              id,
              "orphan_entry",
              `${ledgerFile} lists ${id} "${lines[0].title}" but no entity file holds it`
            ),
            !unreadableIds.has(id)
          );
        } else if (lines.length > matches.length) {
          drift(
            new DriftError(
              namespace,
              id,
              "orphan_entry",
              `${ledgerFile} lists ${id} ${lines.length} times`,
              undefined,
              String(matches.length),
              String(lines.length)
            )
          );
        }
      }

      for (const [id, matches] of stored) {
        const lines = listed.get(id) ?? [];
        if (lines.length < matches.length) {
          const entity = matches[0].entity;
          drift(
            new DriftError(
              namespace,
              id,
              "missing_entry",
              `${ledgerFile} has no line for ${id} "${ledgerTitle(entity.title)}"`
            )
          );
          continue;
        }
        if (duplicateIds.has(id) || lines.length !== 1) continue;

        const entity = matches[0].entity;
        const line = lines[0];
        const expected = {
          title: ledgerTitle(entity.title),
          status: entity.status,
          priority: entity.priority,
        };
        for (const field of ["title", "status", "priority"] as const) {
          if (line[field] !== expected[field]) {
            drift(
              new DriftError(
                namespace,
                id,
                "stale_field",
                `${ledgerFile} line for ${id} has ${field} "${line[field]}", entity has "${expected[field]}"`,
                field,
                expected[field],
                line[field]
              )
            );
          }
        }
      }
    }

    return {
      namespace,
      entityCount: entities.length,
      ledgerEntryCount: ledgerEntries ? ledgerEntries.length : null,
      findings,
      consistent: findings.length === 0,
    };
  }

  /**
   * Fix the repairable drift of a report. Conflicts are left for a person
   * and show up again in the report taken afterwards.
   */
  repair(
    namespace: Namespace,
    report: ReconcileReport = this.reconcile(namespace)
  ): RepairResult {
    const repairable = report.findings.filter((f) => f.repairable);
    if (repairable.length === 0) {
      return {
        namespace,
        mode: "none",
        repaired: 0,
        after: report,
      };
    }

    const wholeLedger = repairable.some(
      (f) =>
        f.error instanceof DriftError &&
        (f.error.drift === "ledger_missing" || f.error.drift === "ledger_corrupt")
    );

    let mode: DeltaResult["mode"];
    if (wholeLedger) {
      this.ledger.rebuild(namespace);
      mode = "rebuild";
    } else {
      const ids = uniqueIds(repairable.map((f) => f.error.entityId));
      mode = this.ledger.applyDelta(namespace, ids).mode;
    }

    this.onLog(
      `Repaired ${repairable.length} ledger discrepanc${repairable.length === 1 ? "y" : "ies"} in ${getLayout(namespace).ledgerFile} (${mode})`
    );
    return {
      namespace,
      mode,
      repaired: repairable.length,
      after: this.reconcile(namespace),
    };
  }

  // ==========================================================================
  // MUTATIONS
  // ==========================================================================

  /**
   * Create an entity. The id defaults to the next free one (under `parent`
   * when given).
   *
   * @throws the first violation when the entity is invalid
   */
  createEntity(input: CreateEntityInput, options: MutationOptions = {}): Entity {
    const ns = input.namespace;
    const id = input.id ?? this.store.nextId(ns, input.parent);
    const parent = input.parent ?? impliedParent(id) ?? undefined;
    const timestamp = this.now().toISOString();

    const entity: Entity = {
      namespace: ns,
      id,
      title: input.title,
      type: input.type ?? getLayout(ns).defaultType,
      status: input.status ?? INITIAL_STATUS,
      priority: input.priority ?? this.defaultPriority,
      dependencies: input.dependencies ?? [],
      subsystems: input.subsystems ?? [],
      body: canonicalBody(input.body ?? ""),
      created_at: timestamp,
      updated_at: timestamp,
    };
    if (parent) entity.parent_task = parent;
    if (input.feature !== undefined) entity.feature = input.feature;

    throwIfInvalid(this.validate(entity));
    this.store.create(entity);
    this.ledger.applyDelta(ns, [id]);
    this.history.record({
      namespace: ns,
      entityId: formatId(id),
      eventType: "created",
      newValue: entity.status,
      comment: options.comment ?? entity.title,
      actor: options.actor,
    });
    return entity;
  }

  /**
   * Edit fields other than status
   */
  updateEntity(
    namespace: Namespace,
    id: EntityId,
    patch: EntityPatch,
    options: MutationOptions = {}
  ): Entity {
    const previous = this.require(namespace, id);
    const next: Entity = { ...previous };
    const changed: string[] = [];

    if (patch.title !== undefined && patch.title !== previous.title) {
      next.title = patch.title;
      changed.push("title");
    }
    if (patch.type !== undefined && patch.type !== previous.type) {
      next.type = patch.type;
      changed.push("type");
    }
    if (patch.priority !== undefined && patch.priority !== previous.priority) {
      next.priority = patch.priority;
      changed.push("priority");
    }
    if (patch.body !== undefined && canonicalBody(patch.body) !== previous.body) {
      next.body = canonicalBody(patch.body);
      changed.push("body");
    }
    if (
      patch.dependencies !== undefined &&
      !sameIdList(patch.dependencies, previous.dependencies)
    ) {
      next.dependencies = [...patch.dependencies];
      changed.push("dependencies");
    }
    if (
      patch.subsystems !== undefined &&
      patch.subsystems.join("\n") !== previous.subsystems.join("\n")
    ) {
      next.subsystems = [...patch.subsystems];
      changed.push("subsystems");
    }
    if (patch.parent_task !== undefined) {
      const before = previous.parent_task ? formatId(previous.parent_task) : null;
      const after = patch.parent_task ? formatId(patch.parent_task) : null;
      if (before !== after) {
        if (patch.parent_task) {
          next.parent_task = patch.parent_task;
        } else {
          delete next.parent_task;
        }
        changed.push("parent_task");
      }
    }
    if (patch.feature !== undefined && patch.feature !== (previous.feature ?? null)) {
      if (patch.feature === null) {
        delete next.feature;
      } else {
        next.feature = patch.feature;
      }
      changed.push("feature");
    }

    if (changed.length === 0) {
      return previous;
    }

    next.updated_at = this.now().toISOString();
    throwIfInvalid(this.validate(next, { previous }));
    this.store.write(next);
    this.ledger.applyDelta(namespace, [id]);
    this.history.record({
      namespace,
      entityId: formatId(id),
      eventType: "updated",
      newValue: changed.join(","),
      comment: options.comment ?? null,
      actor: options.actor,
    });
    return next;
  }

  /**
   * Move an entity along the normal status flow
   *
   * @throws DependencyNotSatisfiedError when starting an entity whose
   * dependencies are not all completed
   * @throws InvalidTransitionError for edges outside the state machine,
   * including completed/failed -> pending (see reopen)
   */
  transition(
    namespace: Namespace,
    id: EntityId,
    status: EntityStatus,
    options: MutationOptions = {}
  ): Entity {
    const previous = this.require(namespace, id);
    if (previous.status === status) {
      return previous;
    }

    const next: Entity = {
      ...previous,
      status,
      updated_at: this.now().toISOString(),
    };
    throwIfInvalid(this.validate(next, { previous }));
    return this.commitStatus(previous, next, "status_changed", options);
  }

  /**
   * Explicit override taking a completed or failed entity back to pending
   */
  reopen(
    namespace: Namespace,
    id: EntityId,
    options: MutationOptions = {}
  ): Entity {
    const previous = this.require(namespace, id);
    if (!isTerminal(previous.status)) {
      throw new InvalidTransitionError(
        namespace,
        id,
        previous.status,
        "pending",
        "only completed or failed entities can be reopened"
      );
    }

    const next: Entity = {
      ...previous,
      status: "pending",
      updated_at: this.now().toISOString(),
    };
    throwIfInvalid(this.validate(next, { previous, reopen: true }));
    this.onLog(
      `Reopening ${namespace} ${formatId(id)} (was ${previous.status})` +
        (options.comment ? `: ${options.comment}` : "")
    );
    return this.commitStatus(previous, next, "reopened", options);
  }

  private commitStatus(
    previous: Entity,
    next: Entity,
    eventType: "status_changed" | "reopened",
    options: MutationOptions
  ): Entity {
    this.store.write(next);
    this.ledger.applyDelta(next.namespace, [next.id]);
    this.history.record({
      namespace: next.namespace,
      entityId: formatId(next.id),
      eventType,
      oldValue: previous.status,
      newValue: next.status,
      comment: options.comment ?? null,
      actor: options.actor,
    });
    return next;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * Pending entities whose dependencies are all completed
   */
  ready(namespace: Namespace): Entity[] {
    const world = this.store.scan(namespace).entities.map((s) => s.entity);
    const byId = new Map(world.map((e) => [formatId(e.id), e]));
    return world.filter(
      (e) => e.status === "pending" && unmetDependencies(e, byId).length === 0
    );
  }

  /**
   * Open entities waiting on at least one dependency
   */
  blocked(namespace: Namespace): BlockedEntity[] {
    const world = this.store.scan(namespace).entities.map((s) => s.entity);
    const byId = new Map(world.map((e) => [formatId(e.id), e]));
    return world
      .filter((e) => !isTerminal(e.status))
      .map((entity) => ({ entity, blocking: unmetDependencies(entity, byId) }))
      .filter((b) => b.blocking.length > 0);
  }

  /**
   * Read an entity or fail
   */
  require(namespace: Namespace, id: EntityId): Entity {
    const entity = this.store.read(namespace, id);
    if (!entity) {
      throw new EntityNotFoundError(namespace, id);
    }
    return entity;
  }

  private expectedPath(entity: Entity): string {
    return path.join(
      entityDir(this.store.rootDir, entity.namespace),
      generateEntityFilename(getLayout(entity.namespace), entity.id, entity.title)
    );
  }
}

/**
 * Build a coordinator for a store root, applying config.json
 */
export function createCoordinator(
  rootDir: string,
  options: Omit<CoordinatorOptions, "store"> = {}
): ConsistencyCoordinator {
  const config = resolveConfig(rootDir);
  const store = new EntityStore(rootDir);
  return new ConsistencyCoordinator({
    defaultPriority: config.defaultPriority,
    history: new HistoryLog(rootDir, {
      enabled: config.historyEnabled,
      actor: config.actor,
      now: options.now,
    }),
    ...options,
    store,
  });
}

function unmetDependencies(
  entity: Entity,
  byId: Map<string, Entity>
): EntityId[] {
  return entity.dependencies.filter((dep) => {
    const target = byId.get(formatId(dep));
    return !target || target.status !== "completed";
  });
}

function duplicateErrors(
  namespace: Namespace,
  entities: StoredEntity[]
): DuplicateIdError[] {
  const errors: DuplicateIdError[] = [];
  for (const group of groupBy(entities, (s) => formatId(s.entity.id)).values()) {
    if (group.length > 1) {
      errors.push(
        new DuplicateIdError(
          namespace,
          group[0].entity.id,
          group.map((s) => ({ path: s.path, title: s.entity.title }))
        )
      );
    }
  }
  return errors;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

function uniqueIds(ids: (string | null)[]): EntityId[] {
  const seen = new Set<string>();
  const result: EntityId[] = [];
  for (const text of ids) {
    if (text === null || seen.has(text)) continue;
    seen.add(text);
    result.push(...toIds([text]));
  }
  return result.sort(compareIds);
}

function sameIdList(a: EntityId[], b: EntityId[]): boolean {
  return a.map(formatId).join(",") === b.map(formatId).join(",");
}

function toResult(errors: TaskLedgerError[]): ValidationResult {
  return {
    valid: errors.length === 0,
    errors,
    violations: errors.map((e) => e.toViolation()),
  };
}

function throwIfInvalid(result: ValidationResult): void {
  if (!result.valid) {
    throw result.errors[0];
  }
}
