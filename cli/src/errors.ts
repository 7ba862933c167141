/**
 * Error taxonomy for taskledger
 *
 * Every error describes a condition of the data on disk. Store operations
 * throw them; the coordinator collects them as violations.
 */

import type { EntityId, Namespace } from "@taskledger/types";
import { formatId } from "./entity-id.js";

export type ErrorCode =
  | "parse_error"
  | "schema_error"
  | "duplicate_id"
  | "dangling_reference"
  | "cycle"
  | "dependency_not_satisfied"
  | "invalid_transition"
  | "drift"
  | "not_found";

/**
 * Structured report of a single problem, suitable for --json output
 */
export interface Violation {
  namespace: Namespace;
  id: string | null;
  code: ErrorCode;
  message: string;
  field?: string;
  expected?: string;
  actual?: string;
  paths?: string[];
  drift?: DriftKind;
}

export abstract class TaskLedgerError extends Error {
  abstract readonly code: ErrorCode;

  constructor(
    message: string,
    public readonly namespace: Namespace,
    public readonly entityId: string | null
  ) {
    super(message);
    this.name = new.target.name;
  }

  toViolation(): Violation {
    return {
      namespace: this.namespace,
      id: this.entityId,
      code: this.code,
      message: this.message,
    };
  }
}

export class ParseError extends TaskLedgerError {
  readonly code = "parse_error";

  constructor(
    message: string,
    namespace: Namespace,
    public readonly filePath: string,
    entityId: string | null = null
  ) {
    super(message, namespace, entityId);
  }

  override toViolation(): Violation {
    return { ...super.toViolation(), paths: [this.filePath] };
  }
}

export class SchemaError extends TaskLedgerError {
  readonly code = "schema_error";

  constructor(
    namespace: Namespace,
    public readonly filePath: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly allowed: readonly string[],
    entityId: string | null = null
  ) {
    super(
      `Invalid ${field} "${String(value)}" in ${filePath} (expected one of: ${allowed.join(", ")})`,
      namespace,
      entityId
    );
  }

  override toViolation(): Violation {
    return {
      ...super.toViolation(),
      field: this.field,
      expected: this.allowed.join("|"),
      actual: String(this.value),
      paths: [this.filePath],
    };
  }
}

export interface DuplicateClaim {
  path: string;
  title: string;
}

export class DuplicateIdError extends TaskLedgerError {
  readonly code = "duplicate_id";

  constructor(
    namespace: Namespace,
    id: EntityId,
    public readonly claims: DuplicateClaim[]
  ) {
    super(
      `Duplicate id ${formatId(id)} in ${namespace}: ` +
        claims.map((c) => `"${c.title}" (${c.path})`).join(", "),
      namespace,
      formatId(id)
    );
  }

  override toViolation(): Violation {
    return {
      ...super.toViolation(),
      paths: this.claims.map((c) => c.path),
    };
  }
}

export class DanglingReferenceError extends TaskLedgerError {
  readonly code = "dangling_reference";

  constructor(
    namespace: Namespace,
    id: EntityId,
    public readonly field: "parent_task" | "dependencies",
    public readonly target: EntityId
  ) {
    super(
      `${namespace} ${formatId(id)}: ${field} references missing entity ${formatId(target)}`,
      namespace,
      formatId(id)
    );
  }

  override toViolation(): Violation {
    return {
      ...super.toViolation(),
      field: this.field,
      actual: formatId(this.target),
    };
  }
}

export class CycleError extends TaskLedgerError {
  readonly code = "cycle";

  constructor(
    namespace: Namespace,
    id: EntityId,
    public readonly field: "parent_task" | "dependencies",
    public readonly path: EntityId[]
  ) {
    super(
      `${namespace} ${formatId(id)}: ${field} cycle ${path.map(formatId).join(" -> ")}`,
      namespace,
      formatId(id)
    );
  }

  override toViolation(): Violation {
    return {
      ...super.toViolation(),
      field: this.field,
      actual: this.path.map(formatId).join(" -> "),
    };
  }
}

export class DependencyNotSatisfiedError extends TaskLedgerError {
  readonly code = "dependency_not_satisfied";

  constructor(
    namespace: Namespace,
    id: EntityId,
    public readonly blocking: EntityId[]
  ) {
    super(
      `${namespace} ${formatId(id)} cannot start: waiting on ${blocking.map(formatId).join(", ")}`,
      namespace,
      formatId(id)
    );
  }

  override toViolation(): Violation {
    return {
      ...super.toViolation(),
      field: "dependencies",
      expected: "completed",
      actual: this.blocking.map(formatId).join(","),
    };
  }
}

export class InvalidTransitionError extends TaskLedgerError {
  readonly code = "invalid_transition";

  constructor(
    namespace: Namespace,
    id: EntityId,
    public readonly from: string,
    public readonly to: string,
    hint?: string
  ) {
    super(
      `${namespace} ${formatId(id)}: cannot move from ${from} to ${to}` +
        (hint ? ` (${hint})` : ""),
      namespace,
      formatId(id)
    );
  }

  override toViolation(): Violation {
    return {
      ...super.toViolation(),
      field: "status",
      expected: this.to,
      actual: this.from,
    };
  }
}

export type DriftKind =
  | "orphan_entry"
  | "missing_entry"
  | "stale_field"
  | "ledger_missing"
  | "ledger_corrupt";

export class DriftError extends TaskLedgerError {
  readonly code = "drift";

  constructor(
    namespace: Namespace,
    entityId: string | null,
    public readonly drift: DriftKind,
    message: string,
    public readonly field?: string,
    public readonly expected?: string,
    public readonly actual?: string
  ) {
    super(message, namespace, entityId);
  }

  override toViolation(): Violation {
    const violation: Violation = { ...super.toViolation(), drift: this.drift };
    if (this.field !== undefined) violation.field = this.field;
    if (this.expected !== undefined) violation.expected = this.expected;
    if (this.actual !== undefined) violation.actual = this.actual;
    return violation;
  }
}

export class EntityNotFoundError extends TaskLedgerError {
  readonly code = "not_found";

  constructor(namespace: Namespace, id: EntityId) {
    super(`${namespace} ${formatId(id)} not found`, namespace, formatId(id));
  }
}

/**
 * Format error message for display
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
