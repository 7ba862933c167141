/**
 * Strict conversion between entity files and typed entities.
 *
 * The codec only checks the shape of a single document. Relationships
 * between entities (parents, dependencies, uniqueness) are the
 * coordinator's concern.
 */

import type { Entity, EntityId, Namespace } from "@taskledger/types";
import { fromFrontmatterId, toFrontmatterId } from "./entity-id.js";
import { ParseError, SchemaError } from "./errors.js";
import { documentBody, parseMarkdown, stringifyMarkdown } from "./markdown.js";
import {
  getValidEntityTypes,
  getValidPriorities,
  getValidStatuses,
  isValidEntityType,
  isValidPriority,
  isValidStatus,
} from "./validation.js";

const REQUIRED_FIELDS = ["id", "title", "type", "status", "priority"] as const;

/**
 * Frontmatter keys in the order they are written
 */
const FIELD_ORDER = [
  ...REQUIRED_FIELDS,
  "feature",
  "parent_task",
  "subsystems",
  "dependencies",
  "created_at",
  "updated_at",
] as const;

const KNOWN_FIELDS = new Set<string>(FIELD_ORDER);

/**
 * Parse an entity document. `filePath` is only used for error reporting.
 */
export function decodeEntity(
  namespace: Namespace,
  filePath: string,
  raw: string
): Entity {
  let data: Record<string, unknown>;
  let content: string;
  try {
    ({ data, content } = parseMarkdown(raw));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ParseError(
      `Malformed frontmatter in ${filePath}: ${detail}`,
      namespace,
      filePath
    );
  }

  const fail = (message: string, entityId: string | null = null): never => {
    throw new ParseError(`${message} in ${filePath}`, namespace, filePath, entityId);
  };

  if (Object.keys(data).length === 0) {
    fail("Missing frontmatter block");
  }

  for (const field of REQUIRED_FIELDS) {
    if (data[field] === undefined || data[field] === null) {
      fail(`Missing required field "${field}"`);
    }
  }

  const id = fromFrontmatterId(data.id);
  if (!id) {
    return fail(`Invalid id "${String(data.id)}"`);
  }
  const idText = String(toFrontmatterId(id));

  for (const key of Object.keys(data)) {
    if (!KNOWN_FIELDS.has(key)) {
      fail(`Unknown field "${key}"`, idText);
    }
  }

  const title = data.title;
  if (typeof title !== "string" || title.trim() === "") {
    return fail(`Field "title" must be a non-empty string`, idText);
  }

  const type = requireEnum(
    data.type,
    "type",
    isValidEntityType,
    getValidEntityTypes()
  );
  const status = requireEnum(
    data.status,
    "status",
    isValidStatus,
    getValidStatuses()
  );
  const priority = requireEnum(
    data.priority,
    "priority",
    isValidPriority,
    getValidPriorities()
  );

  function requireEnum<T extends string>(
    value: unknown,
    field: string,
    guard: (v: string) => v is T,
    allowed: string[]
  ): T {
    if (typeof value !== "string") {
      return fail(`Field "${field}" must be a string`, idText);
    }
    if (!guard(value)) {
      throw new SchemaError(namespace, filePath, field, value, allowed, idText);
    }
    return value;
  }

  const entity: Entity = {
    namespace,
    id,
    title,
    type,
    status,
    priority,
    dependencies: readIdList(data.dependencies, "dependencies"),
    subsystems: readStringList(data.subsystems, "subsystems"),
    body: documentBody(content),
  };

  if (data.parent_task !== undefined && data.parent_task !== null) {
    const parent = fromFrontmatterId(data.parent_task);
    if (!parent) {
      return fail(`Invalid parent_task "${String(data.parent_task)}"`, idText);
    }
    entity.parent_task = parent;
  }

  if (data.feature !== undefined && data.feature !== null) {
    entity.feature = readText(data.feature, "feature");
  }
  if (data.created_at !== undefined && data.created_at !== null) {
    entity.created_at = readTimestamp(data.created_at, "created_at");
  }
  if (data.updated_at !== undefined && data.updated_at !== null) {
    entity.updated_at = readTimestamp(data.updated_at, "updated_at");
  }

  return entity;

  function readIdList(value: unknown, field: string): EntityId[] {
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      return fail(`Field "${field}" must be a list`, idText);
    }
    return value.map((item: unknown) => {
      const parsed = fromFrontmatterId(item);
      return parsed ?? fail(`Invalid id "${String(item)}" in ${field}`, idText);
    });
  }

  function readStringList(value: unknown, field: string): string[] {
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      return fail(`Field "${field}" must be a list`, idText);
    }
    return value.map((item: unknown) =>
      typeof item === "string" || typeof item === "number"
        ? String(item)
        : fail(`Field "${field}" must contain strings`, idText)
    );
  }

  function readText(value: unknown, field: string): string {
    if (typeof value === "string" || typeof value === "number") {
      return String(value);
    }
    return fail(`Field "${field}" must be a string`, idText);
  }

  // Unquoted YAML timestamps come back as Date objects
  function readTimestamp(value: unknown, field: string): string {
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (typeof value === "string") {
      return value;
    }
    return fail(`Field "${field}" must be a timestamp`, idText);
  }
}

/**
 * Frontmatter mapping for an entity, keys in write order, empty optional
 * fields omitted.
 */
export function entityFrontmatter(entity: Entity): Record<string, unknown> {
  const data: Record<string, unknown> = {
    id: toFrontmatterId(entity.id),
    title: entity.title,
    type: entity.type,
    status: entity.status,
    priority: entity.priority,
  };
  if (entity.feature !== undefined) {
    data.feature = entity.feature;
  }
  if (entity.parent_task) {
    data.parent_task = toFrontmatterId(entity.parent_task);
  }
  if (entity.subsystems.length > 0) {
    data.subsystems = [...entity.subsystems];
  }
  if (entity.dependencies.length > 0) {
    data.dependencies = entity.dependencies.map(toFrontmatterId);
  }
  if (entity.created_at !== undefined) {
    data.created_at = entity.created_at;
  }
  if (entity.updated_at !== undefined) {
    data.updated_at = entity.updated_at;
  }
  return data;
}

export function encodeEntity(entity: Entity): string {
  return stringifyMarkdown(entityFrontmatter(entity), entity.body);
}
