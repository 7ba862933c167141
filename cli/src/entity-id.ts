/**
 * Entity identifier parsing, formatting and ordering
 */

import type { EntityId } from "@taskledger/types";

const DOTTED_ID = /^[1-9]\d*(\.[1-9]\d*)*$/;

export function topLevelId(value: number): EntityId {
  return { scope: "top", value };
}

export function subEntityId(parent: EntityId, value: number): EntityId {
  return { scope: "sub", parent, value };
}

/**
 * Numeric segments from the root down, e.g. `42.1.3` -> [42, 1, 3]
 */
export function idSegments(id: EntityId): number[] {
  if (id.scope === "top") {
    return [id.value];
  }
  return [...idSegments(id.parent), id.value];
}

export function formatId(id: EntityId): string {
  return idSegments(id).join(".");
}

/**
 * Parse the textual form of an id ("7", "42.1").
 * Returns null when the text is not a well-formed id.
 */
export function parseId(text: string): EntityId | null {
  const trimmed = text.trim();
  if (!DOTTED_ID.test(trimmed)) {
    return null;
  }
  const [first, ...rest] = trimmed.split(".").map((s) => parseInt(s, 10));
  let id = topLevelId(first);
  for (const segment of rest) {
    id = subEntityId(id, segment);
  }
  return id;
}

/**
 * Value as stored in front matter: integer for top-level, dotted string
 * for sub-entities.
 */
export function toFrontmatterId(id: EntityId): number | string {
  return id.scope === "top" ? id.value : formatId(id);
}

/**
 * Accepts the front matter forms of an id. Integers must be positive;
 * strings must be dotted numeric.
 */
export function fromFrontmatterId(value: unknown): EntityId | null {
  if (typeof value === "number") {
    return Number.isInteger(value) && value > 0 ? topLevelId(value) : null;
  }
  if (typeof value === "string") {
    return parseId(value);
  }
  return null;
}

export function idsEqual(a: EntityId, b: EntityId): boolean {
  return formatId(a) === formatId(b);
}

export function compareIds(a: EntityId, b: EntityId): number {
  const as = idSegments(a);
  const bs = idSegments(b);
  const len = Math.min(as.length, bs.length);
  for (let i = 0; i < len; i++) {
    if (as[i] !== bs[i]) {
      return as[i] - bs[i];
    }
  }
  return as.length - bs.length;
}

/**
 * Parent implied by a sub-entity id, null for top-level ids
 */
export function impliedParent(id: EntityId): EntityId | null {
  return id.scope === "sub" ? id.parent : null;
}
