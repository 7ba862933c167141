/**
 * Parsing of command-line argument values
 */

import type {
  EntityId,
  EntityPriority,
  EntityStatus,
  EntityType,
  Namespace,
} from "@taskledger/types";
import type { ConsistencyCoordinator } from "../coordinator.js";
import { parseId } from "../entity-id.js";
import { NAMESPACES } from "../vocabulary.js";
import {
  getValidEntityTypes,
  getValidNamespaces,
  getValidPriorities,
  getValidStatuses,
  isValidEntityType,
  isValidNamespace,
  isValidPriority,
  isValidStatus,
} from "../validation.js";

export interface CommandContext {
  coordinator: ConsistencyCoordinator;
  rootDir: string;
  jsonOutput: boolean;
}

export function parseIdArg(text: string): EntityId {
  const id = parseId(text);
  if (!id) {
    throw new Error(`Invalid id "${text}" (expected e.g. 7 or 7.1)`);
  }
  return id;
}

/**
 * Comma-separated ids; an empty string is an empty list
 */
export function parseIdList(text: string): EntityId[] {
  return splitList(text).map(parseIdArg);
}

export function splitList(text: string): string[] {
  return text
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

export function parseNamespace(text: string = "tasks"): Namespace {
  if (!isValidNamespace(text)) {
    throw new Error(
      `Invalid namespace "${text}". Valid values: ${getValidNamespaces().join(", ")}`
    );
  }
  return text;
}

export function parseStatus(text: string): EntityStatus {
  if (!isValidStatus(text)) {
    throw new Error(
      `Invalid status "${text}". Valid values: ${getValidStatuses().join(", ")}`
    );
  }
  return text;
}

export function parsePriority(text: string): EntityPriority {
  if (!isValidPriority(text)) {
    throw new Error(
      `Invalid priority "${text}". Valid values: ${getValidPriorities().join(", ")}`
    );
  }
  return text;
}

export function parseEntityType(text: string): EntityType {
  if (!isValidEntityType(text)) {
    throw new Error(
      `Invalid type "${text}". Valid values: ${getValidEntityTypes().join(", ")}`
    );
  }
  return text;
}

/**
 * A namespace name or "all"
 */
export function parseNamespaces(text: string = "tasks"): Namespace[] {
  return text === "all" ? [...NAMESPACES] : [parseNamespace(text)];
}

/**
 * Whole number option such as --limit or --debounce
 */
export function parseCount(text: string, option: string, min: number = 0): number {
  const value = /^\d+$/.test(text.trim()) ? Number(text.trim()) : NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    throw new Error(`Invalid ${option} "${text}" (expected a whole number >= ${min})`);
  }
  return value;
}
