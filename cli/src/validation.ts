/**
 * Validation utilities for taskledger
 */

import type {
  EntityPriority,
  EntityStatus,
  EntityType,
  Namespace,
} from "@taskledger/types";
import {
  ENTITY_PRIORITIES,
  ENTITY_STATUSES,
  ENTITY_TYPES,
  NAMESPACES,
} from "./vocabulary.js";

/**
 * TypeScript types are erased at runtime, so enum-like front matter values
 * are checked against these sets. They are built from the value lists
 * exported next to the union types.
 */
const VALID_STATUSES = new Set<string>(ENTITY_STATUSES);
const VALID_PRIORITIES = new Set<string>(ENTITY_PRIORITIES);
const VALID_TYPES = new Set<string>(ENTITY_TYPES);
const VALID_NAMESPACES = new Set<string>(NAMESPACES);

export function isValidStatus(status: string): status is EntityStatus {
  return VALID_STATUSES.has(status);
}

export function getValidStatuses(): string[] {
  return Array.from(VALID_STATUSES);
}

export function isValidPriority(priority: string): priority is EntityPriority {
  return VALID_PRIORITIES.has(priority);
}

export function getValidPriorities(): string[] {
  return Array.from(VALID_PRIORITIES);
}

export function isValidEntityType(type: string): type is EntityType {
  return VALID_TYPES.has(type);
}

export function getValidEntityTypes(): string[] {
  return Array.from(VALID_TYPES);
}

export function isValidNamespace(ns: string): ns is Namespace {
  return VALID_NAMESPACES.has(ns);
}

export function getValidNamespaces(): string[] {
  return Array.from(VALID_NAMESPACES);
}

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
