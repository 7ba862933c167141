/**
 * Entity status state machine
 *
 *   pending -> in_progress -> completed
 *                          -> failed
 *   pending -> completed | failed
 *   completed | failed -> pending     (reopen only)
 */

import type { EntityStatus } from "@taskledger/types";

const TRANSITIONS: Record<EntityStatus, readonly EntityStatus[]> = {
  pending: ["in_progress", "completed", "failed"],
  in_progress: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const INITIAL_STATUS: EntityStatus = "pending";

export function isTerminal(status: EntityStatus): boolean {
  return status === "completed" || status === "failed";
}

/**
 * Whether `from -> to` is an edge of the normal flow. Staying in the same
 * status is not a transition and is always allowed.
 */
export function isAllowedTransition(
  from: EntityStatus,
  to: EntityStatus
): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

/**
 * Whether `from -> to` is the explicit reopen override
 */
export function isReopen(from: EntityStatus, to: EntityStatus): boolean {
  return isTerminal(from) && to === "pending";
}

export function allowedTargets(from: EntityStatus): readonly EntityStatus[] {
  return TRANSITIONS[from];
}
