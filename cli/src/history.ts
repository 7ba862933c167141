/**
 * Append-only audit log of entity lifecycle events (history.jsonl)
 */

import type {
  HistoryEvent,
  HistoryEventType,
  Namespace,
} from "@taskledger/types";
import { appendJSONLSync, readJSONL, readJSONLSync } from "./jsonl.js";
import { historyPath } from "./layout.js";
import { isPlainObject, isValidNamespace } from "./validation.js";

const EVENT_TYPES = new Set<string>([
  "created",
  "updated",
  "status_changed",
  "reopened",
]);

function isEventType(value: string): value is HistoryEventType {
  return EVENT_TYPES.has(value);
}

function nullableString(value: unknown, field: string): string | null {
  if (value === null || typeof value === "string") {
    return value;
  }
  throw new Error(`Field "${field}" must be a string or null`);
}

export function decodeHistoryEvent(value: unknown): HistoryEvent {
  if (!isPlainObject(value)) {
    throw new Error("History event must be an object");
  }
  const { namespace, entity_id, event_type, actor, created_at } = value;
  if (typeof namespace !== "string" || !isValidNamespace(namespace)) {
    throw new Error(`Unknown namespace "${String(namespace)}"`);
  }
  if (typeof event_type !== "string" || !isEventType(event_type)) {
    throw new Error(`Unknown event type "${String(event_type)}"`);
  }
  if (
    typeof entity_id !== "string" ||
    typeof actor !== "string" ||
    typeof created_at !== "string"
  ) {
    throw new Error("History event is missing entity_id, actor or created_at");
  }
  return {
    namespace,
    entity_id,
    event_type,
    old_value: nullableString(value.old_value, "old_value"),
    new_value: nullableString(value.new_value, "new_value"),
    comment: nullableString(value.comment, "comment"),
    actor,
    created_at,
  };
}

export interface HistoryLogOptions {
  enabled?: boolean;
  actor?: string;
  now?: () => Date;
}

export interface RecordInput {
  namespace: Namespace;
  entityId: string;
  eventType: HistoryEventType;
  oldValue?: string | null;
  newValue?: string | null;
  comment?: string | null;
  actor?: string;
}

export interface HistoryFilter {
  namespace?: Namespace;
  entityId?: string;
}

export class HistoryLog {
  readonly enabled: boolean;
  private readonly actor: string;
  private readonly now: () => Date;

  constructor(
    private readonly rootDir: string,
    options: HistoryLogOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.actor = options.actor ?? "taskledger";
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return historyPath(this.rootDir);
  }

  /**
   * Append an event. Returns the event, or null when the log is disabled.
   */
  record(input: RecordInput): HistoryEvent | null {
    if (!this.enabled) {
      return null;
    }
    const event: HistoryEvent = {
      namespace: input.namespace,
      entity_id: input.entityId,
      event_type: input.eventType,
      old_value: input.oldValue ?? null,
      new_value: input.newValue ?? null,
      comment: input.comment ?? null,
      actor: input.actor ?? this.actor,
      created_at: this.now().toISOString(),
    };
    appendJSONLSync(this.path, event);
    return event;
  }

  async read(filter: HistoryFilter = {}): Promise<HistoryEvent[]> {
    const events = await readJSONL(this.path, decodeHistoryEvent, {
      skipErrors: true,
    });
    return events.filter((e) => matches(e, filter));
  }

  readSync(filter: HistoryFilter = {}): HistoryEvent[] {
    return readJSONLSync(this.path, decodeHistoryEvent, {
      skipErrors: true,
    }).filter((e) => matches(e, filter));
  }
}

function matches(event: HistoryEvent, filter: HistoryFilter): boolean {
  return (
    (filter.namespace === undefined || event.namespace === filter.namespace) &&
    (filter.entityId === undefined || event.entity_id === filter.entityId)
  );
}
