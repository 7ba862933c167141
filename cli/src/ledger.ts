/**
 * Index Ledger: the per-namespace summary file (TASKS.md, PLAN.md, BUGS.md)
 *
 * The ledger is a derived view. Everything in it can be regenerated from
 * the entity files, so a damaged ledger is rebuilt rather than repaired.
 */

import * as fs from "fs";
import type {
  Entity,
  EntityId,
  EntityStatus,
  IndexEntry,
  Namespace,
} from "@taskledger/types";
import { writeFileAtomic } from "./atomic-write.js";
import { compareIds, formatId, idsEqual, parseId } from "./entity-id.js";
import { ParseError } from "./errors.js";
import { getLayout, ledgerPath } from "./layout.js";
import type { EntityStore, ScanResult } from "./store.js";
import { isValidPriority, isValidStatus } from "./validation.js";
import { ENTITY_PRIORITIES, ENTITY_STATUSES } from "./vocabulary.js";

export const FIELD_DELIMITER = " | ";

const STATUS_HEADINGS: Record<EntityStatus, string> = {
  pending: "Pending",
  in_progress: "In Progress",
  completed: "Completed",
  failed: "Failed",
};

const CHECKBOX: Record<EntityStatus, string> = {
  pending: " ",
  in_progress: " ",
  completed: "x",
  failed: "-",
};

export interface LedgerDocument {
  namespace: Namespace;
  /** Entries in document order */
  entries: IndexEntry[];
  /** Rendered file content */
  text: string;
}

export interface DeltaResult {
  mode: "delta" | "rebuild";
  /** Why the delta path fell back to a rebuild */
  reason?: string;
  /** False when the file already had the computed content */
  written: boolean;
}

export interface IndexLedgerOptions {
  onWarn?: (message: string) => void;
}

/**
 * Title as it appears in a ledger line: whitespace collapsed to single
 * spaces
 */
export function ledgerTitle(title: string): string {
  return title.replace(/\s+/g, " ").trim();
}

export function toIndexEntry(entity: Entity): IndexEntry {
  return {
    id: entity.id,
    title: ledgerTitle(entity.title),
    status: entity.status,
    priority: entity.priority,
  };
}

/**
 * Order within a status section: critical first, then ascending id
 */
export function compareEntries(a: IndexEntry, b: IndexEntry): number {
  return (
    ENTITY_PRIORITIES.indexOf(a.priority) -
      ENTITY_PRIORITIES.indexOf(b.priority) || compareIds(a.id, b.id)
  );
}

function escapeField(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\|/g, "\\|");
}

export function renderEntryLine(entry: IndexEntry): string {
  const fields = [
    formatId(entry.id),
    escapeField(entry.title),
    entry.status,
    entry.priority,
  ];
  return `- [${CHECKBOX[entry.status]}] ${fields.join(FIELD_DELIMITER)}`;
}

/**
 * Render entries grouped by status. Entries keep the order they have in
 * `entries`; empty sections are omitted.
 */
export function renderLedger(
  namespace: Namespace,
  entries: IndexEntry[]
): string {
  const lines = [`# ${getLayout(namespace).heading}`];
  for (const status of ENTITY_STATUSES) {
    const section = entries.filter((e) => e.status === status);
    if (section.length === 0) continue;
    lines.push("", `## ${STATUS_HEADINGS[status]}`, "");
    lines.push(...section.map(renderEntryLine));
  }
  return lines.join("\n") + "\n";
}

/**
 * Split an entry line body on unescaped `|`, unescaping each field
 */
function splitFields(body: string): string[] {
  const fields: string[] = [];
  let current = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === "\\" && i + 1 < body.length) {
      current += body[i + 1];
      i++;
    } else if (ch === "|") {
      fields.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current.trim());
  return fields;
}

/**
 * Parse ledger text. Headings and other prose are ignored; every list item
 * that looks like an entry must be well formed.
 *
 * @throws ParseError on a malformed entry line
 */
export function parseLedger(
  namespace: Namespace,
  text: string,
  filePath: string = getLayout(namespace).ledgerFile
): LedgerDocument {
  const entries: IndexEntry[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    const match = line.match(/^- \[(.)\] (.*)$/);
    if (!match) {
      if (line.startsWith("- [")) {
        throw corrupt(index, "malformed checkbox");
      }
      return;
    }

    const [checkbox, body] = [match[1], match[2]];
    const fields = splitFields(body);
    if (fields.length !== 4) {
      throw corrupt(index, `expected 4 fields, found ${fields.length}`);
    }
    const [idText, title, status, priority] = fields;
    const id = parseId(idText);
    if (!id) {
      throw corrupt(index, `invalid id "${idText}"`);
    }
    if (!isValidStatus(status)) {
      throw corrupt(index, `invalid status "${status}"`);
    }
    if (!isValidPriority(priority)) {
      throw corrupt(index, `invalid priority "${priority}"`);
    }
    if (!Object.values(CHECKBOX).includes(checkbox)) {
      throw corrupt(index, `invalid checkbox "[${checkbox}]"`);
    }
    entries.push({ id, title, status, priority });
  });

  return { namespace, entries, text };

  function corrupt(index: number, detail: string): ParseError {
    return new ParseError(
      `${filePath} line ${index + 1}: ${detail}`,
      namespace,
      filePath
    );
  }
}

export class IndexLedger {
  private readonly onWarn: (message: string) => void;

  constructor(
    private readonly store: EntityStore,
    options: IndexLedgerOptions = {}
  ) {
    this.onWarn = options.onWarn ?? console.warn;
  }

  path(namespace: Namespace): string {
    return ledgerPath(this.store.rootDir, namespace);
  }

  /**
   * Current ledger, or null when the file does not exist
   *
   * @throws ParseError when the ledger is corrupt
   */
  read(namespace: Namespace): LedgerDocument | null {
    const filePath = this.path(namespace);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return parseLedger(namespace, fs.readFileSync(filePath, "utf8"), filePath);
  }

  /**
   * Ledger content derived from the store, without writing it
   */
  derive(namespace: Namespace): LedgerDocument {
    const scan = this.store.scan(namespace);
    for (const file of scan.unreadable) {
      this.onWarn(`Skipping unreadable entity file: ${file.error.message}`);
    }

    const entries = [
      ...scan.entities.map((e) => toIndexEntry(e.entity)),
      ...heldEntries(this.readOrNull(namespace)?.entries ?? [], scan),
    ].sort(compareEntries);
    return { namespace, entries, text: renderLedger(namespace, entries) };
  }

  /**
   * Regenerate the whole ledger from the store
   */
  rebuild(namespace: Namespace): LedgerDocument {
    const doc = this.derive(namespace);
    this.writeIfChanged(namespace, doc.text);
    return doc;
  }

  /**
   * Re-render the lines of `changedIds` only. Entries keep their position
   * when their status and priority are unchanged; otherwise they move to
   * their sorted place in the section of their status. Lines of other
   * entities are left as they are.
   *
   * Falls back to a rebuild when the ledger is missing or corrupt, or when
   * the resulting entries do not list exactly the ids of the store.
   */
  applyDelta(namespace: Namespace, changedIds: EntityId[]): DeltaResult {
    let current: LedgerDocument | null;
    try {
      current = this.read(namespace);
    } catch (error) {
      if (error instanceof ParseError) {
        return this.fallback(namespace, `ledger corrupt: ${error.message}`);
      }
      throw error;
    }
    if (!current) {
      return this.fallback(namespace, "ledger missing");
    }

    const scan = this.store.scan(namespace);
    const { entities } = scan;
    const held = heldEntries(current.entries, scan);
    const heldIds = new Set(held.map((e) => formatId(e.id)));
    let entries = [...current.entries];

    for (const id of changedIds) {
      if (heldIds.has(formatId(id))) continue;
      const previous = entries.findIndex((e) => idsEqual(e.id, id));
      const previousEntry = previous >= 0 ? entries[previous] : null;
      const fresh = entities
        .filter((e) => idsEqual(e.entity.id, id))
        .map((e) => toIndexEntry(e.entity));

      if (
        fresh.length === 1 &&
        previousEntry &&
        previousEntry.status === fresh[0].status &&
        previousEntry.priority === fresh[0].priority
      ) {
        entries[previous] = fresh[0];
        entries = entries.filter((e, i) => i === previous || !idsEqual(e.id, id));
        continue;
      }

      entries = entries.filter((e) => !idsEqual(e.id, id));
      for (const entry of fresh) {
        insertSorted(entries, entry);
      }
    }

    const expected = [...entities.map((e) => toIndexEntry(e.entity)), ...held];
    if (entries.length !== expected.length) {
      return this.fallback(
        namespace,
        `entry count ${entries.length} does not match ${expected.length} entities`
      );
    }
    if (sortedIds(entries) !== sortedIds(expected)) {
      return this.fallback(namespace, "entry ids do not match the entity files");
    }

    const written = this.writeIfChanged(
      namespace,
      renderLedger(namespace, entries)
    );
    return { mode: "delta", written };
  }

  private fallback(namespace: Namespace, reason: string): DeltaResult {
    const before = this.rawText(namespace);
    const doc = this.rebuild(namespace);
    return { mode: "rebuild", reason, written: before !== doc.text };
  }

  private readOrNull(namespace: Namespace): LedgerDocument | null {
    try {
      return this.read(namespace);
    } catch (error) {
      if (error instanceof ParseError) return null;
      throw error;
    }
  }

  private rawText(namespace: Namespace): string | null {
    const filePath = this.path(namespace);
    return fs.existsSync(filePath) ? fs.readFileSync(filePath, "utf8") : null;
  }

  private writeIfChanged(namespace: Namespace, text: string): boolean {
    if (this.rawText(namespace) === text) {
      return false;
    }
    writeFileAtomic(this.path(namespace), text);
    return true;
  }
}

/**
 * Ledger lines of entities whose file exists but does not parse, one per
 * id. They are kept until a person fixes the file.
 */
function heldEntries(entries: IndexEntry[], scan: ScanResult): IndexEntry[] {
  const readable = new Set(scan.entities.map((e) => formatId(e.entity.id)));
  const broken = new Set(
    scan.unreadable.flatMap((u) =>
      u.filenameId && !readable.has(formatId(u.filenameId))
        ? [formatId(u.filenameId)]
        : []
    )
  );
  const held: IndexEntry[] = [];
  for (const entry of entries) {
    const id = formatId(entry.id);
    if (broken.has(id)) {
      held.push(entry);
      broken.delete(id);
    }
  }
  return held;
}

function sortedIds(entries: IndexEntry[]): string {
  return entries.map((e) => formatId(e.id)).sort().join(",");
}

/**
 * Insert before the first entry of the same status that sorts after it,
 * or after the last entry of that status
 */
function insertSorted(entries: IndexEntry[], entry: IndexEntry): void {
  let lastOfStatus = -1;
  for (let i = 0; i < entries.length; i++) {
    if (entries[i].status !== entry.status) continue;
    if (compareEntries(entry, entries[i]) < 0) {
      entries.splice(i, 0, entry);
      return;
    }
    lastOfStatus = i;
  }
  entries.splice(lastOfStatus >= 0 ? lastOfStatus + 1 : entries.length, 0, entry);
}
