/**
 * Unit tests for the index ledger
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import type { Entity } from "@taskledger/types";
import { formatId, topLevelId } from "../../src/entity-id.js";
import { ParseError } from "../../src/errors.js";
import {
  IndexLedger,
  ledgerTitle,
  parseLedger,
  renderEntryLine,
} from "../../src/ledger.js";
import {
  createTestStore,
  makeEntity,
  removeTestStore,
  writeRawEntity,
  type TestStore,
} from "../helpers/store-fixture.js";

const SAMPLE: Entity[] = [
  makeEntity(topLevelId(1), { title: "Setup", status: "completed", priority: "high" }),
  makeEntity(topLevelId(2), { title: "Build", priority: "low" }),
  makeEntity(topLevelId(3), { title: "Design", priority: "critical" }),
  makeEntity(topLevelId(4), { title: "Deploy", status: "in_progress" }),
  makeEntity(topLevelId(5), { title: "Spike", status: "failed" }),
];

const SAMPLE_LEDGER = [
  "# Tasks",
  "",
  "## Pending",
  "",
  "- [ ] 3 | Design | pending | critical",
  "- [ ] 2 | Build | pending | low",
  "",
  "## In Progress",
  "",
  "- [ ] 4 | Deploy | in_progress | medium",
  "",
  "## Completed",
  "",
  "- [x] 1 | Setup | completed | high",
  "",
  "## Failed",
  "",
  "- [-] 5 | Spike | failed | medium",
  "",
].join("\n");

describe("Index ledger", () => {
  let t: TestStore;
  let ledger: IndexLedger;

  beforeEach(() => {
    t = createTestStore();
    ledger = t.coordinator.ledger;
  });

  afterEach(() => {
    removeTestStore(t);
  });

  function writeAll(entities: Entity[]): void {
    for (const entity of entities) {
      t.store.write(entity);
    }
  }

  function ledgerText(): string {
    return fs.readFileSync(ledger.path("tasks"), "utf8");
  }

  describe("rendering", () => {
    it("should group by status and order by priority then id", () => {
      writeAll(SAMPLE);
      expect(ledger.rebuild("tasks").text).toBe(SAMPLE_LEDGER);
      expect(ledgerText()).toBe(SAMPLE_LEDGER);
    });

    it("should render only the heading for an empty namespace", () => {
      expect(ledger.rebuild("features").text).toBe("# Plan\n");
    });

    it("should escape the field delimiter in titles", () => {
      const line = renderEntryLine({
        id: topLevelId(1),
        title: "A | B \\ C",
        status: "pending",
        priority: "medium",
      });
      expect(line).toBe("- [ ] 1 | A \\| B \\\\ C | pending | medium");
      expect(parseLedger("tasks", line).entries[0].title).toBe("A | B \\ C");
    });

    it("should collapse whitespace in titles", () => {
      expect(ledgerTitle("  Multi\nline   title ")).toBe("Multi line title");
    });
  });

  describe("parseLedger", () => {
    it("should read entries and ignore prose", () => {
      const doc = parseLedger("tasks", SAMPLE_LEDGER + "\nSome notes.\n");
      expect(doc.entries.map((e) => e.title)).toEqual([
        "Design",
        "Build",
        "Deploy",
        "Setup",
        "Spike",
      ]);
    });

    it("should reject malformed entry lines", () => {
      expect(() => parseLedger("tasks", "- [ ] 1 | only two")).toThrow(
        "TASKS.md line 1: expected 4 fields, found 2"
      );
      expect(() => parseLedger("tasks", "- [ ] x | T | pending | low")).toThrow(
        'TASKS.md line 1: invalid id "x"'
      );
      expect(() => parseLedger("tasks", "- [?] 1 | T | pending | low")).toThrow(
        'TASKS.md line 1: invalid checkbox "[?]"'
      );
      expect(() => parseLedger("tasks", "# Tasks\n- [ broken")).toThrow(ParseError);
    });
  });

  describe("rebuild", () => {
    it("should be idempotent", () => {
      writeAll(SAMPLE);
      ledger.rebuild("tasks");
      const first = ledgerText();
      ledger.rebuild("tasks");
      expect(ledgerText()).toBe(first);
    });

    it("should skip unreadable files with a warning", () => {
      writeAll(SAMPLE.slice(0, 1));
      writeRawEntity(t.rootDir, "tasks", "task9_bad.md", "no frontmatter\n");

      const doc = ledger.rebuild("tasks");
      expect(doc.entries).toHaveLength(1);
      expect(t.warnings).toHaveLength(1);
      expect(t.warnings[0]).toContain("task9_bad.md");
    });
  });

  describe("applyDelta", () => {
    it("should rewrite only the changed line in place", () => {
      writeAll(SAMPLE);
      // Hand-ordered pending section
      fs.writeFileSync(
        ledger.path("tasks"),
        SAMPLE_LEDGER.replace(
          "- [ ] 3 | Design | pending | critical\n- [ ] 2 | Build | pending | low",
          "- [ ] 2 | Build | pending | low\n- [ ] 3 | Design | pending | critical"
        )
      );

      t.store.write({ ...SAMPLE[1], title: "Build v2" });
      const result = ledger.applyDelta("tasks", [topLevelId(2)]);

      expect(result).toEqual({ mode: "delta", written: true });
      expect(ledgerText()).toContain(
        "## Pending\n\n- [ ] 2 | Build v2 | pending | low\n- [ ] 3 | Design | pending | critical\n"
      );
    });

    it("should move an entry to the section of its new status", () => {
      writeAll(SAMPLE);
      ledger.rebuild("tasks");

      t.store.write({ ...SAMPLE[1], status: "completed" });
      ledger.applyDelta("tasks", [topLevelId(2)]);

      expect(ledgerText()).toBe(
        SAMPLE_LEDGER.replace("- [ ] 2 | Build | pending | low\n", "").replace(
          "- [x] 1 | Setup | completed | high\n",
          "- [x] 1 | Setup | completed | high\n- [x] 2 | Build | completed | low\n"
        )
      );
    });

    it("should drop the line of a deleted entity", () => {
      writeAll(SAMPLE);
      ledger.rebuild("tasks");
      for (const file of t.store.files("tasks")) {
        if (file.endsWith("task5_spike.md")) fs.rmSync(file);
      }

      const result = ledger.applyDelta("tasks", [topLevelId(5)]);
      expect(result.mode).toBe("delta");
      expect(ledgerText()).not.toContain("Spike");
      expect(ledgerText().endsWith("- [x] 1 | Setup | completed | high\n")).toBe(true);
    });

    it("should report no write when nothing changed", () => {
      writeAll(SAMPLE);
      ledger.rebuild("tasks");
      expect(ledger.applyDelta("tasks", [topLevelId(3)])).toEqual({
        mode: "delta",
        written: false,
      });
    });

    it("should rebuild when the ledger is missing", () => {
      writeAll(SAMPLE);
      const result = ledger.applyDelta("tasks", [topLevelId(1)]);
      expect(result).toEqual({ mode: "rebuild", reason: "ledger missing", written: true });
      expect(ledgerText()).toBe(SAMPLE_LEDGER);
    });

    it("should rebuild when the ledger is corrupt", () => {
      writeAll(SAMPLE);
      fs.writeFileSync(ledger.path("tasks"), "# Tasks\n- [ ] 1 | Setup\n");

      const result = ledger.applyDelta("tasks", [topLevelId(1)]);
      expect(result.mode).toBe("rebuild");
      expect(result.reason).toMatch(/^ledger corrupt: /);
      expect(ledgerText()).toBe(SAMPLE_LEDGER);
    });

    it("should rebuild when other entries are out of step with the store", () => {
      writeAll(SAMPLE);
      ledger.rebuild("tasks");
      t.store.write(makeEntity(topLevelId(6), { title: "Unindexed" }));

      const result = ledger.applyDelta("tasks", [topLevelId(1)]);
      expect(result.mode).toBe("rebuild");
      expect(result.reason).toBe("entry count 5 does not match 6 entities");
      expect(ledgerText()).toContain("- [ ] 6 | Unindexed | pending | medium");
    });

    it("should rebuild when the ledger lists other ids than the store", () => {
      writeAll(SAMPLE);
      ledger.rebuild("tasks");
      fs.rmSync(t.store.files("tasks")[4]);
      t.store.write(makeEntity(topLevelId(6), { title: "Unindexed" }));

      expect(ledger.applyDelta("tasks", [topLevelId(1)])).toEqual({
        mode: "rebuild",
        reason: "entry ids do not match the entity files",
        written: true,
      });
      expect(parseLedger("tasks", ledgerText()).entries.map((e) => formatId(e.id))).toEqual([
        "3",
        "6",
        "2",
        "4",
        "1",
      ]);
    });

    it("should keep the line of an unreadable entity file", () => {
      writeAll(SAMPLE);
      ledger.rebuild("tasks");
      const before = ledgerText();
      writeRawEntity(t.rootDir, "tasks", "task5_spike.md", "no frontmatter\n");

      expect(ledger.applyDelta("tasks", [topLevelId(5)])).toEqual({
        mode: "delta",
        written: false,
      });
      expect(ledger.applyDelta("tasks", [topLevelId(1)])).toEqual({
        mode: "delta",
        written: false,
      });
      ledger.rebuild("tasks");
      expect(ledgerText()).toBe(before);
    });
  });
});
