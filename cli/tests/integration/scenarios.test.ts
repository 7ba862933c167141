/**
 * End-to-end consistency scenarios across the store, ledger and coordinator
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import { ConsistencyCoordinator } from "../../src/coordinator.js";
import { encodeEntity } from "../../src/entity-codec.js";
import { formatId, subEntityId, topLevelId } from "../../src/entity-id.js";
import {
  CycleError,
  DependencyNotSatisfiedError,
  DriftError,
  DuplicateIdError,
} from "../../src/errors.js";
import { parseLedger } from "../../src/ledger.js";
import {
  createTestStore,
  entityDocument,
  makeEntity,
  removeTestStore,
  writeRawEntity,
  type TestStore,
} from "../helpers/store-fixture.js";

describe("Consistency scenarios", () => {
  let t: TestStore;
  let coordinator: ConsistencyCoordinator;

  beforeEach(() => {
    t = createTestStore();
    coordinator = t.coordinator;
  });

  afterEach(() => {
    removeTestStore(t);
  });

  function ledgerText(): string {
    return fs.readFileSync(coordinator.ledger.path("tasks"), "utf8");
  }

  it("gates in_progress on completed dependencies", () => {
    coordinator.createEntity({ namespace: "tasks", title: "Task one" });
    coordinator.createEntity({
      namespace: "tasks",
      title: "Task two",
      dependencies: [topLevelId(1)],
    });

    let gateError: unknown = null;
    try {
      coordinator.transition("tasks", topLevelId(2), "in_progress");
    } catch (error) {
      gateError = error;
    }
    expect(gateError).toBeInstanceOf(DependencyNotSatisfiedError);
    if (gateError instanceof DependencyNotSatisfiedError) {
      expect(gateError.blocking.map(formatId)).toEqual(["1"]);
    }

    coordinator.transition("tasks", topLevelId(1), "completed");
    expect(coordinator.transition("tasks", topLevelId(2), "in_progress").status).toBe(
      "in_progress"
    );
    expect(coordinator.reconcile("tasks").consistent).toBe(true);
  });

  it("reports two writers claiming the same id without picking one", () => {
    const alpha = writeRawEntity(t.rootDir, "tasks", "task5_alpha.md", entityDocument(5, "Alpha"));
    const beta = writeRawEntity(t.rootDir, "tasks", "task5_beta.md", entityDocument(5, "Beta"));
    coordinator.ledger.rebuild("tasks");

    const report = coordinator.reconcile("tasks");
    expect(report.consistent).toBe(false);
    expect(report.findings).toHaveLength(1);

    const [finding] = report.findings;
    expect(finding.repairable).toBe(false);
    expect(finding.error).toBeInstanceOf(DuplicateIdError);
    if (finding.error instanceof DuplicateIdError) {
      expect(finding.error.claims).toEqual([
        { path: alpha, title: "Alpha" },
        { path: beta, title: "Beta" },
      ]);
    }

    coordinator.repair("tasks", report);
    expect(fs.readFileSync(alpha, "utf8")).toBe(entityDocument(5, "Alpha"));
    expect(fs.readFileSync(beta, "utf8")).toBe(entityDocument(5, "Beta"));
  });

  it("repairs an orphan line left by a deleted entity file", () => {
    for (let i = 1; i <= 7; i++) {
      coordinator.createEntity({ namespace: "tasks", title: `Step ${i}` });
    }
    const seventh = coordinator.store.locate("tasks", topLevelId(7));
    if (!seventh) throw new Error("missing fixture");
    fs.rmSync(seventh);

    const report = coordinator.reconcile("tasks");
    expect(report.findings).toHaveLength(1);
    const drift = report.findings[0].error;
    expect(drift).toBeInstanceOf(DriftError);
    if (drift instanceof DriftError) {
      expect(drift.drift).toBe("orphan_entry");
      expect(drift.entityId).toBe("7");
    }

    const result = coordinator.repair("tasks", report);
    expect(result.after.consistent).toBe(true);
    expect(ledgerText()).not.toContain("Step 7");
    expect(parseLedger("tasks", ledgerText()).entries).toHaveLength(6);
  });

  it("rejects an entity that is its own parent", () => {
    for (let i = 1; i <= 3; i++) {
      coordinator.createEntity({ namespace: "tasks", title: `Task ${i}` });
    }

    expect(() =>
      coordinator.updateEntity("tasks", topLevelId(3), { parent_task: topLevelId(3) })
    ).toThrow(CycleError);

    writeRawEntity(
      t.rootDir,
      "tasks",
      "task3_task_3.md",
      entityDocument(3, "Task 3", ["parent_task: 3"])
    );
    const result = coordinator.validateAll("tasks");
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(CycleError);
  });

  it("keeps the ledger a bijection of the store through a series of edits", () => {
    coordinator.createEntity({ namespace: "tasks", title: "Plan", priority: "high" });
    coordinator.createEntity({ namespace: "tasks", title: "Outline", parent: topLevelId(1) });
    coordinator.createEntity({ namespace: "tasks", title: "Draft", dependencies: [topLevelId(1)] });
    coordinator.transition("tasks", topLevelId(1), "completed");
    coordinator.transition("tasks", topLevelId(2), "in_progress");
    coordinator.updateEntity("tasks", subEntityId(topLevelId(1), 1), {
      title: "Outline | sections",
      priority: "critical",
    });
    coordinator.transition("tasks", topLevelId(2), "failed");
    coordinator.reopen("tasks", topLevelId(2), { comment: "retry" });

    const ledger = parseLedger("tasks", ledgerText());
    const stored = [...coordinator.store.list("tasks")];
    expect(stored.map((e) => formatId(e.id))).toEqual(["1", "1.1", "2"]);
    expect(ledger.entries.map((e) => formatId(e.id)).sort()).toEqual(
      stored.map((e) => formatId(e.id)).sort()
    );
    for (const entity of stored) {
      const entry = ledger.entries.find((e) => formatId(e.id) === formatId(entity.id));
      expect(entry).toEqual({
        id: entity.id,
        title: entity.title,
        status: entity.status,
        priority: entity.priority,
      });
    }

    // Rebuilding from scratch yields the same document
    const before = ledgerText();
    fs.rmSync(coordinator.ledger.path("tasks"));
    coordinator.ledger.rebuild("tasks");
    expect(ledgerText()).toBe(before);
    expect(coordinator.reconcile("tasks").consistent).toBe(true);
  });

  it("round-trips entity files written by other tools byte for byte", () => {
    const entity = makeEntity(subEntityId(topLevelId(2), 3), {
      title: "Polish: copy & layout",
      parent_task: topLevelId(2),
      subsystems: ["ui"],
      body: "Check the\n\nempty states",
    });
    const text = encodeEntity(entity);
    const file = writeRawEntity(t.rootDir, "tasks", "task2.3_polish_copy_layout.md", text);

    const read = coordinator.store.read("tasks", entity.id);
    expect(read).toEqual(entity);
    if (read) coordinator.store.write(read);
    expect(fs.readFileSync(file, "utf8")).toBe(text);
  });
});
