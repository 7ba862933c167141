/**
 * Unit tests for entity CLI command handlers
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  handleCreate,
  handleList,
  handleReopen,
  handleShow,
  handleStatus,
  handleUpdate,
} from "../../../src/cli/entity-commands.js";
import type { CommandContext } from "../../../src/cli/args.js";
import { topLevelId } from "../../../src/entity-id.js";
import {
  createTestStore,
  removeTestStore,
  type TestStore,
} from "../../helpers/store-fixture.js";
import {
  lastJSON,
  printed,
  spyOnConsole,
  type ConsoleSpies,
} from "../../helpers/console-spies.js";

describe("Entity CLI Commands", () => {
  let t: TestStore;
  let spies: ConsoleSpies;
  let ctx: CommandContext;

  beforeEach(() => {
    t = createTestStore();
    spies = spyOnConsole();
    ctx = { coordinator: t.coordinator, rootDir: t.rootDir, jsonOutput: true };
  });

  afterEach(() => {
    spies.restore();
    removeTestStore(t);
  });

  describe("handleCreate", () => {
    it("should create an entity and print it as JSON", async () => {
      await handleCreate(ctx, "Setup CI", {
        priority: "high",
        subsystems: "ci, build",
        description: "Run tests on every push",
      });

      expect(lastJSON(spies.log)).toEqual({
        namespace: "tasks",
        id: "1",
        title: "Setup CI",
        type: "task",
        status: "pending",
        priority: "high",
        parent_task: null,
        dependencies: [],
        subsystems: ["ci", "build"],
        feature: null,
        created_at: "2026-03-01T12:00:00.000Z",
        updated_at: "2026-03-01T12:00:00.000Z",
        body: "Run tests on every push",
      });
    });

    it("should print a summary in text mode", async () => {
      ctx.jsonOutput = false;
      await handleCreate(ctx, "Login fails", { ns: "bugs" });

      const lines = printed(spies.log);
      expect(lines[0]).toContain("Created bug");
      expect(lines[0]).toContain("1");
      expect(lines[1]).toContain("Title: Login fails");
      expect(t.store.read("bugs", topLevelId(1))?.type).toBe("bug_fix");
    });

    it("should reject an unknown priority", async () => {
      await expect(handleCreate(ctx, "Setup", { priority: "urgent" })).rejects.toThrow(
        "process.exit(1)"
      );
      expect(printed(spies.error)[1]).toBe(
        'Invalid priority "urgent". Valid values: critical, high, medium, low'
      );
    });

    it("should create sub-entities with --parent", async () => {
      await handleCreate(ctx, "Parent", {});
      await handleCreate(ctx, "Child", { parent: "1" });
      expect(lastJSON(spies.log)).toMatchObject({ id: "1.1", parent_task: "1" });
    });
  });

  describe("handleList", () => {
    it("should filter by status and title", async () => {
      await handleCreate(ctx, "Setup CI", {});
      await handleCreate(ctx, "Write docs", {});
      await handleCreate(ctx, "Setup staging", {});
      t.coordinator.transition("tasks", topLevelId(3), "completed");

      await handleList(ctx, { status: "pending", grep: "setup" });
      expect(lastJSON(spies.log)).toMatchObject([{ id: "1", title: "Setup CI" }]);
    });
  });

  describe("handleShow", () => {
    it("should fail for a missing entity", async () => {
      await expect(handleShow(ctx, "9", {})).rejects.toThrow("process.exit(1)");
      expect(printed(spies.error)[1]).toBe("tasks 9 not found");
    });

    it("should reject malformed ids", async () => {
      await expect(handleShow(ctx, "1.x", {})).rejects.toThrow("process.exit(1)");
      expect(printed(spies.error)[1]).toBe('Invalid id "1.x" (expected e.g. 7 or 7.1)');
    });
  });

  describe("handleUpdate", () => {
    it("should clear the feature with an empty value", async () => {
      await handleCreate(ctx, "Setup", { feature: "Onboarding" });
      await handleUpdate(ctx, "1", { feature: "", priority: "low" });

      expect(lastJSON(spies.log)).toMatchObject({ feature: null, priority: "low" });
      expect(t.store.read("tasks", topLevelId(1))?.feature).toBeUndefined();
    });
  });

  describe("handleStatus", () => {
    it("should refuse to start an entity with unfinished dependencies", async () => {
      await handleCreate(ctx, "Schema", {});
      await handleCreate(ctx, "Migrate", { deps: "1" });

      await expect(handleStatus(ctx, "2", "in_progress", {})).rejects.toThrow(
        "process.exit(1)"
      );
      expect(printed(spies.error)[1]).toBe("tasks 2 cannot start: waiting on 1");
    });

    it("should move the entity and record the comment", async () => {
      await handleCreate(ctx, "Schema", {});
      await handleStatus(ctx, "1", "completed", { comment: "merged" });

      expect(lastJSON(spies.log)).toMatchObject({ status: "completed" });
      const events = t.coordinator.history.readSync({ entityId: "1" });
      expect(events[events.length - 1]).toMatchObject({
        event_type: "status_changed",
        comment: "merged",
      });
    });
  });

  describe("handleReopen", () => {
    it("should reopen a completed entity", async () => {
      await handleCreate(ctx, "Schema", {});
      await handleStatus(ctx, "1", "completed", {});
      await handleReopen(ctx, "1", { reason: "flaky" });

      expect(lastJSON(spies.log)).toMatchObject({ status: "pending" });
      expect(t.logs).toContain("Reopening tasks 1 (was completed): flaky");
    });
  });
});
