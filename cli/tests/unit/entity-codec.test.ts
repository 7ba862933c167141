/**
 * Unit tests for the entity document codec
 */

import { describe, it, expect } from "vitest";
import type { Entity } from "@taskledger/types";
import { decodeEntity, encodeEntity } from "../../src/entity-codec.js";
import { subEntityId, topLevelId } from "../../src/entity-id.js";
import { ParseError, SchemaError } from "../../src/errors.js";
import { entityDocument } from "../helpers/store-fixture.js";

const FILE = "tasks/task1_setup.md";

function decodeError(raw: string): unknown {
  try {
    decodeEntity("tasks", FILE, raw);
  } catch (error) {
    return error;
  }
  throw new Error("expected decodeEntity to throw");
}

describe("Entity codec", () => {
  describe("encodeEntity", () => {
    it("should write required fields in order with the body after a blank line", () => {
      const entity: Entity = {
        namespace: "tasks",
        id: topLevelId(1),
        title: "Setup",
        type: "task",
        status: "pending",
        priority: "high",
        dependencies: [],
        subsystems: [],
        body: "Body text",
      };
      expect(encodeEntity(entity)).toBe(
        "---\nid: 1\ntitle: Setup\ntype: task\nstatus: pending\npriority: high\n---\n\nBody text\n"
      );
    });

    it("should quote dotted ids so they stay strings", () => {
      const entity: Entity = {
        namespace: "tasks",
        id: subEntityId(topLevelId(2), 1),
        title: "Child",
        type: "task",
        status: "pending",
        priority: "low",
        parent_task: topLevelId(2),
        dependencies: [],
        subsystems: [],
        body: "",
      };
      const text = encodeEntity(entity);
      expect(text).toContain("id: '2.1'\n");
      expect(text).toContain("parent_task: 2\n");
    });
  });

  describe("round trip", () => {
    it("should decode what it encodes and re-encode byte for byte", () => {
      const entity: Entity = {
        namespace: "tasks",
        id: subEntityId(topLevelId(4), 2),
        title: "Wire the exporter: phase 2",
        type: "task",
        status: "in_progress",
        priority: "critical",
        parent_task: topLevelId(4),
        dependencies: [topLevelId(1), subEntityId(topLevelId(4), 1)],
        subsystems: ["export", "cli"],
        feature: "Reporting",
        created_at: "2026-01-02T03:04:05.000Z",
        updated_at: "2026-01-03T00:00:00.000Z",
        body: "## Notes\n\n- keep the format stable",
      };

      const text = encodeEntity(entity);
      const decoded = decodeEntity("tasks", FILE, text);
      expect(decoded).toEqual(entity);
      expect(encodeEntity(decoded)).toBe(text);
    });
  });

  describe("decodeEntity", () => {
    it("should fill empty lists and keep the body as written", () => {
      const entity = decodeEntity(
        "tasks",
        FILE,
        entityDocument(1, "Setup", [], "\nHello\n")
      );
      expect(entity.dependencies).toEqual([]);
      expect(entity.subsystems).toEqual([]);
      expect(entity.body).toBe("Hello");
      expect(entity.parent_task).toBeUndefined();
    });

    it("should accept integer and dotted dependencies", () => {
      const entity = decodeEntity(
        "tasks",
        FILE,
        entityDocument(3, "Later", ["dependencies:", "  - 1", "  - '2.1'"])
      );
      expect(entity.dependencies).toEqual([
        topLevelId(1),
        subEntityId(topLevelId(2), 1),
      ]);
    });

    it("should convert unquoted YAML dates to ISO strings", () => {
      const entity = decodeEntity(
        "tasks",
        FILE,
        entityDocument(1, "Setup", ["created_at: 2026-01-02"])
      );
      expect(entity.created_at).toBe("2026-01-02T00:00:00.000Z");
    });

    it("should reject a document without frontmatter", () => {
      const error = decodeError("Just a note\n");
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toHaveProperty(
        "message",
        `Missing frontmatter block in ${FILE}`
      );
    });

    it("should reject malformed YAML", () => {
      const error = decodeError("---\nid: [unclosed\n---\n");
      expect(error).toBeInstanceOf(ParseError);
    });

    it("should reject a missing required field", () => {
      const error = decodeError("---\nid: 1\ntype: task\nstatus: pending\npriority: low\n---\n");
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toHaveProperty(
        "message",
        `Missing required field "title" in ${FILE}`
      );
    });

    it("should reject unknown fields", () => {
      const error = decodeError(entityDocument(1, "Setup", ["assignee: sam"]));
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toHaveProperty(
        "message",
        `Unknown field "assignee" in ${FILE}`
      );
    });

    it("should reject invalid ids", () => {
      const error = decodeError(entityDocument(0, "Setup"));
      expect(error).toHaveProperty("message", `Invalid id "0" in ${FILE}`);
    });

    it("should reject a dependency list that is not a list", () => {
      const error = decodeError(entityDocument(1, "Setup", ["dependencies: 3"]));
      expect(error).toHaveProperty(
        "message",
        `Field "dependencies" must be a list in ${FILE}`
      );
    });

    it("should raise a SchemaError for values outside an enumeration", () => {
      const raw = "---\nid: 1\ntitle: Setup\ntype: task\nstatus: done\npriority: low\n---\n";
      const error = decodeError(raw);
      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.toViolation()).toEqual({
          namespace: "tasks",
          id: "1",
          code: "schema_error",
          message: `Invalid status "done" in ${FILE} (expected one of: pending, in_progress, completed, failed)`,
          field: "status",
          expected: "pending|in_progress|completed|failed",
          actual: "done",
          paths: [FILE],
        });
      }
    });
  });
});
