/**
 * Entity Store: one Markdown file per entity
 *
 * The store validates the local shape of each document only. Files are the
 * source of truth and are re-read on every call; nothing is cached.
 */

import * as fs from "fs";
import * as path from "path";
import type { Entity, EntityId, Namespace } from "@taskledger/types";
import { writeFileAtomic } from "./atomic-write.js";
import { decodeEntity, encodeEntity } from "./entity-codec.js";
import {
  compareIds,
  formatId,
  idSegments,
  idsEqual,
  subEntityId,
  topLevelId,
} from "./entity-id.js";
import {
  DuplicateIdError,
  ParseError,
  SchemaError,
  type DuplicateClaim,
} from "./errors.js";
import {
  generateEntityFilename,
  idFromFilename,
} from "./filename-generator.js";
import { entityDir, getLayout } from "./layout.js";

export interface StoredEntity {
  entity: Entity;
  /** Absolute path of the file the entity was read from */
  path: string;
}

export interface UnreadableFile {
  path: string;
  /** Id encoded in the filename, when it follows the convention */
  filenameId: EntityId | null;
  error: ParseError | SchemaError;
}

export interface ScanResult {
  /** Parsed entities, ascending id (ties broken by path) */
  entities: StoredEntity[];
  unreadable: UnreadableFile[];
}

export class EntityStore {
  constructor(readonly rootDir: string) {}

  /**
   * Absolute paths of the entity files of a namespace, ascending by the id
   * in their filename
   */
  files(namespace: Namespace): string[] {
    const layout = getLayout(namespace);
    const dir = entityDir(this.rootDir, namespace);
    if (!fs.existsSync(dir)) {
      return [];
    }

    return fs
      .readdirSync(dir)
      .map((name) => ({ name, id: idFromFilename(layout, name) }))
      .filter(
        (f): f is { name: string; id: EntityId } => f.id !== null
      )
      .sort((a, b) => compareIds(a.id, b.id) || a.name.localeCompare(b.name))
      .map((f) => path.join(dir, f.name));
  }

  /**
   * Parse a single entity file
   */
  readFile(namespace: Namespace, filePath: string): Entity {
    const raw = fs.readFileSync(filePath, "utf8");
    return decodeEntity(namespace, filePath, raw);
  }

  /**
   * Read every file of a namespace, collecting parse failures instead of
   * stopping at the first one.
   */
  scan(namespace: Namespace): ScanResult {
    const layout = getLayout(namespace);
    const entities: StoredEntity[] = [];
    const unreadable: UnreadableFile[] = [];

    for (const filePath of this.files(namespace)) {
      try {
        entities.push({ entity: this.readFile(namespace, filePath), path: filePath });
      } catch (error) {
        if (error instanceof ParseError || error instanceof SchemaError) {
          unreadable.push({
            path: filePath,
            filenameId: idFromFilename(layout, path.basename(filePath)),
            error,
          });
        } else {
          throw error;
        }
      }
    }

    entities.sort(
      (a, b) =>
        compareIds(a.entity.id, b.entity.id) || a.path.localeCompare(b.path)
    );
    return { entities, unreadable };
  }

  /**
   * Read one entity. Returns null when no file holds the id.
   *
   * @throws DuplicateIdError when several files claim the id
   * @throws ParseError | SchemaError when the file named for the id is malformed
   */
  read(namespace: Namespace, id: EntityId): Entity | null {
    const { entities, unreadable } = this.scan(namespace);
    const matches = entities.filter((e) => idsEqual(e.entity.id, id));

    if (matches.length > 1) {
      throw new DuplicateIdError(namespace, id, toClaims(matches));
    }
    if (matches.length === 1) {
      return matches[0].entity;
    }

    const broken = unreadable.find(
      (u) => u.filenameId !== null && idsEqual(u.filenameId, id)
    );
    if (broken) {
      throw broken.error;
    }
    return null;
  }

  /**
   * Path of the file holding an id, or null
   */
  locate(namespace: Namespace, id: EntityId): string | null {
    const match = this.scan(namespace).entities.find((e) =>
      idsEqual(e.entity.id, id)
    );
    return match ? match.path : null;
  }

  /**
   * Persist an entity, replacing its current file atomically. When a title
   * change alters the filename, the previous file is removed after the new
   * one is in place.
   *
   * @throws DuplicateIdError when several files already claim the id
   */
  write(entity: Entity): string {
    const layout = getLayout(entity.namespace);
    const { entities } = this.scan(entity.namespace);
    const current = entities.filter((e) => idsEqual(e.entity.id, entity.id));

    if (current.length > 1) {
      throw new DuplicateIdError(entity.namespace, entity.id, toClaims(current));
    }

    const target = path.join(
      entityDir(this.rootDir, entity.namespace),
      generateEntityFilename(layout, entity.id, entity.title)
    );
    writeFileAtomic(target, encodeEntity(entity));

    if (current.length === 1 && path.resolve(current[0].path) !== path.resolve(target)) {
      fs.rmSync(current[0].path, { force: true });
    }
    return target;
  }

  /**
   * Persist a new entity.
   *
   * @throws DuplicateIdError when the id is already taken, including by a
   * file that does not parse
   */
  create(entity: Entity): string {
    const { entities, unreadable } = this.scan(entity.namespace);
    const taken = entities.filter((e) => idsEqual(e.entity.id, entity.id));
    const takenByBroken = unreadable.filter(
      (u) => u.filenameId !== null && idsEqual(u.filenameId, entity.id)
    );

    if (taken.length > 0 || takenByBroken.length > 0) {
      throw new DuplicateIdError(entity.namespace, entity.id, [
        ...toClaims(taken),
        ...takenByBroken.map((u) => ({ path: u.path, title: "(unreadable)" })),
        { path: "(new)", title: entity.title },
      ]);
    }
    return this.write(entity);
  }

  /**
   * Entities of a namespace in ascending id order.
   *
   * The sequence is lazy and restartable: every iteration lists the
   * directory again and parses files one at a time as they are consumed.
   * A malformed file raises from the iterator.
   */
  list(namespace: Namespace): Iterable<Entity> {
    return {
      [Symbol.iterator]: () => this.iterate(namespace),
    };
  }

  private *iterate(namespace: Namespace): Generator<Entity> {
    for (const filePath of this.files(namespace)) {
      yield this.readFile(namespace, filePath);
    }
  }

  /**
   * Number of entity files in a namespace
   */
  count(namespace: Namespace): number {
    return this.files(namespace).length;
  }

  /**
   * Next unused id: a top-level id, or the next child of `parent`
   */
  nextId(namespace: Namespace, parent?: EntityId): EntityId {
    const layout = getLayout(namespace);
    const taken: EntityId[] = [
      ...this.scan(namespace).entities.map((e) => e.entity.id),
      ...this.files(namespace).flatMap((f) => {
        const id = idFromFilename(layout, path.basename(f));
        return id ? [id] : [];
      }),
    ];

    const depth = parent ? idSegments(parent).length : 0;
    const prefix = parent ? formatId(parent) : null;
    let max = 0;
    for (const id of taken) {
      const segments = idSegments(id);
      if (segments.length !== depth + 1) continue;
      if (prefix !== null && segments.slice(0, depth).join(".") !== prefix) continue;
      max = Math.max(max, segments[depth]);
    }

    return parent ? subEntityId(parent, max + 1) : topLevelId(max + 1);
  }
}

function toClaims(entries: StoredEntity[]): DuplicateClaim[] {
  return entries.map((e) => ({ path: e.path, title: e.entity.title }));
}
