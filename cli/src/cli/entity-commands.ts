/**
 * CLI handlers for entity commands (create, list, show, update, status, reopen)
 */

import chalk from "chalk";
import Table from "cli-table3";
import type { Entity } from "@taskledger/types";
import type { EntityPatch } from "../coordinator.js";
import { formatId } from "../entity-id.js";
import {
  parseEntityType,
  parseIdArg,
  parseIdList,
  parseNamespace,
  parsePriority,
  parseStatus,
  splitList,
  type CommandContext,
} from "./args.js";
import { fail, statusColor, toEntityJSON } from "./output.js";

export interface CreateOptions {
  ns?: string;
  type?: string;
  priority?: string;
  description?: string;
  parent?: string;
  deps?: string;
  subsystems?: string;
  feature?: string;
  actor?: string;
}

export async function handleCreate(
  ctx: CommandContext,
  title: string,
  options: CreateOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const entity = ctx.coordinator.createEntity(
      {
        namespace,
        title,
        parent: options.parent ? parseIdArg(options.parent) : undefined,
        type: options.type ? parseEntityType(options.type) : undefined,
        priority: options.priority ? parsePriority(options.priority) : undefined,
        dependencies: options.deps ? parseIdList(options.deps) : undefined,
        subsystems: options.subsystems ? splitList(options.subsystems) : undefined,
        feature: options.feature,
        body: options.description,
      },
      { actor: options.actor }
    );

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(toEntityJSON(entity), null, 2));
    } else {
      console.log(
        chalk.green(`✓ Created ${namespace.replace(/s$/, "")}`),
        chalk.cyan(formatId(entity.id))
      );
      console.log(chalk.gray(`  Title: ${entity.title}`));
      console.log(chalk.gray(`  Priority: ${entity.priority}`));
      if (entity.dependencies.length > 0) {
        console.log(
          chalk.gray(`  Depends on: ${entity.dependencies.map(formatId).join(", ")}`)
        );
      }
    }
  } catch (error) {
    fail("Failed to create entity", error);
  }
}

export interface ListOptions {
  ns?: string;
  status?: string;
  priority?: string;
  grep?: string;
}

export async function handleList(
  ctx: CommandContext,
  options: ListOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const status = options.status ? parseStatus(options.status) : undefined;
    const priority = options.priority ? parsePriority(options.priority) : undefined;
    const query = options.grep?.toLowerCase();

    const entities: Entity[] = [];
    for (const entity of ctx.coordinator.store.list(namespace)) {
      if (status && entity.status !== status) continue;
      if (priority && entity.priority !== priority) continue;
      if (
        query &&
        !entity.title.toLowerCase().includes(query) &&
        !entity.body.toLowerCase().includes(query)
      ) {
        continue;
      }
      entities.push(entity);
    }

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(entities.map(toEntityJSON), null, 2));
      return;
    }

    if (entities.length === 0) {
      console.log(chalk.gray(`No ${namespace} found`));
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan("ID"),
        chalk.cyan("Title"),
        chalk.cyan("Status"),
        chalk.cyan("Priority"),
      ],
    });
    for (const entity of entities) {
      table.push([
        formatId(entity.id),
        entity.title,
        statusColor(entity.status)(entity.status),
        entity.priority,
      ]);
    }
    console.log(chalk.bold(`\nFound ${entities.length} ${namespace}:\n`));
    console.log(table.toString());
  } catch (error) {
    fail(`Failed to list entities`, error);
  }
}

export interface ShowOptions {
  ns?: string;
}

export async function handleShow(
  ctx: CommandContext,
  idText: string,
  options: ShowOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const entity = ctx.coordinator.require(namespace, parseIdArg(idText));

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(toEntityJSON(entity), null, 2));
      return;
    }

    console.log();
    console.log(chalk.bold.cyan(formatId(entity.id)), chalk.bold(entity.title));
    console.log(chalk.gray("─".repeat(60)));
    console.log(chalk.gray("Type:"), entity.type);
    console.log(chalk.gray("Status:"), statusColor(entity.status)(entity.status));
    console.log(chalk.gray("Priority:"), entity.priority);
    if (entity.parent_task) {
      console.log(chalk.gray("Parent:"), formatId(entity.parent_task));
    }
    if (entity.dependencies.length > 0) {
      console.log(
        chalk.gray("Depends on:"),
        entity.dependencies.map(formatId).join(", ")
      );
    }
    if (entity.subsystems.length > 0) {
      console.log(chalk.gray("Subsystems:"), entity.subsystems.join(", "));
    }
    if (entity.feature) {
      console.log(chalk.gray("Feature:"), entity.feature);
    }
    if (entity.created_at) {
      console.log(chalk.gray("Created:"), entity.created_at);
    }
    if (entity.updated_at) {
      console.log(chalk.gray("Updated:"), entity.updated_at);
    }
    if (entity.body) {
      console.log();
      console.log(entity.body);
    }
    console.log();
  } catch (error) {
    fail("Failed to show entity", error);
  }
}

export interface UpdateOptions {
  ns?: string;
  title?: string;
  type?: string;
  priority?: string;
  description?: string;
  deps?: string;
  subsystems?: string;
  parent?: string;
  feature?: string;
  actor?: string;
}

export async function handleUpdate(
  ctx: CommandContext,
  idText: string,
  options: UpdateOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const patch: EntityPatch = {};
    if (options.title !== undefined) patch.title = options.title;
    if (options.type !== undefined) patch.type = parseEntityType(options.type);
    if (options.priority !== undefined) {
      patch.priority = parsePriority(options.priority);
    }
    if (options.description !== undefined) patch.body = options.description;
    if (options.deps !== undefined) patch.dependencies = parseIdList(options.deps);
    if (options.subsystems !== undefined) {
      patch.subsystems = splitList(options.subsystems);
    }
    // An empty value clears the field
    if (options.parent !== undefined) {
      patch.parent_task = options.parent === "" ? null : parseIdArg(options.parent);
    }
    if (options.feature !== undefined) {
      patch.feature = options.feature === "" ? null : options.feature;
    }

    const entity = ctx.coordinator.updateEntity(
      namespace,
      parseIdArg(idText),
      patch,
      { actor: options.actor }
    );

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(toEntityJSON(entity), null, 2));
    } else {
      console.log(chalk.green("✓ Updated"), chalk.cyan(formatId(entity.id)));
    }
  } catch (error) {
    fail("Failed to update entity", error);
  }
}

export interface StatusOptions {
  ns?: string;
  comment?: string;
  actor?: string;
}

export async function handleStatus(
  ctx: CommandContext,
  idText: string,
  statusText: string,
  options: StatusOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const id = parseIdArg(idText);
    const status = parseStatus(statusText);
    const entity = ctx.coordinator.transition(namespace, id, status, {
      comment: options.comment,
      actor: options.actor,
    });

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(toEntityJSON(entity), null, 2));
    } else {
      console.log(
        chalk.green("✓"),
        chalk.cyan(formatId(entity.id)),
        statusColor(entity.status)(entity.status)
      );
    }
  } catch (error) {
    fail("Failed to change status", error);
  }
}

export interface ReopenOptions {
  ns?: string;
  reason?: string;
  actor?: string;
}

export async function handleReopen(
  ctx: CommandContext,
  idText: string,
  options: ReopenOptions
): Promise<void> {
  try {
    const namespace = parseNamespace(options.ns);
    const entity = ctx.coordinator.reopen(namespace, parseIdArg(idText), {
      comment: options.reason,
      actor: options.actor,
    });

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(toEntityJSON(entity), null, 2));
    } else {
      console.log(chalk.yellow("↺ Reopened"), chalk.cyan(formatId(entity.id)));
    }
  } catch (error) {
    fail("Failed to reopen entity", error);
  }
}
