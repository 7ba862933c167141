/**
 * Main entry point for taskledger
 */

export type * from "@taskledger/types";
export * from "./entity-id.js";
export * from "./errors.js";
export * from "./vocabulary.js";
export * from "./layout.js";
export * from "./markdown.js";
export * from "./entity-codec.js";
export * from "./store.js";
export * from "./ledger.js";
export * from "./lifecycle.js";
export * from "./graph.js";
export * from "./coordinator.js";
export * from "./history.js";
export * from "./jsonl.js";
export * from "./config.js";
export * from "./watcher.js";
