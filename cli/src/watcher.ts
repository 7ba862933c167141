/**
 * File watcher for automatic ledger updates
 * Watches the entity directories and applies ledger deltas for the files
 * that changed, batched per namespace.
 */

import chokidar from "chokidar";
import * as path from "path";
import type { EntityId, Namespace } from "@taskledger/types";
import type { ConsistencyCoordinator } from "./coordinator.js";
import { formatId, parseId } from "./entity-id.js";
import { formatErrorMessage } from "./errors.js";
import { idFromFilename } from "./filename-generator.js";
import { entityDir, getLayout } from "./layout.js";
import { NAMESPACES } from "./vocabulary.js";

export interface WatcherOptions {
  coordinator: ConsistencyCoordinator;
  /**
   * Namespaces to watch (default: all)
   */
  namespaces?: Namespace[];
  /**
   * Quiet period before a batch of changes is applied (default: 200ms)
   */
  debounceMs?: number;
  /**
   * Whether to ignore initial files (default: true)
   */
  ignoreInitial?: boolean;
  /**
   * Callback for logging events
   */
  onLog?: (message: string) => void;
  /**
   * Callback for errors
   */
  onError?: (error: Error) => void;
}

export interface WatcherControl {
  /**
   * Stop watching files
   */
  stop: () => Promise<void>;
  /**
   * Apply pending changes now instead of waiting for the debounce
   */
  flush: () => void;
  /**
   * Get watcher statistics
   */
  getStats: () => WatcherStats;
}

export interface WatcherStats {
  changesProcessed: number;
  batchesApplied: number;
  errors: number;
}

/**
 * Start watching entity files for changes
 * Returns a control object to stop the watcher
 */
export function startWatcher(options: WatcherOptions): WatcherControl {
  const {
    coordinator,
    namespaces = [...NAMESPACES],
    debounceMs = 200,
    ignoreInitial = true,
    onLog = console.log,
    onError = console.error,
  } = options;
  const rootDir = coordinator.store.rootDir;

  const stats: WatcherStats = {
    changesProcessed: 0,
    batchesApplied: 0,
    errors: 0,
  };

  // namespace -> formatted ids awaiting a ledger delta
  const pending = new Map<Namespace, Set<string>>();
  let timer: NodeJS.Timeout | null = null;

  const dirs = new Map(
    namespaces.map((ns) => [path.resolve(entityDir(rootDir, ns)), ns] as const)
  );

  function namespaceOf(filePath: string): Namespace | null {
    return dirs.get(path.dirname(path.resolve(filePath))) ?? null;
  }

  function idsFor(ns: Namespace, filePath: string, exists: boolean): string[] {
    const ids = new Set<string>();
    const fromName = idFromFilename(getLayout(ns), path.basename(filePath));
    if (fromName) {
      ids.add(formatId(fromName));
    }
    if (exists) {
      try {
        ids.add(formatId(coordinator.store.readFile(ns, filePath).id));
      } catch (error) {
        onLog(`Unreadable entity file ${filePath}: ${formatErrorMessage(error)}`);
      }
    }
    return [...ids];
  }

  function flush(): void {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
    for (const [ns, ids] of pending) {
      pending.delete(ns);
      const changed = [...ids].flatMap((text) => {
        const id: EntityId | null = parseId(text);
        return id ? [id] : [];
      });
      try {
        const result = coordinator.ledger.applyDelta(ns, changed);
        stats.batchesApplied++;
        if (result.written) {
          onLog(
            `Updated ${getLayout(ns).ledgerFile} for ${[...ids].join(", ")}` +
              (result.reason ? ` (rebuilt: ${result.reason})` : "")
          );
        }
      } catch (error) {
        stats.errors++;
        onError(error instanceof Error ? error : new Error(String(error)));
      }
    }
  }

  function schedule(ns: Namespace, ids: string[]): void {
    const set = pending.get(ns) ?? new Set<string>();
    ids.forEach((id) => set.add(id));
    pending.set(ns, set);
    if (timer) {
      clearTimeout(timer);
    }
    timer = setTimeout(flush, debounceMs);
  }

  const watcher = chokidar.watch([...dirs.keys()], {
    ignoreInitial,
    persistent: true,
    depth: 0,
  });

  watcher.on("all", (event, filePath) => {
    if (event !== "add" && event !== "change" && event !== "unlink") {
      return;
    }
    const ns = namespaceOf(filePath);
    if (!ns || !idFromFilename(getLayout(ns), path.basename(filePath))) {
      return;
    }
    stats.changesProcessed++;
    const ids = idsFor(ns, filePath, event !== "unlink");
    if (ids.length > 0) {
      schedule(ns, ids);
    }
  });

  watcher.on("error", (error) => {
    stats.errors++;
    onError(error instanceof Error ? error : new Error(String(error)));
  });

  onLog(`Watching ${namespaces.map((ns) => getLayout(ns).directory).join(", ")} in ${rootDir}`);

  return {
    stop: async () => {
      flush();
      await watcher.close();
    },
    flush,
    getStats: () => ({ ...stats }),
  };
}
