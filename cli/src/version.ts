/**
 * Version utilities
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { isPlainObject } from "./validation.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the CLI version from the nearest package.json above this module
 */
export function getVersion(): string {
  let dir = __dirname;
  while (true) {
    const packageJsonPath = path.join(dir, "package.json");
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(
        fs.readFileSync(packageJsonPath, "utf8")
      );
      if (isPlainObject(packageJson) && typeof packageJson.version === "string") {
        return packageJson.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return "0.0.0";
    }
    dir = parent;
  }
}

/**
 * The current CLI version
 */
export const VERSION = getVersion();
