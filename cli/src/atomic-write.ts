import * as fs from "fs";
import * as path from "path";

/**
 * Replace a file by writing a sibling temp file and renaming it over the
 * target. Readers see either the old or the new content, never a partial
 * write. The temp name carries the pid so two processes never share one.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const tempPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, content, "utf8");
  try {
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}
