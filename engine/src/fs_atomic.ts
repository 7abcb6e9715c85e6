import fs from "node:fs";
import path from "node:path";
import { nanoid } from "nanoid";

// Whole-file replace-or-nothing: write a sibling temp file, fsync, rename over the target.
export function writeFileAtomic(filePath: string, data: string | Uint8Array): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${nanoid(8)}.tmp`);

  let mode: number | undefined;
  try {
    mode = fs.statSync(filePath).mode;
  } catch {
    mode = undefined;
  }

  try {
    const fd = fs.openSync(tmpPath, "w", mode);
    try {
      fs.writeFileSync(fd, data);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmpPath, filePath);
  } catch (e) {
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch {
      // the original error is what matters
    }
    throw e;
  }
}
