import fs from "node:fs";
import path from "node:path";

export function ensureDirSync(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function readJsonFileSync<T>(filePath: string): T | null {
  try {
    const content = fs.readFileSync(filePath, "utf8");
    return JSON.parse(content) as T;
  } catch {
    return null;
  }
}

/** Writes to a sibling temp file and renames it over the target. */
export function writeJsonFileSync(filePath: string, data: unknown): void {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
  fs.renameSync(tempPath, filePath);
}

export function fileExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export function isWritableDir(dir: string): boolean {
  try {
    const stat = fs.statSync(dir);
    if (!stat.isDirectory()) {
      return false;
    }
    fs.accessSync(dir, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export function fileSize(filePath: string): number | null {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return null;
  }
}

/** Appends ` (1)`, ` (2)`, ... before the extension until the path is free. */
export function resolveUniquePath(basePath: string): string {
  if (!fileExists(basePath)) {
    return basePath;
  }

  const ext = path.extname(basePath);
  const stem = basePath.slice(0, ext.length > 0 ? -ext.length : undefined);
  let suffix = 1;
  while (true) {
    const candidate = `${stem} (${suffix})${ext}`;
    if (!fileExists(candidate)) {
      return candidate;
    }
    suffix += 1;
  }
}
