import os from "node:os";
import path from "node:path";

export function resolveUserPath(input: string): string {
  if (input === "~") {
    return os.homedir();
  }

  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }

  return path.resolve(input);
}

/** Makes a display name safe to use as a single directory name. */
export function toDirName(name: string): string {
  const cleaned = name.replace(/[/\\?%*:|"<>\n\r\t]/g, "_").trim();
  if (!cleaned || cleaned === "." || cleaned === "..") {
    return "_";
  }
  return cleaned;
}
