import { execFile } from "node:child_process";
import { access } from "node:fs/promises";

export function binaryExists(name: string, platform: NodeJS.Platform = process.platform): Promise<boolean> {
  const cmd = platform === "win32" ? "where" : "which";
  return new Promise((resolve) => {
    execFile(cmd, [name], (err) => resolve(!err));
  });
}

export function fileExists(path: string): Promise<boolean> {
  return access(path)
    .then(() => true)
    .catch(() => false);
}
