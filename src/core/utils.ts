import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(): string {
  // YYYYMMDD-HHMMSS
  const d = new Date();
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

export async function isFile(p: string): Promise<boolean> {
  try {
    const stat = await fse.stat(p);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  return fse.readFile(filePath, "utf8");
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, content, "utf8");
}

export async function removeFile(filePath: string): Promise<void> {
  await fse.remove(filePath);
}
