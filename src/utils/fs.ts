import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/** Nearest ancestor of this module holding a package.json. */
export function projectRootDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  for (let dir = here; ; dir = path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    if (path.dirname(dir) === dir) return path.resolve(here, "../..");
  }
}

export function resolveFromProjectRoot(p: string, root = projectRootDir()): string {
  return path.isAbsolute(p) ? p : path.resolve(root, p);
}

/** Writes a sibling temp file, then renames it over `filePath`. */
export function atomicWriteJson(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  fs.writeFileSync(tmp, `${JSON.stringify(data, null, 2)}\n`, "utf8");
  fs.renameSync(tmp, filePath);
}

/** Returns `undefined` when the file is missing or blank; parse errors propagate. */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  const raw = fs.readFileSync(filePath, "utf8");
  if (!raw.trim()) return undefined;
  return JSON.parse(raw);
}
