// backend/services/shared/bootstrap/moduleResolver.ts

import fs from "node:fs";
import path from "node:path";

export interface ModuleRuntime {
  /** True under tsx/vitest; plain node only loads compiled .js. */
  loadsTypeScript: boolean;
  /** Compiled runs map paths under sourceRoot to the same path under outRoot. */
  sourceRoot?: string;
  outRoot?: string;
}

// dist/shared/bootstrap -> dist, and backend/services beside it.
const OUT_ROOT = path.resolve(__dirname, "..", "..");

export const CURRENT_RUNTIME: ModuleRuntime = __filename.endsWith(".ts")
  ? { loadsTypeScript: true }
  : {
      loadsTypeScript: false,
      sourceRoot: path.resolve(OUT_ROOT, "..", "backend", "services"),
      outRoot: OUT_ROOT,
    };

// Tried in order after the bare path.
const SOURCE_SUFFIXES = [
  "",
  ".ts",
  ".js",
  ".cjs",
  `${path.sep}index.ts`,
  `${path.sep}index.js`,
];
const COMPILED_SUFFIXES = ["", ".js", ".cjs", `${path.sep}index.js`];

/**
 * Accepts either a path ("backend/services/docs/src/app") or a dotted
 * module name ("services.githubClient"). Dotted names only apply when
 * the string has no path separator.
 */
export function modulePathToFile(modulePath: string): string {
  const trimmed = modulePath.trim();
  if (trimmed.includes("/") || trimmed.includes("\\")) return trimmed;
  if (/\.(ts|js|cjs)$/.test(trimmed)) return trimmed;
  return trimmed.replace(/\./g, "/");
}

function candidateBases(base: string, runtime: ModuleRuntime): string[] {
  if (runtime.loadsTypeScript) return [base];
  const stem = base.replace(/\.ts$/, "");
  const { sourceRoot, outRoot } = runtime;
  if (!sourceRoot || !outRoot) return [stem];
  const rel = path.relative(sourceRoot, stem);
  if (rel.startsWith("..") || path.isAbsolute(rel)) return [stem];
  return [path.join(outRoot, rel), stem];
}

function firstFile(candidates: string[]): string | null {
  for (const candidate of candidates) {
    try {
      if (fs.statSync(candidate).isFile()) return candidate;
    } catch {
      // not this candidate
    }
  }
  return null;
}

/** Absolute file for a module path, or null when nothing matches. */
export function resolveModuleFile(
  modulePath: string,
  cwd: string = process.cwd(),
  runtime: ModuleRuntime = CURRENT_RUNTIME
): string | null {
  if (!modulePath.trim()) return null;
  const base = path.resolve(cwd, modulePathToFile(modulePath));
  const suffixes = runtime.loadsTypeScript ? SOURCE_SUFFIXES : COMPILED_SUFFIXES;
  return firstFile(
    candidateBases(base, runtime).flatMap((b) => suffixes.map((s) => b + s))
  );
}

export type LoadedModule = Record<string, unknown>;

/** Import a resolved file; works the same under tsx, vitest and compiled output. */
export async function importModule(file: string): Promise<LoadedModule> {
  const mod: unknown = await import(file);
  if (typeof mod !== "object" || mod === null) return {};
  return { ...mod };
}
