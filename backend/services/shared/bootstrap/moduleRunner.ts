// backend/services/shared/bootstrap/moduleRunner.ts

import { ModuleNotFoundError } from "./errors";
import { importModule, resolveModuleFile } from "./moduleResolver";

export interface ModuleRunResult {
  file: string;
  /** False when the module has no `main` export and ran for side effects only. */
  ranMain: boolean;
}

/**
 * Run one module as the entry point: import it, then await its `main(args)`
 * when it exports one.
 */
export async function runModule(
  modulePath: string,
  args: string[] = [],
  cwd: string = process.cwd()
): Promise<ModuleRunResult> {
  const file = resolveModuleFile(modulePath, cwd);
  if (!file) throw new ModuleNotFoundError(modulePath);

  const mod = await importModule(file);
  const main = mod.main;
  if (typeof main !== "function") return { file, ranMain: false };

  await main(args);
  return { file, ranMain: true };
}
