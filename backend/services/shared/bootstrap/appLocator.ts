// backend/services/shared/bootstrap/appLocator.ts

import type { RequestListener } from "node:http";
import { AppNotFoundError } from "./errors";
import { importModule, resolveModuleFile } from "./moduleResolver";

export type LifecycleHook = () => Promise<void> | void;

export interface LocatedApp {
  spec: string;
  file: string;
  listener: RequestListener;
  onStartup?: LifecycleHook;
  onShutdown?: LifecycleHook;
}

function splitSpec(spec: string): { modulePath: string; exportName: string } {
  const idx = spec.lastIndexOf(":");
  if (idx <= 0 || idx === spec.length - 1) {
    throw new AppNotFoundError(spec, 'expected "<module>:<export>"');
  }
  return { modulePath: spec.slice(0, idx), exportName: spec.slice(idx + 1) };
}

function isListener(v: unknown): v is RequestListener {
  // Express apps and plain (req, res) handlers are both callable.
  return typeof v === "function";
}

function optionalHook(v: unknown): LifecycleHook | undefined {
  if (typeof v !== "function") return undefined;
  return async () => {
    await v();
  };
}

/**
 * Resolve "<module>:<export>" to the request listener it names. The module
 * may also export onStartup/onShutdown hooks; they run around listen/close.
 */
export async function locateApp(
  spec: string,
  cwd: string = process.cwd()
): Promise<LocatedApp> {
  const { modulePath, exportName } = splitSpec(spec);

  const file = resolveModuleFile(modulePath, cwd);
  if (!file) {
    throw new AppNotFoundError(spec, `module "${modulePath}" not found`);
  }

  let mod: Record<string, unknown>;
  try {
    mod = await importModule(file);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new AppNotFoundError(spec, `module failed to load: ${reason}`);
  }

  if (!(exportName in mod)) {
    throw new AppNotFoundError(
      spec,
      `attribute "${exportName}" not found in module "${modulePath}"`
    );
  }
  const listener = mod[exportName];
  if (!isListener(listener)) {
    throw new AppNotFoundError(
      spec,
      `"${exportName}" is not a request listener`
    );
  }

  return {
    spec,
    file,
    listener,
    onStartup: optionalHook(mod.onStartup),
    onShutdown: optionalHook(mod.onShutdown),
  };
}
