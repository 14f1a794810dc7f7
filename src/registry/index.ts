export * from "./types";
export * from "./registry";

import { StrategyRegistry, type RegistryTarget } from "./registry";
import type { Strategy } from "./types";
import { registerBuiltins } from "../strategies";
import { defaultReflector } from "../types/reflect";
import { rootLogger } from "../log/logger";

/**
 * The process-wide registry, seeded with the built-in strategies on first
 * import. Mutations are visible to every later dispatch.
 */
export const defaultRegistry = new StrategyRegistry(
  defaultReflector,
  rootLogger.child({ component: "registry" })
);

registerBuiltins(defaultRegistry);

export function registerSupport<T>(target: RegistryTarget, strategy: Strategy<T>): void {
  defaultRegistry.register(target, strategy);
}

export function deregisterSupport(target: RegistryTarget): void {
  defaultRegistry.deregister(target);
}
