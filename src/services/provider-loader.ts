import { isAbsolute, resolve } from "path";
import { pathToFileURL } from "url";
import { ConfigError } from "../core/errors";
import { logger } from "../core/logger";
import type { ScreenStateProvider } from "../platforms/screen";

export interface ProviderOptions {
  deviceSerial: string | null;
}

const REQUIRED_METHODS = [
  "exists",
  "click",
  "getText",
  "findAll",
  "setText",
  "tap",
  "swipe",
  "pressBack",
  "restartApp",
  "screenSize",
] as const;

export function isScreenStateProvider(value: unknown): value is ScreenStateProvider {
  if (typeof value !== "object" || value === null) return false;
  return REQUIRED_METHODS.every((method) => method in value && typeof Reflect.get(value, method) === "function");
}

function resolveSpecifier(specifier: string): string {
  if (specifier.startsWith(".") || isAbsolute(specifier)) {
    return pathToFileURL(resolve(process.cwd(), specifier)).href;
  }
  return specifier;
}

/**
 * Loads a device driver module. The module must export
 * `createScreenStateProvider(options)` returning a provider or a promise of one.
 */
export async function loadScreenStateProvider(
  specifier: string | undefined,
  options: ProviderOptions
): Promise<ScreenStateProvider> {
  if (!specifier) {
    throw new ConfigError("SCREEN_PROVIDER_MODULE is not set");
  }

  const mod: unknown = await import(resolveSpecifier(specifier));
  const factory: unknown = typeof mod === "object" && mod !== null ? Reflect.get(mod, "createScreenStateProvider") : undefined;
  if (typeof factory !== "function") {
    throw new ConfigError(`${specifier} does not export createScreenStateProvider`);
  }

  const provider: unknown = await factory(options);
  if (!isScreenStateProvider(provider)) {
    throw new ConfigError(`${specifier} returned an incomplete screen state provider`);
  }

  logger.info({ module: specifier, deviceSerial: options.deviceSerial }, "Screen state provider loaded");
  return provider;
}
