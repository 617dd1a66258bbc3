import { z } from "zod";
import type { LocatorSet } from "../screen";
import table from "./selectors.json";

export type LocatorName = keyof typeof table;

const LocatorTableSchema = z.record(z.string(), z.array(z.string().min(1)).min(1));

const parsedTable = LocatorTableSchema.parse(table);
const cache = new Map<LocatorName, LocatorSet>();

export function locator(name: LocatorName): LocatorSet {
  const cached = cache.get(name);
  if (cached) return cached;

  const selectors = parsedTable[name];
  if (!selectors) {
    throw new Error(`Unknown locator: ${name}`);
  }

  const set: LocatorSet = { name, selectors: Object.freeze([...selectors]) };
  cache.set(name, set);
  return set;
}

export function locators(...names: LocatorName[]): LocatorSet[] {
  return names.map((name) => locator(name));
}
