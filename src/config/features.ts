import type { EquipmentKind } from "../types/project";
import { config } from "./index";

export interface FeatureFlags {
  isEnabled(kind: EquipmentKind): boolean;
}

const TOGGLEABLE: ReadonlySet<EquipmentKind> = new Set<EquipmentKind>([
  "cladding",
  "fireSuppression",
  "sdu",
  "uvc",
  "recoair",
  "reactaway",
]);

/**
 * Static, read-only switchboard for equipment kinds. The main unit kind is
 * always on: without it there is nothing to quote.
 */
export function createFeatureFlags(disabled: Iterable<string> = []): FeatureFlags {
  const off = new Set<string>();
  for (const name of disabled) {
    off.add(name.trim());
  }
  return {
    isEnabled(kind: EquipmentKind): boolean {
      if (!TOGGLEABLE.has(kind)) return true;
      return !off.has(kind);
    },
  };
}

export const ALL_FEATURES_ENABLED: FeatureFlags = createFeatureFlags();

export const featureFlags: FeatureFlags = createFeatureFlags(config.disabledFeatures);
