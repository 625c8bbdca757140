import type { Project } from "../../types/project";
import type { FeatureFlags } from "../../config/features";
import { featureFlags as defaultFlags } from "../../config/features";

export type DocumentType = "canopy-quotation" | "recoair-quotation";

export const DOCUMENT_TITLES: Record<DocumentType, string> = {
  "canopy-quotation": "Canopy Quotation",
  "recoair-quotation": "RecoAir Quotation",
};

/** Which quotation documents a project calls for, in bundle order. */
export function documentTypesFor(project: Project, flags: FeatureFlags = defaultFlags): DocumentType[] {
  const areas = project.levels.flatMap((level) => level.areas);
  const types: DocumentType[] = [];
  if (areas.some((area) => area.items.length > 0)) types.push("canopy-quotation");
  if (flags.isEnabled("recoair") && areas.some((area) => area.options.recoair !== undefined)) {
    types.push("recoair-quotation");
  }
  return types;
}
