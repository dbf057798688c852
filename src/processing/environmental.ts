/**
 * Environmental Impact Classification
 *
 * EA detail pages carry free-text water/land/air impact fields. They are
 * reduced to an overall severity, a primary receptor and presence flags.
 */
import type {
  EnvironmentalImpact,
  EnvironmentalReceptor,
  ImpactFlags,
} from "../shared/types/record.types";

export interface ImpactFields {
  water: string | null;
  land: string | null;
  air: string | null;
}

const RECEPTOR_ORDER: readonly EnvironmentalReceptor[] = ["water", "land", "air"];

/** A field counts as an impact unless it is empty or says there was none */
function hasImpact(value: string | null): boolean {
  if (!value) return false;
  return !/^(none|no impact|n\/a|not applicable|-)$/i.test(value.trim());
}

export function assessImpact(fields: ImpactFields): EnvironmentalImpact {
  const texts = RECEPTOR_ORDER.map((receptor) => fields[receptor] ?? "");
  if (texts.some((text) => /\bmajor\b/i.test(text))) return "major";
  if (texts.some((text) => /\bminor\b/i.test(text))) return "minor";
  return "none";
}

/** First receptor (water, land, air) with a recorded impact */
export function primaryReceptor(fields: ImpactFields): EnvironmentalReceptor | null {
  return RECEPTOR_ORDER.find((receptor) => hasImpact(fields[receptor])) ?? null;
}

export function impactFlags(fields: ImpactFields): ImpactFlags {
  return {
    water: hasImpact(fields.water),
    land: hasImpact(fields.land),
    air: hasImpact(fields.air),
  };
}
