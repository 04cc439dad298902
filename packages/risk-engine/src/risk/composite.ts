// Composite Risk Calculator.
// Pure function of an IndexSet and the weight vectors admitted at startup.

import type { BehavioralWeightsV1, BlendV1, IndexSetV1, PhysicalWeightsV1 } from "@ews/contracts";
import { PHYSICAL_INDEX_KEYS, BEHAVIORAL_INDEX_KEYS } from "@ews/contracts";
import { clamp01 } from "../util";

export type RiskWeights = {
  physical: PhysicalWeightsV1;
  behavioral: BehavioralWeightsV1;
  blend: BlendV1;
};

export type CompositeRisk = {
  physical_risk: number;
  BI: number;
  extended_risk: number;
};

/** DANP-weighted sum of CAI, CDI, THI, TI, EI. */
export function physicalRisk(indices: IndexSetV1, weights: PhysicalWeightsV1): number {
  let sum = 0;
  for (const k of PHYSICAL_INDEX_KEYS) sum += weights[k] * clamp01(indices[k]);
  return clamp01(sum);
}

/** Behavioural Intention from attitude, subjective norm and perceived control. */
export function behavioralIntention(indices: IndexSetV1, weights: BehavioralWeightsV1): number {
  let sum = 0;
  for (const k of BEHAVIORAL_INDEX_KEYS) sum += weights[k] * clamp01(indices[k]);
  return clamp01(sum);
}

export function extendedRisk(physical: number, bi: number, blend: BlendV1): number {
  return clamp01(blend.physical * clamp01(physical) + blend.behavioral * clamp01(bi));
}

export function computeCompositeRisk(indices: IndexSetV1, weights: RiskWeights): CompositeRisk {
  const physical_risk = physicalRisk(indices, weights.physical);
  const BI = behavioralIntention(indices, weights.behavioral);
  return { physical_risk, BI, extended_risk: extendedRisk(physical_risk, BI, weights.blend) };
}
