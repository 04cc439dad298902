// packages/contracts/src/schema/index_set_v1.ts
import { z } from "zod";

const Unit = z.number().finite().min(0).max(1);

export const PHYSICAL_INDEX_KEYS = ["CAI", "CDI", "THI", "TI", "EI"] as const;
export const BEHAVIORAL_INDEX_KEYS = ["ATI", "SNI", "PCI"] as const;

export type PhysicalIndexKey = (typeof PHYSICAL_INDEX_KEYS)[number];
export type BehavioralIndexKey = (typeof BEHAVIORAL_INDEX_KEYS)[number];

export const IndexSetV1Schema = z
  .object({
    CAI: Unit, // crowd anxiety
    CDI: Unit, // crowd dynamics
    THI: Unit, // temperature-humidity
    TI: Unit, // time of day
    EI: Unit, // event intensity
    ATI: Unit, // attitude
    SNI: Unit, // subjective norm
    PCI: Unit, // perceived control
  })
  .strict();

export type IndexSetV1 = z.infer<typeof IndexSetV1Schema>;

/** Which input family produced the CAI base term. */
export const CaiBasisV1Schema = z.enum(["signals", "volatility", "density_only"]);
export type CaiBasisV1 = z.infer<typeof CaiBasisV1Schema>;
