import { admitEngineConfig, computeConfigHash, createRiskEngine } from "@ews/risk-engine";
import type { Clock, RiskEngine } from "@ews/risk-engine";
import type { EngineConfigV1 } from "@ews/contracts";

export type EwsRuntimeOptions = {
  clock: Clock;
};

/**
 * One RiskEngine per configured zone, built once from an admitted config.
 * @throws EngineConfigRejected
 */
export class EwsRuntime {
  readonly config: EngineConfigV1;
  readonly configHash: string;
  readonly defaultZone: string;

  private readonly engines = new Map<string, RiskEngine>();

  constructor(rawConfig: unknown, options: EwsRuntimeOptions) {
    this.config = admitEngineConfig(rawConfig);
    this.configHash = computeConfigHash(this.config);
    this.defaultZone = this.config.zones[0];
    for (const zone of this.config.zones) {
      this.engines.set(zone, createRiskEngine(this.config, { zoneId: zone, clock: options.clock }));
    }
  }

  zones(): string[] {
    return [...this.engines.keys()];
  }

  /** Engine for `zone`, the default zone when absent, null when unknown. */
  engine(zone: unknown): RiskEngine | null {
    if (typeof zone === "undefined" || zone === "") return this.engines.get(this.defaultZone) ?? null;
    if (typeof zone !== "string") return null;
    return this.engines.get(zone) ?? null;
  }
}
