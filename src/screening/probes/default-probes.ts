import { ProbeRegistry } from '../probe-registry';
import { CompositeProbe } from './aggregate.probe';
import { EntityVerdictProbe } from './internal/entity-verdict.probe';
import { createKplerListProbes } from './kpler/kpler-operational.probe';
import { KplerSanctionsProbe } from './kpler/kpler-sanctions.probe';
import { AisManipulationProbe } from './lloyds/ais-manipulation.probe';
import { LloydsComplianceProbe } from './lloyds/lloyds-compliance.probe';
import { LloydsFlagProbe } from './lloyds/lloyds-flag.probe';
import { LloydsSanctionsProbe } from './lloyds/lloyds-sanctions.probe';
import { createVoyageRiskProbes } from './lloyds/voyage-risk.probe';
import { createReferenceListProbes } from './reference/reference-list.probe';

export const BusinessModules = {
  VESSEL: 'vessel',
  VOYAGE: 'voyage',
  COUNTERPARTY: 'counterparty',
} as const;

function composites(): CompositeProbe[] {
  return [
    new CompositeProbe({
      id: 'Vessel_is_sanction',
      riskDescription: 'Vessel on a sanctions list',
      components: ['lloyds_sanctions', 'kpler_sanctions'],
    }),
    new CompositeProbe({
      id: 'Vessel_ais_gap',
      riskDescription: 'AIS signal gaps',
      components: ['suspicious_ais_gap', 'has_ais_gap_risk'],
    }),
    new CompositeProbe({
      id: 'Vessel_Manipulation',
      riskDescription: 'AIS signal manipulation',
      components: ['ais_manipulation', 'has_ais_spoofs_risk'],
    }),
    new CompositeProbe({
      id: 'Vessel_risky_port_call',
      riskDescription: 'Risky port calls',
      components: ['high_risk_port', 'has_port_calls_risk'],
    }),
    new CompositeProbe({
      id: 'Vessel_dark_sts_events',
      riskDescription: 'Dark ship-to-ship events',
      components: ['dark_sts', 'has_dark_sts_risk'],
    }),
    new CompositeProbe({
      id: 'Vessel_sts_transfer',
      riskDescription: 'Ship-to-ship transfers',
      components: ['sanctioned_sts', 'has_sts_events_risk'],
    }),
    new CompositeProbe({
      id: 'Vessel_stakeholder_is_sanction',
      riskDescription: 'Vessel stakeholders under sanctions',
      components: ['lloyds_compliance', 'has_sanctioned_companies_risk'],
    }),
  ];
}

function multiPartyComposites(): CompositeProbe[] {
  return [
    new CompositeProbe({
      id: 'sts_counterparty_sanctions',
      riskDescription: 'Sanctions exposure of both vessels in a ship-to-ship transfer',
      components: [
        { role: 'vessel', probeId: 'Vessel_is_sanction' },
        { role: 'counterparty', probeId: 'Vessel_is_sanction' },
      ],
    }),
    new CompositeProbe({
      id: 'charter_parties_sanctions',
      riskDescription: 'Sanctions exposure of the parties to a charter',
      components: [
        { role: 'vessel', probeId: 'Vessel_is_sanction' },
        { role: 'vessel', probeId: 'uani_check' },
        { role: 'charterer', probeId: 'entity_verdict' },
        { role: 'owner', probeId: 'entity_verdict' },
      ],
    }),
  ];
}

/** Registers every built-in check. The caller seals the registry afterwards. */
export function registerDefaultProbes(registry: ProbeRegistry): ProbeRegistry {
  const vesselProbes = [
    new LloydsSanctionsProbe(),
    new KplerSanctionsProbe(),
    new LloydsFlagProbe(),
    new LloydsComplianceProbe(),
    new AisManipulationProbe(),
    ...createKplerListProbes(),
    ...createReferenceListProbes(),
  ];
  for (const probe of vesselProbes) {
    registry.register(probe.id, probe, { businessModule: BusinessModules.VESSEL });
  }
  for (const probe of createVoyageRiskProbes()) {
    registry.register(probe.id, probe, { businessModule: BusinessModules.VOYAGE });
  }
  registry.register('entity_verdict', new EntityVerdictProbe(), { businessModule: BusinessModules.COUNTERPARTY });

  for (const probe of composites()) {
    registry.register(probe.id, probe, { businessModule: BusinessModules.VESSEL });
  }
  for (const probe of multiPartyComposites()) {
    registry.register(probe.id, probe, { businessModule: BusinessModules.COUNTERPARTY });
  }
  return registry;
}
