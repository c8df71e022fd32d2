/** Identifiers under which provider clients are registered with the orchestrator. */
export const ProviderIds = {
  LLOYDS_SANCTIONS: 'lloyds.sanctions',
  LLOYDS_RISK_SCORE: 'lloyds.riskScore',
  LLOYDS_COMPLIANCE: 'lloyds.compliance',
  LLOYDS_ADVANCED_COMPLIANCE: 'lloyds.advancedCompliance',
  LLOYDS_VOYAGE_EVENTS: 'lloyds.voyageEvents',
  KPLER_VESSEL_RISKS: 'kpler.vesselRisks',
  REFERENCE_UANI: 'reference.uani',
  REFERENCE_CARGO_COUNTRIES: 'reference.cargoCountries',
  REFERENCE_PORT_COUNTRIES: 'reference.portCountries',
  ENTITY_VERDICTS: 'internal.entityVerdicts',
} as const;

export type ProviderId = (typeof ProviderIds)[keyof typeof ProviderIds];
