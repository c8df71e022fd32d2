import { asRecord, optionalArray, optionalRecord, PayloadRecord } from '../payload';

/**
 * Kpler answers a batch lookup with one record per vessel:
 * `[{ vessel: { imo, ... }, compliance: { sanctionRisks, operationalRisks } }]`.
 * Returns the compliance block of the record for `imo`, or undefined when the
 * batch has no record for it.
 */
export function kplerCompliance(payload: unknown, imo: string): PayloadRecord | undefined {
  const records = Array.isArray(payload) ? payload : [payload];
  for (const [index, entry] of records.entries()) {
    const record = asRecord(entry, `$[${index}]`);
    const vessel = optionalRecord(record.vessel, `$[${index}].vessel`);
    if (String(vessel.imo) === imo) {
      return optionalRecord(record.compliance, `$[${index}].compliance`);
    }
  }
  return undefined;
}

export type KplerRiskGroup = 'sanctionRisks' | 'operationalRisks';

export function kplerList(compliance: PayloadRecord | undefined, group: KplerRiskGroup, key: string): PayloadRecord[] {
  if (!compliance) return [];
  const risks = optionalRecord(compliance[group], `compliance.${group}`);
  return optionalArray(risks[key], `compliance.${group}.${key}`).map((entry, index) =>
    asRecord(entry, `compliance.${group}.${key}[${index}]`),
  );
}
