import { RiskLevel } from '../../risk-level';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { isBlank, isPlainRecord, pickRow } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';
import { kplerCompliance, kplerList } from './kpler-payload';

const SANCTION_COLUMNS = {
  VesselImo: 'vesselImo',
  VesselName: 'vesselName',
  SanctionId: 'sanctionId',
  Source: 'source',
  Type: 'type',
  Program: 'program',
  Name: 'name',
  FirstPublished: 'firstPublished',
  LastPublished: 'lastPublished',
  StartDate: 'startDate',
  EndDate: 'endDate',
  Aliases: 'aliases',
  RiskLevel: 'riskLevel',
  Description: 'description',
};

/**
 * Sanctioned-vessel entries reported by Kpler. Any entry without an end date
 * is a current listing (HIGH); ended listings alone are MEDIUM.
 */
export class KplerSanctionsProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.MEDIUM, RiskLevel.HIGH];

  constructor() {
    super({
      id: 'kpler_sanctions',
      riskDescription: 'Vessel sanctions listing (Kpler)',
      subjectPattern: IMO_NUMBER,
    });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId'];
  }

  providers(): readonly string[] {
    return [ProviderIds.KPLER_VESSEL_RISKS];
  }

  protected classify(subjectId: string, _params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    const entries = kplerList(kplerCompliance(payload, subjectId), 'sanctionRisks', 'sanctionedVessels');
    if (entries.length === 0) {
      return { level: RiskLevel.NO_RISK, rows: [] };
    }

    // some feeds carry the end date on the listing source instead of the entry
    const current = entries.some((entry) => {
      const sourceEnd = isPlainRecord(entry.source) ? entry.source.endDate : undefined;
      return isBlank(entry.endDate) && isBlank(sourceEnd);
    });

    return {
      level: current ? RiskLevel.HIGH : RiskLevel.MEDIUM,
      rows: entries.map((entry) => pickRow(entry, SANCTION_COLUMNS)),
    };
  }
}
