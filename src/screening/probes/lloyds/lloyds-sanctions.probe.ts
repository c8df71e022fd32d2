import { RiskLevel } from '../../risk-level';
import { DetailRow } from '../../risk-record';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { isBlank, optionalRecord, optionalString, pickRow } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';
import { lloydsItems } from './lloyds-payload';

// Sources whose current listings are treated as a hard hit.
const PRIORITY_SOURCES = new Set(['OFAC', 'EU', 'HM', 'UN']);

const SANCTION_COLUMNS = {
  VesselImo: 'vesselImo',
  VesselName: 'vesselName',
  VesselMmsi: 'vesselMmsi',
  SanctionId: 'sanctionId',
  Source: 'source',
  Type: 'type',
  Program: 'program',
  Name: 'name',
  FirstPublished: 'firstPublished',
  LastPublished: 'lastPublished',
  StartDate: 'startDate',
  EndDate: 'endDate',
  SanctionVesselDetails: 'sanctionVesselDetails',
  Aliases: 'aliases',
};

/**
 * Vessel sanctions listings from Lloyd's List Intelligence.
 *
 * A listing without an end date is current. Current listings from one of the
 * priority sources are HIGH; current listings elsewhere and purely historical
 * listings are MEDIUM.
 */
export class LloydsSanctionsProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.MEDIUM, RiskLevel.HIGH];

  constructor() {
    super({
      id: 'lloyds_sanctions',
      riskDescription: "Vessel sanctions listing (Lloyd's List Intelligence)",
      subjectPattern: IMO_NUMBER,
    });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId'];
  }

  providers(): readonly string[] {
    return [ProviderIds.LLOYDS_SANCTIONS];
  }

  protected classify(_subjectId: string, _params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    let current = false;
    let currentPriority = false;
    let historical = false;
    const rows: DetailRow[] = [];

    for (const [index, item] of lloydsItems(payload, 'items').entries()) {
      const sanction = optionalRecord(item.vesselSanctions, `$.Data.items[${index}].vesselSanctions`);
      if (Object.keys(sanction).length === 0) continue;

      rows.push(pickRow(sanction, SANCTION_COLUMNS));
      if (isBlank(sanction.endDate)) {
        current = true;
        const source = optionalString(sanction.source)?.trim().toUpperCase();
        if (source && PRIORITY_SOURCES.has(source)) currentPriority = true;
      } else {
        historical = true;
      }
    }

    if (current) {
      return { level: currentPriority ? RiskLevel.HIGH : RiskLevel.MEDIUM, rows };
    }
    return { level: historical ? RiskLevel.MEDIUM : RiskLevel.NO_RISK, rows };
  }
}
