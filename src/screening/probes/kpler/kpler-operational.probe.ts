import { RiskLevel } from '../../risk-level';
import { DetailRow } from '../../risk-record';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { optionalRecord, PayloadRecord, pickRow, toDetailValue } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';
import { kplerCompliance, kplerList, KplerRiskGroup } from './kpler-payload';

type RowMapper = (entry: PayloadRecord) => DetailRow;

export interface KplerListOptions {
  id: string;
  riskDescription: string;
  group: KplerRiskGroup;
  key: string;
  hitLevel: RiskLevel.MEDIUM | RiskLevel.HIGH;
  row: RowMapper;
}

/** Any entry in one of Kpler's per-vessel risk lists is a hit. */
export class KplerListProbe extends BaseProbe {
  readonly levels: readonly RiskLevel[];

  constructor(private readonly options: KplerListOptions) {
    super({ id: options.id, riskDescription: options.riskDescription, subjectPattern: IMO_NUMBER });
    this.levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, options.hitLevel];
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId', 'startDate', 'endDate'];
  }

  providers(): readonly string[] {
    return [ProviderIds.KPLER_VESSEL_RISKS];
  }

  protected classify(subjectId: string, _params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    const { group, key, hitLevel, row } = this.options;
    const entries = kplerList(kplerCompliance(payload, subjectId), group, key);
    return {
      level: entries.length > 0 ? hitLevel : RiskLevel.NO_RISK,
      rows: entries.map((entry) => ({ VesselImo: subjectId, ...row(entry) })),
    };
  }
}

const STS_COLUMNS = {
  ZoneName: 'zoneName',
  StartDate: 'startDate',
  EndDate: 'endDate',
  PortName: 'portName',
  CountryName: 'countryName',
  ShipToShip: 'shipToShip',
  SanctionedVessel: 'sanctionedVessel',
  SanctionedCargo: 'sanctionedCargo',
  SanctionedOwnership: 'sanctionedOwnership',
};

export function createKplerListProbes(): KplerListProbe[] {
  return [
    new KplerListProbe({
      id: 'has_sanctioned_companies_risk',
      riskDescription: 'Vessel linked to sanctioned companies',
      group: 'sanctionRisks',
      key: 'sanctionedCompanies',
      hitLevel: RiskLevel.HIGH,
      row: (company) => {
        const source = optionalRecord(company.source, 'sanctionedCompanies[].source');
        return {
          CompanyName: toDetailValue(company.name),
          CompanyTypeCode: toDetailValue(company.type),
          SanctionSource: toDetailValue(source.name),
          SanctionUrl: toDetailValue(source.url),
          SanctionStartDate: toDetailValue(source.startDate),
        };
      },
    }),
    new KplerListProbe({
      id: 'has_port_calls_risk',
      riskDescription: 'Port calls with sanctions exposure',
      group: 'operationalRisks',
      key: 'portCalls',
      hitLevel: RiskLevel.HIGH,
      row: (call) => pickRow(call, { ...STS_COLUMNS, Volume: 'volume' }),
    }),
    new KplerListProbe({
      id: 'has_ais_gap_risk',
      riskDescription: 'AIS gaps',
      group: 'operationalRisks',
      key: 'aisGaps',
      hitLevel: RiskLevel.MEDIUM,
      row: (gap) =>
        pickRow(gap, {
          StartDate: 'startDate',
          DraughtChange: 'draughtChange',
          DurationMin: 'durationMin',
          Zone: 'zone',
          Position: 'position',
        }),
    }),
    new KplerListProbe({
      id: 'has_ais_spoofs_risk',
      riskDescription: 'AIS spoofing',
      group: 'operationalRisks',
      key: 'aisSpoofs',
      hitLevel: RiskLevel.MEDIUM,
      row: (spoof) =>
        pickRow(spoof, { StartDate: 'startDate', EndDate: 'endDate', Position: 'position', DurationMin: 'durationMin' }),
    }),
    new KplerListProbe({
      id: 'has_dark_sts_risk',
      riskDescription: 'Dark ship-to-ship transfers',
      group: 'operationalRisks',
      key: 'darkStsEvents',
      hitLevel: RiskLevel.MEDIUM,
      row: (event) => {
        const stsVessel = optionalRecord(event.stsVessel, 'darkStsEvents[].stsVessel');
        const zone = optionalRecord(event.zone, 'darkStsEvents[].zone');
        return {
          Date: toDetailValue(event.date),
          StsVesselImo: toDetailValue(stsVessel.imo),
          StsVesselName: toDetailValue(stsVessel.name),
          ZoneId: toDetailValue(zone.id),
          ZoneName: toDetailValue(zone.name),
          Source: toDetailValue(event.source),
        };
      },
    }),
    new KplerListProbe({
      id: 'has_sts_events_risk',
      riskDescription: 'Ship-to-ship transfers',
      group: 'operationalRisks',
      key: 'stsEvents',
      hitLevel: RiskLevel.MEDIUM,
      row: (event) =>
        pickRow(event, {
          ...STS_COLUMNS,
          Vessel2Imo: 'vessel2Imo',
          Vessel2Name: 'vessel2Name',
          Vessel2SanctionedVessel: 'vessel2SanctionedVessel',
          Vessel2SanctionedOwnership: 'vessel2SanctionedOwnership',
        }),
    }),
  ];
}
