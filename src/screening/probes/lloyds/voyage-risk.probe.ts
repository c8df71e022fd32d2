import { RiskLevel } from '../../risk-level';
import { DetailRow } from '../../risk-record';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { asRecord, optionalArray, optionalRecord, PayloadRecord, toDetailValue } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';
import { lloydsVoyages, riskTypesOf } from './lloyds-payload';

export interface VoyageRiskOptions {
  id: string;
  riskDescription: string;
  /** Voyage risk-type labels that count as a hit; any one is enough. */
  labels: readonly string[];
  /** Level reported when a voyage carries one of the labels. */
  hitLevel: RiskLevel.MEDIUM | RiskLevel.HIGH;
}

/**
 * Classifies a vessel by the risk-type labels Lloyd's attaches to its
 * voyages in the requested window. One detail row per labelled voyage.
 */
export class VoyageRiskProbe extends BaseProbe {
  readonly levels: readonly RiskLevel[];
  protected readonly labels: ReadonlySet<string>;
  private readonly hitLevel: RiskLevel;

  constructor(options: VoyageRiskOptions) {
    super({ id: options.id, riskDescription: options.riskDescription, subjectPattern: IMO_NUMBER });
    this.labels = new Set(options.labels);
    this.hitLevel = options.hitLevel;
    this.levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, options.hitLevel];
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId', 'startDate', 'endDate'];
  }

  providers(): readonly string[] {
    return [ProviderIds.LLOYDS_VOYAGE_EVENTS];
  }

  protected classify(subjectId: string, _params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    let hit = false;
    const rows: DetailRow[] = [];

    for (const [index, voyage] of lloydsVoyages(payload).entries()) {
      const path = `$.Data.Items[0].Voyages[${index}]`;
      const riskTypes = riskTypesOf(voyage, path);
      if (!riskTypes.some((label) => this.labels.has(label))) continue;

      hit = true;
      rows.push(...this.rowsFor(subjectId, voyage, riskTypes, path));
    }

    return { level: hit ? this.hitLevel : RiskLevel.NO_RISK, rows };
  }

  protected rowsFor(subjectId: string, voyage: PayloadRecord, riskTypes: string[], _path: string): DetailRow[] {
    return [
      {
        VesselImo: subjectId,
        VoyageId: toDetailValue(voyage.VoyageId),
        VoyageStartTime: toDetailValue(voyage.VoyageStartTime),
        VoyageEndTime: toDetailValue(voyage.VoyageEndTime),
        VoyageRiskRating: toDetailValue(voyage.VoyageRiskRating),
        StartPlace: toDetailValue(voyage.VoyageStartPlace ?? {}),
        EndPlace: toDetailValue(voyage.VoyageEndPlace ?? {}),
        RiskTypes: riskTypes,
      },
    ];
  }
}

const SANCTIONED_EEZ = new Set(
  [
    'Cuban Exclusive Economic Zone',
    'Iranian Exclusive Economic Zone',
    'Syrian Exclusive Economic Zone',
    'Overlapping claim Ukrainian Exclusive Economic Zone',
    'North Korean Exclusive Economic Zone',
    'Venezuelan Exclusive Economic Zone',
    'Russian Exclusive Economic Zone',
  ].map((name) => name.toLowerCase()),
);

export function isSanctionedEez(name: unknown): boolean {
  return typeof name === 'string' && SANCTIONED_EEZ.has(name.trim().toLowerCase());
}

/**
 * Suspicious AIS gaps report one row per flagged gap event rather than per
 * voyage, marking gaps that start inside a sanctioned EEZ.
 */
export class SuspiciousAisGapProbe extends VoyageRiskProbe {
  constructor() {
    super({
      id: 'suspicious_ais_gap',
      riskDescription: 'Suspicious AIS gap',
      labels: ['Suspicious AIS Gap'],
      hitLevel: RiskLevel.MEDIUM,
    });
  }

  protected rowsFor(subjectId: string, voyage: PayloadRecord, _riskTypes: string[], path: string): DetailRow[] {
    const events = optionalRecord(voyage.VoyageEvents, `${path}.VoyageEvents`);
    const rows: DetailRow[] = [];

    for (const [index, entry] of optionalArray(events.AisGap, `${path}.VoyageEvents.AisGap`).entries()) {
      const gapPath = `${path}.VoyageEvents.AisGap[${index}]`;
      const gap = asRecord(entry, gapPath);
      const gapRiskTypes = riskTypesOf(gap, gapPath);
      if (!gapRiskTypes.some((label) => this.labels.has(label))) continue;

      rows.push({
        VesselImo: subjectId,
        VoyageStartTime: toDetailValue(voyage.VoyageStartTime),
        VoyageEndTime: toDetailValue(voyage.VoyageEndTime),
        VoyageRiskRating: toDetailValue(voyage.VoyageRiskRating),
        AisGapStartDateTime: toDetailValue(gap.AisGapStartDateTime),
        AisGapEndDateTime: toDetailValue(gap.AisGapEndDateTime),
        AisGapStartEezName: toDetailValue(gap.AisGapStartEezName ?? ''),
        IsSanctionedEez: isSanctionedEez(gap.AisGapStartEezName),
        RiskTypes: gapRiskTypes,
      });
    }
    return rows;
  }
}

export function createVoyageRiskProbes(): VoyageRiskProbe[] {
  return [
    new VoyageRiskProbe({
      id: 'high_risk_port',
      riskDescription: 'High risk port calling',
      labels: ['High Risk Port Calling'],
      hitLevel: RiskLevel.HIGH,
    }),
    new VoyageRiskProbe({
      id: 'possible_dark_port',
      riskDescription: 'Possible dark port calling',
      labels: ['Possible Dark Port Calling', 'Probable Dark Port Calling'],
      hitLevel: RiskLevel.HIGH,
    }),
    new VoyageRiskProbe({
      id: 'dark_sts',
      riskDescription: 'Dark ship-to-ship transfer',
      labels: [
        'Possible 1-way Dark STS (as dark party)',
        'Possible 2-way Dark STS (as dark party)',
        'Probable 2 way dark STS',
      ],
      hitLevel: RiskLevel.HIGH,
    }),
    new VoyageRiskProbe({
      id: 'sanctioned_sts',
      riskDescription: 'Ship-to-ship transfer with a sanctioned vessel',
      labels: ['STS With a Sanctioned Vessel'],
      hitLevel: RiskLevel.HIGH,
    }),
    new SuspiciousAisGapProbe(),
    new VoyageRiskProbe({
      id: 'loitering_behavior',
      riskDescription: 'Loitering behaviour',
      labels: ['Loitering'],
      hitLevel: RiskLevel.MEDIUM,
    }),
  ];
}
