import { RiskLevel } from '../screening/risk-level';
import { RiskRecord, SerializedRiskRecord } from '../screening/risk-record';

export interface DescriptionText {
  readonly riskDescription: string;
  readonly riskDescriptionInfo: string;
  readonly info: string;
}

export interface DescriptionEntry extends DescriptionText {
  readonly riskType: string;
  readonly riskLevel: RiskLevel;
}

const EMPTY: DescriptionText = Object.freeze({ riskDescription: '', riskDescriptionInfo: '', info: '' });

function keyOf(riskType: string, riskLevel: RiskLevel): string {
  return `${riskType}\u0000${riskLevel}`;
}

/**
 * Immutable (riskType, riskLevel) -> presentation strings snapshot. A missing
 * entry reads as empty strings.
 */
export class DescriptionTable {
  private readonly entries = new Map<string, DescriptionText>();

  constructor(entries: Iterable<DescriptionEntry> = []) {
    for (const entry of entries) {
      this.entries.set(
        keyOf(entry.riskType, entry.riskLevel),
        Object.freeze({
          riskDescription: entry.riskDescription,
          riskDescriptionInfo: entry.riskDescriptionInfo,
          info: entry.info,
        }),
      );
    }
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(riskType: string, riskLevel: RiskLevel): DescriptionText {
    return this.entries.get(keyOf(riskType, riskLevel)) ?? EMPTY;
  }

  /** Serializes a record for callers, adding its info strings. */
  decorate(record: RiskRecord): SerializedRiskRecord {
    const text = this.lookup(record.riskType, record.riskLevel);
    return {
      riskType: record.riskType,
      riskDescription: record.riskDescription,
      riskLevel: record.riskLevel,
      info: text.info,
      riskDescriptionInfo: text.riskDescriptionInfo,
      detailRows: [...record.detailRows],
      subjectRef: record.subjectRef,
    };
  }
}
