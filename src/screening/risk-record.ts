import { RiskLevel } from './risk-level';

export type DetailValue =
  | string
  | number
  | boolean
  | null
  | readonly DetailValue[]
  | { readonly [key: string]: DetailValue };

/**
 * One provider-shaped row of evidence. Field names are whatever the provider
 * calls them; the framework only ever adds a `source` discriminator.
 */
export type DetailRow = Readonly<Record<string, DetailValue>>;

/** A single subject id, or role -> id for multi-party composites. */
export type SubjectRef = string | Readonly<Record<string, string>>;

export interface RiskRecord {
  readonly riskType: string;
  readonly riskDescription: string;
  readonly riskLevel: RiskLevel;
  readonly detailRows: readonly DetailRow[];
  readonly subjectRef: SubjectRef;
}

/**
 * Presentation shape returned to callers once a record has been decorated
 * with its description-table strings.
 */
export interface SerializedRiskRecord {
  riskType: string;
  riskDescription: string;
  riskLevel: RiskLevel;
  info: string;
  riskDescriptionInfo: string;
  detailRows: DetailRow[];
  subjectRef: SubjectRef;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function createRiskRecord(fields: {
  riskType: string;
  riskDescription: string;
  riskLevel: RiskLevel;
  detailRows?: readonly DetailRow[];
  subjectRef: SubjectRef;
}): RiskRecord {
  return deepFreeze({
    riskType: fields.riskType,
    riskDescription: fields.riskDescription,
    riskLevel: fields.riskLevel,
    detailRows: [...(fields.detailRows ?? [])],
    subjectRef: typeof fields.subjectRef === 'string' ? fields.subjectRef : { ...fields.subjectRef },
  });
}
