import { RiskLevel } from '../screening/risk-level';
import { DetailRow } from '../screening/risk-record';

/** Signals pre-classified upstream, one level per source row. */
export const FLAG_SIGNALS = ['is_san', 'is_sco', 'is_ool'] as const;
export type FlagSignal = (typeof FLAG_SIGNALS)[number];

/** Signals the resolver derives from the entity's attributes. */
export const DERIVED_SIGNALS = ['is_one_year', 'is_sanctioned_countries'] as const;
export type DerivedSignal = (typeof DERIVED_SIGNALS)[number];

export type SignalType = FlagSignal | DerivedSignal;
export const SIGNAL_TYPES: readonly SignalType[] = [...FLAG_SIGNALS, ...DERIVED_SIGNALS];

export type BucketLevel = RiskLevel.HIGH | RiskLevel.MEDIUM | RiskLevel.UNDETERMINED | RiskLevel.NO_RISK;

export function isBucketLevel(level: RiskLevel | null | undefined): level is BucketLevel {
  return (
    level === RiskLevel.HIGH ||
    level === RiskLevel.MEDIUM ||
    level === RiskLevel.UNDETERMINED ||
    level === RiskLevel.NO_RISK
  );
}

export interface EntityAttributes {
  entityId: string;
  entityDate: string | null;
  activeStatus: string | null;
  primaryName: string | null;
  secondaryName: string | null;
  primaryCountry: string | null;
  secondaryCountry: string | null;
  /** Date of the entity's most relevant event, in either supported calendar format. */
  dateValue: string | null;
}

/** One joined source row for a subject entity. */
export interface SignalRow extends EntityAttributes {
  sanctionsName: string | null;
  sanctionDescription: string | null;
  scopeDescription: string | null;
  startTime: string | null;
  endTime: string | null;
  flags: Partial<Record<FlagSignal, RiskLevel | null>>;
}

export interface AssociatedParty {
  /** The subject entity the party is attached to. */
  entityId: string;
  partyId: string;
  partyName: string | null;
  level: RiskLevel | null;
  sourceType: string | null;
  relation: string | null;
}

export interface BucketEntry {
  riskType: SignalType;
  riskLevel: BucketLevel;
  riskDescription: string;
  riskDescriptionInfo: string;
  info: string;
  detailRows: DetailRow[];
}

export type VerdictLevel = RiskLevel.HIGH | RiskLevel.MEDIUM | RiskLevel.NO_RISK;

export interface ResolvedEntityRisk extends EntityAttributes {
  sanctionsLevel: VerdictLevel;
  high: BucketEntry[];
  medium: BucketEntry[];
  undetermined: BucketEntry[];
  none: BucketEntry[];
  associatedParties: AssociatedParty[];
}
