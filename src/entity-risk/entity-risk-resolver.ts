import { DescriptionTable } from '../descriptions/description-table';
import { isWithinDays, parseCalendarDay, RECENT_EVENT_DAYS } from '../screening/dates';
import { RiskLevel } from '../screening/risk-level';
import { DetailRow } from '../screening/risk-record';
import {
  AssociatedParty,
  BucketEntry,
  BucketLevel,
  DERIVED_SIGNALS,
  DerivedSignal,
  EntityAttributes,
  FLAG_SIGNALS,
  FlagSignal,
  isBucketLevel,
  ResolvedEntityRisk,
  SignalRow,
  SignalType,
  VerdictLevel,
} from './signal-row';

export interface ResolverReference {
  evaluatedAt: Date;
  sanctionedCountries: readonly string[];
  descriptions: DescriptionTable;
  recentDays?: number;
}

interface DerivedOutcome {
  level: BucketLevel;
  rows: DetailRow[];
}

const FLAGGED_LEVELS: readonly BucketLevel[] = [RiskLevel.HIGH, RiskLevel.MEDIUM, RiskLevel.UNDETERMINED];

function hasText(value: string | null): value is string {
  return value !== null && value.trim() !== '';
}

function normalizeCountry(value: string): string {
  return value.trim().toLowerCase();
}

function distinctSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

function uniqueRows(rows: DetailRow[]): DetailRow[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    const key = JSON.stringify(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function project(signal: FlagSignal, row: SignalRow): DetailRow | undefined {
  if (signal === 'is_sco') {
    return hasText(row.scopeDescription) ? { scopeDescription: row.scopeDescription } : undefined;
  }
  return {
    endTime: row.endTime,
    startTime: row.startTime,
    sanctionsName: row.sanctionsName,
    sanctionDescription: row.sanctionDescription,
  };
}

function attributesOf(row: SignalRow): EntityAttributes {
  return {
    entityId: row.entityId,
    entityDate: row.entityDate,
    activeStatus: row.activeStatus,
    primaryName: row.primaryName,
    secondaryName: row.secondaryName,
    primaryCountry: row.primaryCountry,
    secondaryCountry: row.secondaryCountry,
    dateValue: row.dateValue,
  };
}

/**
 * Recency of the entity's event dates. Values that do not parse are ignored;
 * an entity with no parseable date is undetermined.
 */
export function resolveRecency(rows: readonly SignalRow[], evaluatedAt: Date, days = RECENT_EVENT_DAYS): DerivedOutcome {
  const parsed: Array<{ value: string; day: number }> = [];
  for (const row of rows) {
    const day = parseCalendarDay(row.dateValue);
    if (row.dateValue !== null && day !== undefined) {
      parsed.push({ value: row.dateValue, day });
    }
  }
  if (parsed.length === 0) {
    const values = distinctSorted(rows.flatMap((row) => (hasText(row.dateValue) ? [row.dateValue] : [])));
    return { level: RiskLevel.UNDETERMINED, rows: values.map((dateValue) => ({ dateValue })) };
  }
  const recent = parsed.filter((entry) => isWithinDays(entry.day, evaluatedAt, days));
  if (recent.length === 0) {
    return { level: RiskLevel.NO_RISK, rows: [] };
  }
  return { level: RiskLevel.MEDIUM, rows: distinctSorted(recent.map((entry) => entry.value)).map((dateValue) => ({ dateValue })) };
}

/** Membership of the entity's primary country in the sanctioned country list. */
export function resolveCountryExposure(rows: readonly SignalRow[], sanctionedCountries: readonly string[]): DerivedOutcome {
  const countries = rows.flatMap((row) => (hasText(row.primaryCountry) ? [row.primaryCountry] : []));
  if (countries.length === 0) {
    return { level: RiskLevel.UNDETERMINED, rows: [] };
  }
  const sanctioned = new Set(sanctionedCountries.map(normalizeCountry));
  const matched = countries.filter((country) => sanctioned.has(normalizeCountry(country)));
  if (matched.length === 0) {
    return { level: RiskLevel.NO_RISK, rows: [] };
  }
  return { level: RiskLevel.MEDIUM, rows: distinctSorted(matched).map((primaryCountry) => ({ primaryCountry })) };
}

/**
 * HIGH when any pre-classified signal is high. MEDIUM when any signal,
 * pre-classified or derived, is medium. Undetermined signals never raise
 * the verdict.
 */
export function finalVerdict(flagLevels: Iterable<BucketLevel>, derivedLevels: Iterable<BucketLevel>): VerdictLevel {
  const flags = [...flagLevels];
  if (flags.includes(RiskLevel.HIGH)) return RiskLevel.HIGH;
  if (flags.includes(RiskLevel.MEDIUM) || [...derivedLevels].includes(RiskLevel.MEDIUM)) return RiskLevel.MEDIUM;
  return RiskLevel.NO_RISK;
}

function groupByEntity(rows: readonly SignalRow[]): Map<string, SignalRow[]> {
  const groups = new Map<string, SignalRow[]>();
  const seen = new Set<string>();
  for (const row of rows) {
    const identity = JSON.stringify(row);
    if (seen.has(identity)) continue;
    seen.add(identity);
    const group = groups.get(row.entityId);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.entityId, [row]);
    }
  }
  return groups;
}

class EntityResolution {
  readonly high: BucketEntry[] = [];
  readonly medium: BucketEntry[] = [];
  readonly undetermined: BucketEntry[] = [];
  readonly none: BucketEntry[] = [];

  constructor(private readonly descriptions: DescriptionTable) {}

  add(riskType: SignalType, riskLevel: BucketLevel, detailRows: DetailRow[]): void {
    const text = this.descriptions.lookup(riskType, riskLevel);
    const entry: BucketEntry = { riskType, riskLevel, ...text, detailRows };
    this.bucket(riskLevel).push(entry);
  }

  private bucket(level: BucketLevel): BucketEntry[] {
    switch (level) {
      case RiskLevel.HIGH:
        return this.high;
      case RiskLevel.MEDIUM:
        return this.medium;
      case RiskLevel.UNDETERMINED:
        return this.undetermined;
      case RiskLevel.NO_RISK:
        return this.none;
    }
  }
}

function resolveEntity(rows: SignalRow[], reference: ResolverReference, parties: AssociatedParty[]): ResolvedEntityRisk {
  const resolution = new EntityResolution(reference.descriptions);
  const flagLevels: BucketLevel[] = [];

  for (const signal of FLAG_SIGNALS) {
    const levels = rows.map((row) => row.flags[signal]).filter(isBucketLevel);
    flagLevels.push(...levels);
    for (const level of FLAGGED_LEVELS) {
      const matching = rows.filter((row) => row.flags[signal] === level);
      if (matching.length === 0) continue;
      const detailRows = matching.flatMap((row) => {
        const projected = project(signal, row);
        return projected ? [projected] : [];
      });
      resolution.add(signal, level, uniqueRows(detailRows));
    }
    if (!levels.some((level) => FLAGGED_LEVELS.includes(level))) {
      resolution.add(signal, RiskLevel.NO_RISK, []);
    }
  }

  const derived: Record<DerivedSignal, DerivedOutcome> = {
    is_one_year: resolveRecency(rows, reference.evaluatedAt, reference.recentDays),
    is_sanctioned_countries: resolveCountryExposure(rows, reference.sanctionedCountries),
  };
  for (const signal of DERIVED_SIGNALS) {
    resolution.add(signal, derived[signal].level, derived[signal].rows);
  }

  return {
    ...attributesOf(rows[0]),
    sanctionsLevel: finalVerdict(flagLevels, Object.values(derived).map((outcome) => outcome.level)),
    high: resolution.high,
    medium: resolution.medium,
    undetermined: resolution.undetermined,
    none: resolution.none,
    associatedParties: parties,
  };
}

/**
 * Resolves joined signal rows into one verdict per entity. Pure: everything
 * time- or reference-dependent comes in through `reference`.
 */
export function resolveEntityRisk(
  rows: readonly SignalRow[],
  reference: ResolverReference,
  associatedParties: readonly AssociatedParty[] = [],
): ResolvedEntityRisk[] {
  const partiesByEntity = new Map<string, AssociatedParty[]>();
  for (const party of associatedParties) {
    const list = partiesByEntity.get(party.entityId) ?? [];
    list.push(party);
    partiesByEntity.set(party.entityId, list);
  }

  return [...groupByEntity(rows).values()].map((group) =>
    resolveEntity(group, reference, partiesByEntity.get(group[0].entityId) ?? []),
  );
}
