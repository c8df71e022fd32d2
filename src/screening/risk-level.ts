export enum RiskLevel {
  NO_DATA = 'no_data',
  NO_RISK = 'no_risk',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  UNDETERMINED = 'undetermined',
}

export type DeterminateRiskLevel = Exclude<RiskLevel, RiskLevel.UNDETERMINED>;

const SEVERITY: Record<DeterminateRiskLevel, number> = {
  [RiskLevel.NO_DATA]: 0,
  [RiskLevel.NO_RISK]: 1,
  [RiskLevel.LOW]: 2,
  [RiskLevel.MEDIUM]: 3,
  [RiskLevel.HIGH]: 4,
};

export const ALL_RISK_LEVELS: readonly RiskLevel[] = Object.values(RiskLevel);

export function isDeterminate(level: RiskLevel): level is DeterminateRiskLevel {
  return level !== RiskLevel.UNDETERMINED;
}

export function isRiskLevel(value: unknown): value is RiskLevel {
  return ALL_RISK_LEVELS.some((level) => level === value);
}

/**
 * Parses a stored or user-supplied level, returning undefined for anything
 * outside the vocabulary.
 */
export function parseRiskLevel(value: unknown): RiskLevel | undefined {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  return isRiskLevel(normalized) ? normalized : undefined;
}

/**
 * Orders levels by severity. UNDETERMINED sits below every determinate level
 * so it never outranks a real verdict when sorting.
 */
export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  const left = isDeterminate(a) ? SEVERITY[a] : -1;
  const right = isDeterminate(b) ? SEVERITY[b] : -1;
  return left - right;
}

export function mergeRiskLevels(a: RiskLevel, b: RiskLevel): RiskLevel {
  if (!isDeterminate(a)) return b;
  if (!isDeterminate(b)) return a;
  return SEVERITY[a] >= SEVERITY[b] ? a : b;
}

/**
 * Folds any number of component levels into one verdict. The empty fold is
 * NO_DATA: nothing was evaluated.
 */
export function foldRiskLevels(levels: Iterable<RiskLevel>): RiskLevel {
  let merged: RiskLevel | undefined;
  for (const level of levels) {
    merged = merged === undefined ? level : mergeRiskLevels(merged, level);
  }
  return merged ?? RiskLevel.NO_DATA;
}
