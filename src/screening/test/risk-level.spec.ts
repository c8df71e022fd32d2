import {
  ALL_RISK_LEVELS,
  compareRiskLevels,
  foldRiskLevels,
  isDeterminate,
  mergeRiskLevels,
  parseRiskLevel,
  RiskLevel,
} from '../risk-level';

describe('risk levels', () => {
  const determinate = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.LOW, RiskLevel.MEDIUM, RiskLevel.HIGH];

  describe('mergeRiskLevels', () => {
    it('should order determinate levels from no data to high', () => {
      expect(mergeRiskLevels(RiskLevel.NO_DATA, RiskLevel.NO_RISK)).toBe(RiskLevel.NO_RISK);
      expect(mergeRiskLevels(RiskLevel.NO_RISK, RiskLevel.LOW)).toBe(RiskLevel.LOW);
      expect(mergeRiskLevels(RiskLevel.LOW, RiskLevel.MEDIUM)).toBe(RiskLevel.MEDIUM);
      expect(mergeRiskLevels(RiskLevel.HIGH, RiskLevel.MEDIUM)).toBe(RiskLevel.HIGH);
    });

    it('should be commutative, associative and idempotent over determinate levels', () => {
      for (const a of determinate) {
        expect(mergeRiskLevels(a, a)).toBe(a);
        for (const b of determinate) {
          expect(mergeRiskLevels(a, b)).toBe(mergeRiskLevels(b, a));
          for (const c of determinate) {
            expect(mergeRiskLevels(mergeRiskLevels(a, b), c)).toBe(mergeRiskLevels(a, mergeRiskLevels(b, c)));
          }
        }
      }
    });

    it('should never rank the merge below either input for any pair of levels', () => {
      for (const a of ALL_RISK_LEVELS) {
        for (const b of ALL_RISK_LEVELS) {
          const merged = mergeRiskLevels(a, b);
          expect(compareRiskLevels(merged, a)).toBeGreaterThanOrEqual(0);
          expect(compareRiskLevels(merged, b)).toBeGreaterThanOrEqual(0);
          expect([a, b]).toContain(merged);
        }
      }
    });

    it('should be commutative and associative including undetermined', () => {
      for (const a of ALL_RISK_LEVELS) {
        for (const b of ALL_RISK_LEVELS) {
          expect(mergeRiskLevels(a, b)).toBe(mergeRiskLevels(b, a));
          for (const c of ALL_RISK_LEVELS) {
            expect(mergeRiskLevels(mergeRiskLevels(a, b), c)).toBe(mergeRiskLevels(a, mergeRiskLevels(b, c)));
          }
        }
      }
    });

    it('should let a determinate level win over undetermined', () => {
      expect(mergeRiskLevels(RiskLevel.UNDETERMINED, RiskLevel.NO_DATA)).toBe(RiskLevel.NO_DATA);
      expect(mergeRiskLevels(RiskLevel.LOW, RiskLevel.UNDETERMINED)).toBe(RiskLevel.LOW);
    });
  });

  describe('foldRiskLevels', () => {
    it('should return no data for an empty list', () => {
      expect(foldRiskLevels([])).toBe(RiskLevel.NO_DATA);
    });

    it('should return the most severe level', () => {
      expect(foldRiskLevels([RiskLevel.NO_RISK, RiskLevel.HIGH, RiskLevel.NO_DATA])).toBe(RiskLevel.HIGH);
      expect(foldRiskLevels([RiskLevel.NO_DATA, RiskLevel.NO_DATA])).toBe(RiskLevel.NO_DATA);
    });

    it('should ignore undetermined when anything else is present', () => {
      expect(foldRiskLevels([RiskLevel.UNDETERMINED, RiskLevel.NO_RISK])).toBe(RiskLevel.NO_RISK);
      expect(foldRiskLevels([RiskLevel.UNDETERMINED])).toBe(RiskLevel.UNDETERMINED);
    });
  });

  it('should sort undetermined below every determinate level', () => {
    const sorted = [RiskLevel.HIGH, RiskLevel.UNDETERMINED, RiskLevel.NO_DATA, RiskLevel.MEDIUM].sort(compareRiskLevels);
    expect(sorted).toEqual([RiskLevel.UNDETERMINED, RiskLevel.NO_DATA, RiskLevel.MEDIUM, RiskLevel.HIGH]);
  });

  it('should parse stored levels case-insensitively', () => {
    expect(parseRiskLevel(' HIGH ')).toBe(RiskLevel.HIGH);
    expect(parseRiskLevel('no_risk')).toBe(RiskLevel.NO_RISK);
    expect(parseRiskLevel('severe')).toBeUndefined();
    expect(parseRiskLevel(3)).toBeUndefined();
  });

  it('should treat only undetermined as indeterminate', () => {
    expect(determinate.every(isDeterminate)).toBe(true);
    expect(isDeterminate(RiskLevel.UNDETERMINED)).toBe(false);
  });
});
