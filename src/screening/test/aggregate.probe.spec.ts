import { AggregationError, ConfigurationError } from '../errors';
import { CompositeProbe } from '../probes/aggregate.probe';
import { ALL_RISK_LEVELS, foldRiskLevels, RiskLevel } from '../risk-level';
import { createRiskRecord, DetailRow, RiskRecord } from '../risk-record';

function record(riskType: string, riskLevel: RiskLevel, detailRows: DetailRow[] = [], subjectRef = '9876543'): RiskRecord {
  return createRiskRecord({ riskType, riskDescription: riskType, riskLevel, detailRows, subjectRef });
}

describe('CompositeProbe', () => {
  const threeWay = new CompositeProbe({
    id: 'vessel_overview',
    riskDescription: 'Vessel overview',
    components: ['a', 'b', 'c'],
  });

  it('should report the most severe component level', () => {
    const combined = threeWay.combine([
      record('a', RiskLevel.NO_RISK),
      record('b', RiskLevel.MEDIUM),
      record('c', RiskLevel.NO_DATA),
    ]);

    expect(combined.riskType).toBe('vessel_overview');
    expect(combined.riskDescription).toBe('Vessel overview');
    expect(combined.riskLevel).toBe(RiskLevel.MEDIUM);
    expect(combined.subjectRef).toBe('9876543');
  });

  it('should fold five components regardless of order', () => {
    const fiveWay = new CompositeProbe({
      id: 'five',
      riskDescription: 'Five components',
      components: ['a', 'b', 'c', 'd', 'e'],
    });
    const levels = [RiskLevel.NO_DATA, RiskLevel.LOW, RiskLevel.NO_RISK, RiskLevel.HIGH, RiskLevel.MEDIUM];

    const forward = fiveWay.combine(levels.map((level, index) => record(String(index), level)));
    const backward = fiveWay.combine([...levels].reverse().map((level, index) => record(String(index), level)));

    expect(forward.riskLevel).toBe(RiskLevel.HIGH);
    expect(backward.riskLevel).toBe(RiskLevel.HIGH);
  });

  it('should match the fold of its component levels for every combination', () => {
    for (const a of ALL_RISK_LEVELS) {
      for (const b of ALL_RISK_LEVELS) {
        for (const c of ALL_RISK_LEVELS) {
          const folded = foldRiskLevels([a, b, c]);
          const expected = folded === RiskLevel.UNDETERMINED ? RiskLevel.NO_DATA : folded;

          const combined = threeWay.combine([record('a', a), record('b', b), record('c', c)]);

          expect(combined.riskLevel).toBe(expected);
        }
      }
    }
  });

  it('should fold five components to the same level in every rotation', () => {
    const fiveWay = new CompositeProbe({
      id: 'five_rotations',
      riskDescription: 'Five components',
      components: ['a', 'b', 'c', 'd', 'e'],
    });
    const levels = [RiskLevel.UNDETERMINED, RiskLevel.NO_RISK, RiskLevel.LOW, RiskLevel.NO_DATA, RiskLevel.MEDIUM];
    const expected = foldRiskLevels(levels);

    levels.forEach((_, offset) => {
      const rotated = [...levels.slice(offset), ...levels.slice(0, offset)];
      const combined = fiveWay.combine(rotated.map((level, index) => record(String(index), level)));
      expect(combined.riskLevel).toBe(expected);
    });
    expect(expected).toBe(RiskLevel.MEDIUM);
  });

  it('should be no data when every component is no data', () => {
    const combined = threeWay.combine([
      record('a', RiskLevel.NO_DATA),
      record('b', RiskLevel.NO_DATA),
      record('c', RiskLevel.NO_DATA),
    ]);

    expect(combined.riskLevel).toBe(RiskLevel.NO_DATA);
    expect(combined.detailRows).toEqual([]);
  });

  it('should map an undetermined fold to no data', () => {
    const combined = threeWay.combine([
      record('a', RiskLevel.UNDETERMINED),
      record('b', RiskLevel.UNDETERMINED),
      record('c', RiskLevel.UNDETERMINED),
    ]);

    expect(combined.riskLevel).toBe(RiskLevel.NO_DATA);
  });

  it('should concatenate rows in component order and tag their source', () => {
    const combined = threeWay.combine([
      record('a', RiskLevel.HIGH, [{ SanctionId: 'S-1' }, { SanctionId: 'S-2' }]),
      record('b', RiskLevel.NO_RISK),
      record('c', RiskLevel.MEDIUM, [{ ZoneName: 'Gulf' }]),
    ]);

    expect(combined.detailRows).toEqual([
      { SanctionId: 'S-1', source: 'a' },
      { SanctionId: 'S-2', source: 'a' },
      { ZoneName: 'Gulf', source: 'c' },
    ]);
  });

  it('should reject a record count that does not match its components', () => {
    expect(() => threeWay.combine([record('a', RiskLevel.HIGH)])).toThrow(AggregationError);
  });

  it('should map role-bound components to a subject per role', () => {
    const parties = new CompositeProbe({
      id: 'parties',
      riskDescription: 'Parties',
      components: [
        { role: 'vessel', probeId: 'v' },
        { role: 'owner', probeId: 'o' },
      ],
    });

    const combined = parties.combine([
      record('v', RiskLevel.NO_RISK, [{ Name: 'vessel' }], '1111111'),
      record('o', RiskLevel.HIGH, [], 'OWNER-1'),
    ]);

    expect(combined.subjectRef).toEqual({ vessel: '1111111', owner: 'OWNER-1' });
    expect(combined.detailRows).toEqual([{ Name: 'vessel', source: 'vessel:v' }]);
    expect(parties.componentProbeIds()).toEqual(['vessel:v', 'owner:o']);
  });

  it('should refuse fewer than two components or duplicates', () => {
    expect(() => new CompositeProbe({ id: 'solo', riskDescription: 'Solo', components: ['a'] })).toThrow(
      ConfigurationError,
    );
    expect(() => new CompositeProbe({ id: 'dup', riskDescription: 'Dup', components: ['a', 'a'] })).toThrow(
      'Aggregate dup lists component a twice',
    );
  });

  it('should stand in a no data record for a failed component', () => {
    const recovered = threeWay.recoverComponent('b', '9876543', new Error('boom'));

    expect(recovered).toEqual({
      riskType: 'b',
      riskDescription: '',
      riskLevel: RiskLevel.NO_DATA,
      detailRows: [],
      subjectRef: '9876543',
    });
  });
});
