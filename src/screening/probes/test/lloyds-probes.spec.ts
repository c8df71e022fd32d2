import { ProviderError } from '../../errors';
import { FetchOutcome } from '../../fetch-cache';
import { RiskLevel } from '../../risk-level';
import { DEFAULT_PARAMS, lloydsEnvelope, providerData } from '../../test/probe.factory';
import { AisManipulationProbe } from '../lloyds/ais-manipulation.probe';
import { LloydsComplianceProbe } from '../lloyds/lloyds-compliance.probe';
import { LloydsFlagProbe } from '../lloyds/lloyds-flag.probe';
import { LloydsSanctionsProbe } from '../lloyds/lloyds-sanctions.probe';
import { createVoyageRiskProbes, VoyageRiskProbe } from '../lloyds/voyage-risk.probe';
import { ProviderIds } from '../provider-ids';

const IMO = '9876543';

function voyageProbe(id: string): VoyageRiskProbe {
  const probe = createVoyageRiskProbes().find((candidate) => candidate.id === id);
  if (!probe) {
    throw new Error(`no voyage probe ${id}`);
  }
  return probe;
}

describe("Lloyd's probes", () => {
  describe('LloydsSanctionsProbe', () => {
    const probe = new LloydsSanctionsProbe();

    function sanctions(...entries: Record<string, unknown>[]): Map<string, FetchOutcome> {
      return providerData({
        [ProviderIds.LLOYDS_SANCTIONS]: lloydsEnvelope(
          entries.map((vesselSanctions) => ({ vesselSanctions })),
          'items',
        ),
      });
    }

    it('should be high for a current listing from a priority source', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, sanctions({ vesselImo: IMO, sanctionId: 'S-1', source: 'OFAC', endDate: '' }));

      expect(record.riskLevel).toBe(RiskLevel.HIGH);
      expect(record.detailRows).toEqual([
        {
          VesselImo: IMO,
          VesselName: null,
          VesselMmsi: null,
          SanctionId: 'S-1',
          Source: 'OFAC',
          Type: null,
          Program: null,
          Name: null,
          FirstPublished: null,
          LastPublished: null,
          StartDate: null,
          EndDate: '',
          SanctionVesselDetails: null,
          Aliases: null,
        },
      ]);
    });

    it('should be medium for a current listing from another source', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, sanctions({ source: 'Local Registry' }));
      expect(record.riskLevel).toBe(RiskLevel.MEDIUM);
    });

    it('should be medium when every listing has ended', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, sanctions({ source: 'OFAC', endDate: '2022-01-31' }));
      expect(record.riskLevel).toBe(RiskLevel.MEDIUM);
      expect(record.detailRows).toHaveLength(1);
    });

    it('should be no risk without listings', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, sanctions());
      expect(record.riskLevel).toBe(RiskLevel.NO_RISK);
      expect(record.detailRows).toEqual([]);
    });

    it('should be no data for a malformed IMO number', () => {
      const record = probe.evaluate('98765', DEFAULT_PARAMS, sanctions({ source: 'OFAC' }));
      expect(record.riskLevel).toBe(RiskLevel.NO_DATA);
      expect(record.subjectRef).toBe('98765');
    });

    it('should be no data when the provider failed', () => {
      const failed = new Map<string, FetchOutcome>([
        [
          ProviderIds.LLOYDS_SANCTIONS,
          { status: 'failed', error: ProviderError.timeout(ProviderIds.LLOYDS_SANCTIONS, IMO, 10000) },
        ],
      ]);
      expect(probe.evaluate(IMO, DEFAULT_PARAMS, failed).riskLevel).toBe(RiskLevel.NO_DATA);
    });
  });

  describe('LloydsFlagProbe', () => {
    const probe = new LloydsFlagProbe();

    function flag(value: Record<string, unknown> | undefined): Map<string, FetchOutcome> {
      return providerData({ [ProviderIds.LLOYDS_RISK_SCORE]: lloydsEnvelope([{ Flag: value }]) });
    }

    it('should be medium when the flag changed within a year', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, flag({ FlagName: 'Palau', FlagStartDate: '2024-09-01' }));

      expect(record.riskLevel).toBe(RiskLevel.MEDIUM);
      expect(record.detailRows).toEqual([
        {
          VesselImo: IMO,
          FlagName: 'Palau',
          FlagStartDate: '2024-09-01',
          ParisMouStatus: null,
          ParisMouStartDate: null,
          FlagChangedWithinYear: true,
        },
      ]);
    });

    it('should be no risk for an older flag', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, flag({ FlagName: 'Panama', FlagStartDate: '2019-03-10' }));

      expect(record.riskLevel).toBe(RiskLevel.NO_RISK);
      expect(record.detailRows[0]).toMatchObject({ FlagChangedWithinYear: false });
    });

    it('should be no risk without flag data', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, flag(undefined));
      expect(record.riskLevel).toBe(RiskLevel.NO_RISK);
      expect(record.detailRows).toEqual([]);
    });
  });

  describe('LloydsComplianceProbe', () => {
    const probe = new LloydsComplianceProbe();
    const owners = [
      {
        CompanyName: 'Owner Co',
        OwnershipTypes: ['RegisteredOwner'],
        HeadOffice: { Country: 'Panama' },
        Sanctions: [{ SanctionSource: 'OFAC', SanctionProgram: 'SDN', SanctionStartDate: '2024-01-01' }],
      },
    ];

    function compliance(item: Record<string, unknown>): Map<string, FetchOutcome> {
      return providerData({
        [ProviderIds.LLOYDS_COMPLIANCE]: lloydsEnvelope([item]),
        [ProviderIds.LLOYDS_RISK_SCORE]: lloydsEnvelope([{ SanctionedOwners: owners }]),
      });
    }

    it('should be high when the owner is currently sanctioned', () => {
      const record = probe.evaluate(IMO, DEFAULT_PARAMS, compliance({ SanctionRisks: { OwnerIsCurrentlySanctioned: true } }));

      expect(record.riskLevel).toBe(RiskLevel.HIGH);
      expect(record.detailRows).toHaveLength(1);
      expect(record.detailRows[0]).toMatchObject({
        CompanyName: 'Owner Co',
        OwnershipTypes: ['RegisteredOwner'],
        'HeadOffice.Country': 'Panama',
        'Sanctions.SanctionSource': ['OFAC'],
        'Sanctions.SanctionEndDate': [null],
        'SanctionedVesselsFleet.VesselImo': [],
      });
    });

    it('should be medium for historical sanctions or risky voyages', () => {
      expect(
        probe.evaluate(IMO, DEFAULT_PARAMS, compliance({ SanctionRisks: { OwnerHasHistoricalSanctions: true } })).riskLevel,
      ).toBe(RiskLevel.MEDIUM);
      expect(
        probe.evaluate(IMO, DEFAULT_PARAMS, compliance({ VoyageRisks: { HighRiskPortCallingCount: 2 } })).riskLevel,
      ).toBe(RiskLevel.MEDIUM);
      expect(
        probe.evaluate(IMO, DEFAULT_PARAMS, compliance({ VoyageRisks: { StsWithASanctionedVesselCount: 1 } })).riskLevel,
      ).toBe(RiskLevel.MEDIUM);
    });

    it('should be no risk otherwise', () => {
      const record = probe.evaluate(
        IMO,
        DEFAULT_PARAMS,
        compliance({ SanctionRisks: { OwnerIsCurrentlySanctioned: false }, VoyageRisks: { HighRiskPortCallingCount: 0 } }),
      );
      expect(record.riskLevel).toBe(RiskLevel.NO_RISK);
    });

    it('should be no data when either endpoint is missing', () => {
      const partial = providerData({ [ProviderIds.LLOYDS_COMPLIANCE]: lloydsEnvelope([]) });
      expect(probe.evaluate(IMO, DEFAULT_PARAMS, partial).riskLevel).toBe(RiskLevel.NO_DATA);
    });
  });

  describe('AisManipulationProbe', () => {
    const probe = new AisManipulationProbe();

    function risks(...complianceRisks: Record<string, unknown>[]): Map<string, FetchOutcome> {
      return providerData({
        [ProviderIds.LLOYDS_ADVANCED_COMPLIANCE]: lloydsEnvelope([
          { VesselImo: 9876543, VesselName: 'TEST VESSEL', ComplianceRisks: complianceRisks },
        ]),
      });
    }

    it('should map a high score and emit one row per detail', () => {
      const record = probe.evaluate(
        IMO,
        DEFAULT_PARAMS,
        risks({
          ComplianceRiskType: { Description: 'VesselAisManipulation' },
          ComplianceRiskScore: 'High',
          Details: [{ Place: { Name: 'Strait of Hormuz' }, RiskIndicators: [{ Description: 'Position jump' }] }],
        }),
      );

      expect(record.riskLevel).toBe(RiskLevel.HIGH);
      expect(record.detailRows).toHaveLength(1);
      expect(record.detailRows[0]).toMatchObject({
        VesselImo: 9876543,
        RiskType: 'VesselAisManipulation',
        ComplianceRiskScore: 'High',
        PlaceInfo: { Name: 'Strait of Hormuz' },
        RiskIndicators: ['Position jump'],
      });
    });

    it('should emit a bare row for a medium score without details', () => {
      const record = probe.evaluate(
        IMO,
        DEFAULT_PARAMS,
        risks({ ComplianceRiskType: { Description: 'VesselAisManipulation' }, ComplianceRiskScore: 'Medium' }),
      );

      expect(record.riskLevel).toBe(RiskLevel.MEDIUM);
      expect(record.detailRows).toEqual([
        {
          VesselImo: 9876543,
          VesselName: 'TEST VESSEL',
          RiskType: 'VesselAisManipulation',
          ComplianceRiskScore: 'Medium',
          ComplianceRiskType: 'VesselAisManipulation',
          RiskIndicators: [],
        },
      ]);
    });

    it('should treat a low score as no risk without rows', () => {
      const record = probe.evaluate(
        IMO,
        DEFAULT_PARAMS,
        risks({ ComplianceRiskType: { Description: 'VesselAisManipulation' }, ComplianceRiskScore: 'Low', Details: [{}] }),
      );

      expect(record.riskLevel).toBe(RiskLevel.NO_RISK);
      expect(record.detailRows).toEqual([]);
    });

    it('should ignore other compliance risk types', () => {
      const record = probe.evaluate(
        IMO,
        DEFAULT_PARAMS,
        risks({ ComplianceRiskType: { Description: 'VesselFlagHopping' }, ComplianceRiskScore: 'High' }),
      );
      expect(record.riskLevel).toBe(RiskLevel.NO_RISK);
    });
  });

  describe('voyage risk probes', () => {
    function voyages(...entries: Record<string, unknown>[]): Map<string, FetchOutcome> {
      return providerData({ [ProviderIds.LLOYDS_VOYAGE_EVENTS]: lloydsEnvelope([{ Voyages: entries }]) });
    }

    it('should flag high risk port calls with one row per labelled voyage', () => {
      const record = voyageProbe('high_risk_port').evaluate(
        IMO,
        DEFAULT_PARAMS,
        voyages(
          { VoyageId: 1, VoyageRiskRating: 'Red', RiskTypes: ['High Risk Port Calling'] },
          { VoyageId: 2, RiskTypes: ['Loitering'] },
        ),
      );

      expect(record.riskLevel).toBe(RiskLevel.HIGH);
      expect(record.detailRows).toEqual([
        {
          VesselImo: IMO,
          VoyageId: 1,
          VoyageStartTime: null,
          VoyageEndTime: null,
          VoyageRiskRating: 'Red',
          StartPlace: {},
          EndPlace: {},
          RiskTypes: ['High Risk Port Calling'],
        },
      ]);
    });

    it('should accept any of several labels', () => {
      const record = voyageProbe('possible_dark_port').evaluate(
        IMO,
        DEFAULT_PARAMS,
        voyages({ VoyageId: 3, RiskTypes: ['Probable Dark Port Calling'] }),
      );
      expect(record.riskLevel).toBe(RiskLevel.HIGH);
    });

    it('should report loitering as medium', () => {
      const record = voyageProbe('loitering_behavior').evaluate(IMO, DEFAULT_PARAMS, voyages({ RiskTypes: ['Loitering'] }));
      expect(record.riskLevel).toBe(RiskLevel.MEDIUM);
    });

    it('should be no risk when no voyage carries a label', () => {
      const record = voyageProbe('sanctioned_sts').evaluate(IMO, DEFAULT_PARAMS, voyages({ RiskTypes: [] }));
      expect(record.riskLevel).toBe(RiskLevel.NO_RISK);
    });

    it('should be no data without a date window', () => {
      const record = voyageProbe('dark_sts').evaluate(
        IMO,
        { evaluatedAt: DEFAULT_PARAMS.evaluatedAt, startDate: '2024-06-15' },
        voyages({ RiskTypes: ['Probable 2 way dark STS'] }),
      );
      expect(record.riskLevel).toBe(RiskLevel.NO_DATA);
    });

    it('should emit suspicious AIS gap events and mark sanctioned zones', () => {
      const record = voyageProbe('suspicious_ais_gap').evaluate(
        IMO,
        DEFAULT_PARAMS,
        voyages({
          VoyageStartTime: '2025-01-02T00:00:00Z',
          RiskTypes: ['Suspicious AIS Gap'],
          VoyageEvents: {
            AisGap: [
              {
                AisGapStartDateTime: '2025-01-03T04:00:00Z',
                AisGapStartEezName: 'Iranian Exclusive Economic Zone',
                RiskTypes: ['Suspicious AIS Gap'],
              },
              { AisGapStartEezName: 'Omani Exclusive Economic Zone', RiskTypes: [] },
            ],
          },
        }),
      );

      expect(record.riskLevel).toBe(RiskLevel.MEDIUM);
      expect(record.detailRows).toEqual([
        {
          VesselImo: IMO,
          VoyageStartTime: '2025-01-02T00:00:00Z',
          VoyageEndTime: null,
          VoyageRiskRating: null,
          AisGapStartDateTime: '2025-01-03T04:00:00Z',
          AisGapEndDateTime: null,
          AisGapStartEezName: 'Iranian Exclusive Economic Zone',
          IsSanctionedEez: true,
          RiskTypes: ['Suspicious AIS Gap'],
        },
      ]);
    });
  });
});
