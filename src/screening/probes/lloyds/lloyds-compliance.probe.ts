import { RiskLevel } from '../../risk-level';
import { DetailRow, DetailValue } from '../../risk-record';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { asRecord, optionalArray, optionalRecord, PayloadRecord, toDetailValue } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';
import { lloydsItems } from './lloyds-payload';

function positiveCount(value: unknown): boolean {
  return typeof value === 'number' && value > 0;
}

function column(entries: readonly unknown[], field: string, path: string): DetailValue {
  return entries.map((entry, index) => toDetailValue(asRecord(entry, `${path}[${index}]`)[field]));
}

function ownerRow(owner: PayloadRecord, path: string): DetailRow {
  const sanctions = optionalArray(owner.Sanctions, `${path}.Sanctions`);
  const fleet = optionalArray(owner.SanctionedVesselsFleet, `${path}.SanctionedVesselsFleet`);
  const related = optionalArray(owner.RelatedSanctionedCompanies, `${path}.RelatedSanctionedCompanies`);
  const headOffice = optionalRecord(owner.HeadOffice, `${path}.HeadOffice`);

  return {
    CompanyName: toDetailValue(owner.CompanyName),
    OwnershipTypes: toDetailValue(owner.OwnershipTypes ?? []),
    OwnershipStartDate: toDetailValue(owner.OwnershipStartDate),
    'HeadOffice.Country': toDetailValue(headOffice.Country),
    HeadOfficeBasedInSanctionedCountry: toDetailValue(owner.HeadOfficeBasedInSanctionedCountry),
    HasSanctionedVesselsInFleet: toDetailValue(owner.HasSanctionedVesselsInFleet),
    LinkedToSanctionedCompanies: toDetailValue(owner.LinkedToSanctionedCompanies),
    'Sanctions.SanctionSource': column(sanctions, 'SanctionSource', `${path}.Sanctions`),
    'Sanctions.SanctionProgram': column(sanctions, 'SanctionProgram', `${path}.Sanctions`),
    'Sanctions.SanctionStartDate': column(sanctions, 'SanctionStartDate', `${path}.Sanctions`),
    'Sanctions.SanctionEndDate': column(sanctions, 'SanctionEndDate', `${path}.Sanctions`),
    'SanctionedVesselsFleet.VesselName': column(fleet, 'VesselName', `${path}.SanctionedVesselsFleet`),
    'SanctionedVesselsFleet.VesselImo': column(fleet, 'VesselImo', `${path}.SanctionedVesselsFleet`),
    'RelatedSanctionedCompanies.CompanyName': column(related, 'CompanyName', `${path}.RelatedSanctionedCompanies`),
  };
}

/**
 * Ownership compliance screening. Reads the sanction flags and voyage
 * counters from the compliance endpoint and the sanctioned-owner details
 * from the risk-score endpoint.
 */
export class LloydsComplianceProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.MEDIUM, RiskLevel.HIGH];

  constructor() {
    super({
      id: 'lloyds_compliance',
      riskDescription: 'Vessel ownership sanctions exposure',
      subjectPattern: IMO_NUMBER,
    });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId'];
  }

  providers(): readonly string[] {
    return [ProviderIds.LLOYDS_COMPLIANCE, ProviderIds.LLOYDS_RISK_SCORE];
  }

  protected classify(
    _subjectId: string,
    _params: ScreeningParams,
    [compliancePayload, riskScorePayload]: readonly unknown[],
  ): Classification {
    const [compliance] = lloydsItems(compliancePayload);
    const sanctionRisks = optionalRecord(compliance?.SanctionRisks, '$.Data.Items[0].SanctionRisks');
    const voyageRisks = optionalRecord(compliance?.VoyageRisks, '$.Data.Items[0].VoyageRisks');

    const [riskScore] = lloydsItems(riskScorePayload);
    const owners = optionalArray(riskScore?.SanctionedOwners, '$.Data.Items[0].SanctionedOwners');
    const rows = owners.map((owner, index) => {
      const path = `$.Data.Items[0].SanctionedOwners[${index}]`;
      return ownerRow(asRecord(owner, path), path);
    });

    if (sanctionRisks.OwnerIsCurrentlySanctioned === true) {
      return { level: RiskLevel.HIGH, rows };
    }
    if (
      sanctionRisks.OwnerHasHistoricalSanctions === true ||
      positiveCount(voyageRisks.HighRiskPortCallingCount) ||
      positiveCount(voyageRisks.StsWithASanctionedVesselCount)
    ) {
      return { level: RiskLevel.MEDIUM, rows };
    }
    return { level: RiskLevel.NO_RISK, rows };
  }
}
