import { RiskLevel } from '../../risk-level';
import { DetailRow } from '../../risk-record';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { asRecord, optionalArray, optionalRecord, optionalString, toDetailValue } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';
import { lloydsItems } from './lloyds-payload';

const RISK_TYPE = 'VesselAisManipulation';

// Lloyd's "Low" is reported as no risk.
const SCORE_LEVELS: Record<string, RiskLevel> = {
  High: RiskLevel.HIGH,
  Medium: RiskLevel.MEDIUM,
  Low: RiskLevel.NO_RISK,
};

export class AisManipulationProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.MEDIUM, RiskLevel.HIGH];

  constructor() {
    super({
      id: 'ais_manipulation',
      riskDescription: 'AIS signal spoofing or manipulation',
      subjectPattern: IMO_NUMBER,
    });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId'];
  }

  providers(): readonly string[] {
    return [ProviderIds.LLOYDS_ADVANCED_COMPLIANCE];
  }

  protected classify(_subjectId: string, _params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    let level: RiskLevel | undefined;
    const rows: DetailRow[] = [];

    for (const [itemIndex, item] of lloydsItems(payload).entries()) {
      const itemPath = `$.Data.Items[${itemIndex}]`;
      const risks = optionalArray(item.ComplianceRisks, `${itemPath}.ComplianceRisks`);

      for (const [riskIndex, entry] of risks.entries()) {
        const riskPath = `${itemPath}.ComplianceRisks[${riskIndex}]`;
        const risk = asRecord(entry, riskPath);
        const riskType = optionalRecord(risk.ComplianceRiskType, `${riskPath}.ComplianceRiskType`);
        if (riskType.Description !== RISK_TYPE) continue;

        const score = optionalString(risk.ComplianceRiskScore) ?? '';
        // the verdict comes from the first vessel item only
        if (itemIndex === 0 && level === undefined) {
          level = SCORE_LEVELS[score];
        }
        if (score === 'Low') continue;

        const base = {
          VesselImo: toDetailValue(item.VesselImo),
          VesselName: toDetailValue(item.VesselName),
          RiskType: RISK_TYPE,
          ComplianceRiskScore: toDetailValue(risk.ComplianceRiskScore),
          ComplianceRiskType: RISK_TYPE,
        };
        const details = optionalArray(risk.Details, `${riskPath}.Details`);
        if (details.length === 0) {
          rows.push({ ...base, RiskIndicators: [] });
          continue;
        }
        for (const [detailIndex, detailEntry] of details.entries()) {
          const detailPath = `${riskPath}.Details[${detailIndex}]`;
          const detail = asRecord(detailEntry, detailPath);
          const indicators = optionalArray(detail.RiskIndicators, `${detailPath}.RiskIndicators`);
          rows.push({
            ...base,
            PlaceInfo: toDetailValue(detail.Place ?? {}),
            RiskIndicators: indicators.map((indicator, index) =>
              toDetailValue(asRecord(indicator, `${detailPath}.RiskIndicators[${index}]`).Description),
            ),
            DetailInfo: toDetailValue(detail),
          });
        }
      }
    }

    return { level: level ?? RiskLevel.NO_RISK, rows };
  }
}
