import { RiskLevel } from '../../risk-level';
import { DetailRow, DetailValue } from '../../risk-record';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { asRecord, optionalArray, optionalString, PayloadRecord, toDetailValue } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';

function entriesOf(payload: unknown): PayloadRecord[] {
  return optionalArray(payload, '$').map((entry, index) => asRecord(entry, `$[${index}]`));
}

function toRow(entry: PayloadRecord): DetailRow {
  const row: Record<string, DetailValue> = {};
  for (const [key, value] of Object.entries(entry)) {
    row[key] = toDetailValue(value);
  }
  return row;
}

/** Vessel appears on the UANI tanker-tracker list. */
export class UaniProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.HIGH];

  constructor() {
    super({ id: 'uani_check', riskDescription: 'Vessel on the UANI list', subjectPattern: IMO_NUMBER });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId'];
  }

  providers(): readonly string[] {
    return [ProviderIds.REFERENCE_UANI];
  }

  protected classify(_subjectId: string, _params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    const rows = entriesOf(payload).map(toRow);
    return { level: rows.length > 0 ? RiskLevel.HIGH : RiskLevel.NO_RISK, rows };
  }
}

/**
 * Matches `params.countryName` against a reference list of sanctioned
 * countries. Case and surrounding whitespace are ignored.
 */
export class CountryListProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.HIGH];

  constructor(
    id: string,
    riskDescription: string,
    private readonly providerId: string,
  ) {
    super({ id, riskDescription });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['countryName'];
  }

  providers(): readonly string[] {
    return [this.providerId];
  }

  protected classify(_subjectId: string, params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    const wanted = (params.countryName ?? '').trim().toLowerCase();
    const rows = entriesOf(payload)
      .filter((entry) => optionalString(entry.countryName)?.trim().toLowerCase() === wanted)
      .map(toRow);
    return { level: rows.length > 0 ? RiskLevel.HIGH : RiskLevel.NO_RISK, rows };
  }
}

export function createReferenceListProbes(): BaseProbe[] {
  return [
    new UaniProbe(),
    new CountryListProbe('cargo_country', 'Cargo origin in a sanctioned country', ProviderIds.REFERENCE_CARGO_COUNTRIES),
    new CountryListProbe('port_country', 'Port in a sanctioned country', ProviderIds.REFERENCE_PORT_COUNTRIES),
  ];
}
