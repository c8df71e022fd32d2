import { DateWindow } from '../dates';
import { FetchOutcome } from '../fetch-cache';
import { RiskLevel } from '../risk-level';
import { RiskRecord } from '../risk-record';

/** Names a probe may list as required; each maps onto a field of ScreeningParams. */
export type ProbeParameter = 'subjectId' | 'startDate' | 'endDate' | 'countryName';

export interface ScreeningParams {
  /** Evaluation timestamp. Every time-relative rule reads this, never the clock. */
  readonly evaluatedAt: Date;
  readonly startDate?: string;
  readonly endDate?: string;
  readonly countryName?: string;
  /** Subject ids for the parties of a multi-party transaction, keyed by role. */
  readonly parties?: Readonly<Record<string, string>>;
}

export type ProviderDataMap = ReadonlyMap<string, FetchOutcome>;

export interface Probe {
  readonly kind: 'probe';
  readonly id: string;
  readonly riskDescription: string;
  /** Every level this probe can produce. */
  readonly levels: readonly RiskLevel[];
  requiredParameters(): readonly ProbeParameter[];
  /** Provider ids whose payloads `evaluate` reads, in the order it reads them. */
  providers(): readonly string[];
  evaluate(subjectId: string, params: ScreeningParams, providerData: ProviderDataMap): RiskRecord;
}

export interface ComponentBinding {
  readonly probeId: string;
  /** When set, the component screens `params.parties[role]` instead of the request subject. */
  readonly role?: string;
}

export interface AggregateProbe {
  readonly kind: 'aggregate';
  readonly id: string;
  readonly riskDescription: string;
  readonly levels: readonly RiskLevel[];
  components(): readonly ComponentBinding[];
  /** Component identifiers in combination order; role-bound ones read `role:probeId`. */
  componentProbeIds(): readonly string[];
  combine(records: readonly RiskRecord[]): RiskRecord;
}

export type RegisteredProbe = Probe | AggregateProbe;

export interface ProviderClient {
  readonly id: string;
  fetch(subjectId: string, window: DateWindow): Promise<unknown>;
}
