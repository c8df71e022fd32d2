import { asRecord, optionalArray, optionalRecord, PayloadRecord } from '../payload';

/**
 * Lloyd's List Intelligence wraps every response as `{ IsSuccess, Data: { Items } }`.
 * The sanctions endpoint spells the list `items`, the rest `Items`.
 */
export function lloydsItems(payload: unknown, listKey: 'Items' | 'items' = 'Items'): PayloadRecord[] {
  const data = optionalRecord(asRecord(payload, '$').Data, '$.Data');
  return optionalArray(data[listKey], `$.Data.${listKey}`).map((item, index) =>
    asRecord(item, `$.Data.${listKey}[${index}]`),
  );
}

/** Voyages of the first (and only) vessel item of a voyage-events response. */
export function lloydsVoyages(payload: unknown): PayloadRecord[] {
  const [vessel] = lloydsItems(payload);
  if (!vessel) return [];
  return optionalArray(vessel.Voyages, '$.Data.Items[0].Voyages').map((voyage, index) =>
    asRecord(voyage, `$.Data.Items[0].Voyages[${index}]`),
  );
}

export function riskTypesOf(entry: PayloadRecord, path: string): string[] {
  return optionalArray(entry.RiskTypes, `${path}.RiskTypes`).filter(
    (label): label is string => typeof label === 'string',
  );
}
