import { TAX_FIELD_VALUES, type TaxField } from '@statetax/types';

/** Lower-case, alphanumerics only: "ENI_description" → "enidescription". */
export const normalizeKey = (key: string) =>
  key
    .replace(/\([^)]*\)/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');

const FIELD_ALIASES: Record<TaxField, readonly string[]> = {
  ENI: [
    'eni',
    'entirenetincome',
    'entirenetincometax',
    'corporateincometax',
    'corporateincome',
    'businessincometax',
    'incometax',
  ],
  FDM: ['fdm', 'fixeddollarminimum', 'fixeddollarminimumtax', 'minimumtax'],
  Capital: ['capital', 'capitaltax', 'businesscapitalbase', 'capitalbase', 'capitalbasetax'],
  Franchise: ['franchise', 'franchisetax', 'margintax'],
  GrossReceipts: ['grossreceipts', 'grossreceiptstax'],
  AMT: ['amt', 'alternativeminimumtax'],
  Surcharge: ['surcharge', 'surchargetax', 'mtasurcharge'],
};

const ALIAS_TO_FIELD = new Map<string, TaxField>(
  TAX_FIELD_VALUES.flatMap((field) => FIELD_ALIASES[field].map((alias) => [alias, field] as const))
);

export type FieldKeyMatch = { field: TaxField; part: 'summary' | 'rate' };

/**
 * Resolve a response key to a vocabulary field. Keys may carry a suffix naming the part:
 * `ENI_description`, `FDM_summary`, `capital_rate`.
 */
export function matchFieldKey(key: string): FieldKeyMatch | undefined {
  const k = normalizeKey(key);
  const direct = ALIAS_TO_FIELD.get(k);
  if (direct) return { field: direct, part: 'summary' };

  for (const [suffix, part] of [
    ['description', 'summary'],
    ['summary', 'summary'],
    ['rate', 'rate'],
  ] as const) {
    if (k.endsWith(suffix) && k.length > suffix.length) {
      const field = ALIAS_TO_FIELD.get(k.slice(0, -suffix.length));
      if (field) return { field, part };
    }
  }
  return undefined;
}
