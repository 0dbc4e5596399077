import type { ExtractedField } from '@statetax/types';

const percentOf = (s: string): number | undefined => {
  if (s.includes('$')) return undefined;
  const m = /(\d+(?:\.\d+)?)/.exec(s);
  return m ? Number(m[1]) : undefined;
};

/**
 * Compare extracted percentage rates with the config's known rates. A mismatch is a
 * warning on the record, never a failure. Dollar amounts are not compared.
 */
export function checkKnownRates(fields: readonly ExtractedField[], knownRates: readonly string[]): string[] {
  const known = knownRates.map(percentOf).filter((n): n is number => n !== undefined);
  if (known.length === 0) return [];

  const warnings: string[] = [];
  for (const f of fields) {
    if (!f.rate?.includes('%')) continue;
    const value = percentOf(f.rate);
    if (value === undefined) continue;
    if (!known.some((k) => Math.abs(k - value) < 1e-9)) {
      warnings.push(`${f.field} rate ${f.rate} does not match known rates (${knownRates.join(', ')})`);
    }
  }
  return warnings;
}
