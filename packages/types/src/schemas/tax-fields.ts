import { z } from 'zod/v4';

/** Tax components a state config may ask for, in report column order. */
export const TAX_FIELD_VALUES = [
  'ENI',
  'FDM',
  'Capital',
  'Franchise',
  'GrossReceipts',
  'AMT',
  'Surcharge',
] as const;

export const TaxFieldSchema = z.enum(TAX_FIELD_VALUES);

export const TAX_FIELD_LABELS: Record<(typeof TAX_FIELD_VALUES)[number], string> = {
  ENI: 'ENI (Entire Net Income)',
  FDM: 'FDM (Fixed Dollar Minimum)',
  Capital: 'Capital (Business Capital Base)',
  Franchise: 'Franchise Tax',
  GrossReceipts: 'Gross Receipts Tax',
  AMT: 'Alternative Minimum Tax',
  Surcharge: 'Surcharge',
};

export const TAX_TYPE_VALUES = ['corporate_income', 'franchise', 'sales_use', 'property'] as const;

export const TaxTypeSchema = z.enum(TAX_TYPE_VALUES);
