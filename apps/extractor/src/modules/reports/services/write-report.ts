import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { type ExtractionRecord, TAX_FIELD_LABELS, TAX_FIELD_VALUES, type TaxField } from '@statetax/types';
import { fileStamp } from '../../../lib/cli/utils.js';
import { createLogger } from '../../../lib/logger.js';
import { displayEntity } from '../../extraction/services/llm/prompts/tax-extraction.js';

const log = createLogger('report');

export const REPORT_SHEET_NAME = 'State Tax Summary';

const LEAD_COLUMNS = ['State', 'State Code', 'Nexus Standard', 'Tax Base Summary', 'Source URL'] as const;
const TAIL_COLUMNS = [
  'Confidence',
  'Shipping Notes',
  'Sanity Warnings',
  'Effective Date (Nexus)',
  'Sales Factor Method',
  'Effective Date (Sales Factor)',
  'Entity / Industry',
] as const;

const SOURCE_URL_COLUMN = LEAD_COLUMNS.indexOf('Source URL');

export type ReportTable = { header: string[]; rows: string[][] };

/** Field columns present in any record, in vocabulary order. */
export function reportFields(records: readonly ExtractionRecord[]): TaxField[] {
  const present = new Set<TaxField>();
  for (const r of records) {
    for (const f of r.fields) present.add(f.field);
    for (const f of r.unresolvedFields) present.add(f);
  }
  return TAX_FIELD_VALUES.filter((f) => present.has(f));
}

/** Statement and rate cells for one field; unresolved fields read N/A in both. */
function fieldCells(record: ExtractionRecord, field: TaxField): [string, string] {
  const hit = record.fields.find((f) => f.field === field);
  if (hit) return [hit.summary, hit.rate ?? ''];
  return record.unresolvedFields.includes(field) ? ['N/A', 'N/A'] : ['', ''];
}

export const rateColumn = (field: TaxField) => `${field} Rate`;

export function buildReportTable(records: readonly ExtractionRecord[]): ReportTable {
  const fields = reportFields(records);
  const header = [...LEAD_COLUMNS, ...fields.flatMap((f) => [TAX_FIELD_LABELS[f], rateColumn(f)]), ...TAIL_COLUMNS];

  const rows = records.map((r) => [
    r.stateName,
    r.stateCode,
    r.nexusStandard,
    r.taxBaseSummary,
    r.sourceUrl,
    ...fields.flatMap((f) => fieldCells(r, f)),
    r.confidence,
    r.shippingNotes.join('\n') || 'None',
    r.sanityWarnings.join('\n'),
    r.nexusEffectiveDate,
    r.salesFactorMethod,
    r.salesFactorDate,
    `${displayEntity(r.entityType)} in ${r.industry}`,
  ]);

  return { header, rows };
}

/** One sheet, one row per record; Source URL cells link to the page. */
export function buildReportWorkbook(records: readonly ExtractionRecord[]): XLSX.WorkBook {
  const { header, rows } = buildReportTable(records);
  const ws = XLSX.utils.aoa_to_sheet([header, ...rows]);

  rows.forEach((row, i) => {
    const url = row[SOURCE_URL_COLUMN];
    const cell: XLSX.CellObject | undefined = ws[XLSX.utils.encode_cell({ r: i + 1, c: SOURCE_URL_COLUMN })];
    if (cell && url) cell.l = { Target: url, Tooltip: url };
  });
  const wide = new Set<string>(['Tax Base Summary', ...TAX_FIELD_VALUES.map((f) => TAX_FIELD_LABELS[f])]);
  ws['!cols'] = header.map((h) => ({ wch: wide.has(h) ? 60 : 22 }));

  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, REPORT_SHEET_NAME);
  return wb;
}

export const reportFileName = (at: Date) => `state_tax_summary_${fileStamp(at)}.xlsx`;

/** Write the workbook to `<outDir>/state_tax_summary_<stamp>.xlsx` and return its path. */
export async function writeReport(
  records: readonly ExtractionRecord[],
  opts: { outDir: string; now?: Date }
): Promise<string> {
  await mkdir(opts.outDir, { recursive: true });
  const path = join(opts.outDir, reportFileName(opts.now ?? new Date()));
  const buffer: Buffer = XLSX.write(buildReportWorkbook(records), { bookType: 'xlsx', type: 'buffer' });
  await writeFile(path, buffer);
  log.info({ path, rows: records.length }, 'report written');
  return path;
}
