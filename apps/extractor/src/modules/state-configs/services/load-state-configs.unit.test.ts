import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_STATE_CONFIGS_DIR } from '../../../lib/env.js';
import { ConfigError } from '../../../lib/errors.js';
import {
  applyOverrides,
  candidateUrls,
  DEFAULT_STATE_CODES,
  loadStateConfigFile,
  loadStateConfigs,
} from './load-state-configs.js';

const yamlFor = (code: string, name: string, extra = '') => `
state_name: ${name}
state_code: ${code}
base_url: https://tax.${code.toLowerCase()}.example.test
tax_definitions_url: https://tax.${code.toLowerCase()}.example.test/corporate
backup_urls:
  - https://tax.${code.toLowerCase()}.example.test/rates
  - https://tax.${code.toLowerCase()}.example.test/corporate
entity_type: C_corp
industry: shipping
included_fields:
  - eni
  - FDM
  - ENI
tax_types:
  - corporate_income
extraction_hints:
  keywords:
    - corporate income tax
  shipping_keywords:
    - water transportation
  known_rates:
    - 6.5%
    - 7
nexus_standard: market base
nexus_effective_date: 2014
sales_factor_method: market base
sales_factor_date: '2014'
${extra}`;

describe('loadStateConfigs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'statetax-configs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('normalises a YAML file to the camelCase config', async () => {
    const file = join(dir, 'ny.yaml');
    await writeFile(file, yamlFor('ny', 'New York', 'fallback_selectors:\n  content_area:\n    - "#main"\n'));

    const config = await loadStateConfigFile(file);

    expect(config).toEqual({
      stateName: 'New York',
      stateCode: 'NY',
      baseUrl: 'https://tax.ny.example.test',
      taxDefinitionsUrl: 'https://tax.ny.example.test/corporate',
      backupUrls: ['https://tax.ny.example.test/rates', 'https://tax.ny.example.test/corporate'],
      entityType: 'C_corp',
      industry: 'shipping',
      includedFields: ['ENI', 'FDM'],
      taxTypes: ['corporate_income'],
      extractionHints: {
        keywords: ['corporate income tax'],
        shippingKeywords: ['water transportation'],
        knownRates: ['6.5%', '7'],
      },
      nexusStandard: 'market base',
      nexusEffectiveDate: '2014',
      salesFactorMethod: 'market base',
      salesFactorDate: '2014',
      fallbackSelectors: { contentArea: ['#main'] },
    });
  });

  it('reads JSON configs and fills in the default entity type and industry', async () => {
    const file = join(dir, 'tx.json');
    await writeFile(
      file,
      JSON.stringify({
        state_name: 'Texas',
        state_code: 'TX',
        base_url: 'https://tax.tx.example.test',
        tax_definitions_url: 'https://tax.tx.example.test/franchise',
        included_fields: ['Franchise'],
        tax_types: ['franchise'],
        extraction_hints: {},
        nexus_standard: 'market base',
        nexus_effective_date: '2008',
        sales_factor_method: 'market base',
        sales_factor_date: '2008',
      })
    );

    const config = await loadStateConfigFile(file);

    expect(config.entityType).toBe('C_corp');
    expect(config.industry).toBe('shipping');
    expect(config.backupUrls).toEqual([]);
    expect(config.includedFields).toEqual(['Franchise']);
    expect(config.fallbackSelectors).toEqual({ contentArea: [] });
  });

  it('reports schema problems with their paths', async () => {
    const file = join(dir, 'zz.yaml');
    await writeFile(file, 'state_name: Nowhere\nstate_code: Z1\nincluded_fields: []\n');

    const err = await loadStateConfigFile(file).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigError);
    if (!(err instanceof ConfigError)) return;
    expect(err.message).toBe('Invalid state config zz.yaml');
    expect(err.file).toBe(file);
    const paths = err.issues.map((i) => i.path);
    expect(paths).toContain('state_code');
    expect(paths).toContain('included_fields');
    expect(paths).toContain('nexus_standard');
  });

  it('rejects fields outside the vocabulary', async () => {
    const file = join(dir, 'ny.yaml');
    await writeFile(file, yamlFor('NY', 'New York').replace('  - FDM\n', '  - Payroll\n'));

    const err = await loadStateConfigFile(file).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigError);
    if (!(err instanceof ConfigError)) return;
    expect(err.issues.map((i) => i.path)).toEqual(['included_fields.1']);
  });

  it('keeps the requested order and fails only the broken states', async () => {
    await writeFile(join(dir, 'ny.yaml'), yamlFor('NY', 'New York'));
    await writeFile(join(dir, 'tx.yml'), yamlFor('TX', 'Texas'));
    await writeFile(join(dir, 'ca.yaml'), yamlFor('FL', 'Florida'));

    const loads = await loadStateConfigs(dir, ['tx', 'ZZ', 'CA', 'NY']);

    expect(loads.map((l) => [l.stateCode, l.ok])).toEqual([
      ['TX', true],
      ['ZZ', false],
      ['CA', false],
      ['NY', true],
    ]);
    const missing = loads[1];
    const mismatch = loads[2];
    expect(missing?.ok === false && missing.error.message).toBe(`No config file for ZZ in ${dir}`);
    expect(mismatch?.ok === false && mismatch.error.message).toBe(
      'ca.yaml declares state_code FL, expected CA'
    );
  });

  it('loads every file when no codes are given and rejects duplicate codes', async () => {
    await writeFile(join(dir, 'a.yaml'), yamlFor('NY', 'New York'));
    await writeFile(join(dir, 'b.yaml'), yamlFor('NY', 'New York again'));
    await writeFile(join(dir, 'notes.txt'), 'not a config');

    const loads = await loadStateConfigs(dir);

    expect(loads).toHaveLength(2);
    expect(loads[0]?.ok).toBe(true);
    const dup = loads[1];
    expect(dup?.ok === false && dup.error.message).toBe('Duplicate state_code NY (already defined in a.yaml)');
  });

  it('turns unparsable YAML into a config failure', async () => {
    await writeFile(join(dir, 'ny.yaml'), 'state_name: [unclosed\n');

    const [load] = await loadStateConfigs(dir, ['NY']);

    expect(load?.ok).toBe(false);
    expect(load?.ok === false && load.error.message.startsWith('Could not parse ny.yaml:')).toBe(true);
  });

  it('ships valid configs for the default states', async () => {
    const loads = await loadStateConfigs(DEFAULT_STATE_CONFIGS_DIR, DEFAULT_STATE_CODES);

    expect(loads.map((l) => (l.ok ? l.stateCode : formatLoadError(l.error)))).toEqual([
      'NY',
      'CA',
      'TX',
      'FL',
      'IL',
    ]);
  });
});

const formatLoadError = (e: ConfigError) => `${e.message} ${JSON.stringify(e.issues)}`;

describe('candidateUrls', () => {
  it('puts the primary URL first and drops repeats', () => {
    expect(
      candidateUrls({
        taxDefinitionsUrl: 'https://tax.example.test/a',
        backupUrls: ['https://tax.example.test/b', 'https://tax.example.test/a', 'https://tax.example.test/c'],
      })
    ).toEqual(['https://tax.example.test/a', 'https://tax.example.test/b', 'https://tax.example.test/c']);
  });
});

describe('applyOverrides', () => {
  it('replaces entity type and industry without mutating the loaded config', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'statetax-overrides-'));
    try {
      const file = join(dir, 'ny.yaml');
      await writeFile(file, yamlFor('NY', 'New York'));
      const config = await loadStateConfigFile(file);

      const next = applyOverrides(config, { entityType: 'S_corp', industry: ' ' });

      expect(next.entityType).toBe('S_corp');
      expect(next.industry).toBe('shipping');
      expect(config.entityType).toBe('C_corp');
      expect(applyOverrides(config, {})).toBe(config);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
