import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { configsList, configsValidate } from './configs.js';

const yamlFor = (code: string, name: string) => `
state_name: ${name}
state_code: ${code}
base_url: https://tax.${code.toLowerCase()}.example.test
tax_definitions_url: https://tax.${code.toLowerCase()}.example.test/corporate
entity_type: C_corp
industry: shipping
included_fields: [ENI]
tax_types: [corporate_income]
extraction_hints:
  keywords: [corporate income tax]
nexus_standard: economic nexus
nexus_effective_date: 2015
sales_factor_method: single sales factor
sales_factor_date: 2015
`;

describe('configs commands', () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'statetax-cli-configs-'));
    await writeFile(join(dir, 'ny.yaml'), yamlFor('NY', 'New York'));
    await writeFile(join(dir, 'tx.yaml'), yamlFor('TX', 'Texas'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('validates every config in the directory', async () => {
    await configsValidate([`--configs=${dir}`]);

    expect(logSpy).toHaveBeenCalledWith('✔ NY  New York\n✔ TX  Texas');
  });

  it('fails when a config is invalid and still lists the good ones', async () => {
    await writeFile(join(dir, 'zz.yaml'), 'state_name: Nowhere\nstate_code: ZZ\n');

    await expect(configsValidate([`--configs=${dir}`])).rejects.toThrow('1 of 3 state config(s) invalid');

    const printed = String(logSpy.mock.calls[0]?.[0]).split('\n');
    expect(printed.slice(0, 2)).toEqual(['✔ NY  New York', '✔ TX  Texas']);
    expect(printed[2]).toMatch(/^✖ ZZ {2}Invalid state config zz\.yaml \(/);
  });

  it('fails on an empty directory', async () => {
    const empty = join(dir, 'empty');
    await mkdir(empty);

    await expect(configsValidate([`--configs=${empty}`])).rejects.toThrow(`No state configs found in ${empty}`);
  });

  it('lists valid configs from STATE_CONFIGS_DIR', async () => {
    await writeFile(join(dir, 'zz.yaml'), 'state_name: Nowhere\n');
    vi.stubEnv('STATE_CONFIGS_DIR', dir);

    await configsList([]);

    expect(logSpy).toHaveBeenCalledWith(
      'NY  New York  https://tax.ny.example.test/corporate\nTX  Texas  https://tax.tx.example.test/corporate'
    );
  });
});
