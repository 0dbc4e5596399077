import { describe, expect, it } from 'vitest';
import {
  buildTaxExtractionPrompt,
  displayEntity,
  fitContent,
  MAX_PROMPT_CONTENT_CHARS,
} from './tax-extraction.js';

type PromptConfig = Parameters<typeof buildTaxExtractionPrompt>[0]['config'];

const baseConfig: PromptConfig = {
  stateName: 'Texas',
  stateCode: 'TX',
  entityType: 'C_corp',
  industry: 'shipping',
  includedFields: ['ENI', 'FDM'],
  extractionHints: {
    keywords: ['franchise tax', 'margin tax'],
    shippingKeywords: ['water transportation'],
    knownRates: ['0.75%'],
  },
  fallbackSelectors: { contentArea: [] },
};

describe('fitContent', () => {
  it('returns short content unchanged', () => {
    expect(fitContent('short page', { maxChars: 100 })).toBe('short page');
  });

  it('cuts a prefix when keyword preference is off', () => {
    expect(fitContent('abcdefghij', { maxChars: 4, keywords: ['ghi'] })).toBe('abcd');
  });

  it('keeps keyword lines first, in page order', () => {
    const text = ['intro line', 'franchise tax rate is 0.75%', 'filler filler', 'margin tax note'].join('\n');

    expect(
      fitContent(text, { maxChars: 45, keywords: ['Franchise Tax', 'margin tax'], preferKeywords: true })
    ).toBe('franchise tax rate is 0.75%\nmargin tax note');
  });

  it('fills the remaining budget with other lines', () => {
    const text = ['aaaa', 'tax rate 7%', 'bbbb', 'cccccccccccccccccccc'].join('\n');

    expect(fitContent(text, { maxChars: 21, keywords: ['tax rate'], preferKeywords: true })).toBe(
      'aaaa\ntax rate 7%\nbbbb'
    );
  });

  it('cuts an oversized keyword line instead of dropping it', () => {
    const rates = `The corporate tax rate is 6.5% of business income. ${'Detail. '.repeat(1250)}`;
    const text = ['Home', 'Contact us', rates, 'Accessibility', 'Privacy'].join('\n');

    const out = fitContent(text, { maxChars: 8000, keywords: ['tax rate'], preferKeywords: true });

    expect(out).toBe(rates.slice(0, 8000));
    expect(out).toContain('tax rate is 6.5%');
  });

  it('falls back to a prefix cut when the budget leaves no keyword', () => {
    const text = ['Home', `${'x'.repeat(60)} tax rate 6.5%`, 'Privacy'].join('\n');

    expect(fitContent(text, { maxChars: 20, keywords: ['tax rate'], preferKeywords: true })).toBe(
      text.slice(0, 20)
    );
  });

  it('is deterministic at the default budget', () => {
    const text = 'x'.repeat(MAX_PROMPT_CONTENT_CHARS + 500);
    const first = fitContent(text, { maxChars: MAX_PROMPT_CONTENT_CHARS });

    expect(first).toHaveLength(MAX_PROMPT_CONTENT_CHARS);
    expect(fitContent(text, { maxChars: MAX_PROMPT_CONTENT_CHARS })).toBe(first);
  });
});

describe('buildTaxExtractionPrompt', () => {
  it('asks for the requested fields only, with C-Corp and shipping context', () => {
    const prompt = buildTaxExtractionPrompt({ content: 'Franchise tax rate is 0.75%.', config: baseConfig });

    expect(prompt).toContain('Analyze the Texas (TX) page content below.');
    expect(prompt).toContain('ENTITY TYPE: C-CORPORATION (regular corporation).');
    expect(prompt).toContain('INDUSTRY: SHIPPING / MARINE TRANSPORTATION.');
    expect(prompt).toContain('- Watch for: water transportation.');
    expect(prompt).toContain('KEYWORD HINTS: franchise tax, margin tax');
    expect(prompt).toContain('"""\nFranchise tax rate is 0.75%.\n"""');
    expect(prompt).toContain('- ENI (Entire Net Income): ');
    expect(prompt).toContain('- FDM (Fixed Dollar Minimum): ');
    expect(prompt).toContain('"FDM": { "summary"');
    expect(prompt).not.toContain('"Capital"');
    expect(prompt).toContain('answer "N/A"');
  });

  it('uses generic context for other entities and industries', () => {
    const prompt = buildTaxExtractionPrompt({
      content: 'Rates',
      config: { ...baseConfig, entityType: 'LLC', industry: 'retail' },
    });

    expect(prompt).toContain('ENTITY TYPE: LLC.');
    expect(prompt).toContain('INDUSTRY: retail.');
    expect(prompt).not.toContain('C-CORPORATION');
    expect(prompt).not.toContain('MARINE');
  });

  it('prefers keyword lines when the state has fallback selectors', () => {
    const content = ['Welcome to the portal', 'Margin tax: 0.75% of taxable margin'].join('\n');
    const prompt = buildTaxExtractionPrompt({
      content,
      maxContentChars: 40,
      config: { ...baseConfig, fallbackSelectors: { contentArea: ['.franchise-tax'] } },
    });

    expect(prompt).toContain('"""\nMargin tax: 0.75% of taxable margin\n"""');
  });
});

describe('displayEntity', () => {
  it('formats entity codes for prose', () => {
    expect(displayEntity('C_corp')).toBe('C-Corp');
    expect(displayEntity('S_corp')).toBe('S-Corp');
    expect(displayEntity('LLC')).toBe('LLC');
  });
});
