/**
 * Unit tests for the Outreach module
 */

import { describe, test, expect } from '@jest/globals';
import {
  OutreachComposer,
  buildSystemPrompt,
  buildFirmContext,
  buildUserMessage,
  extractFirmContext,
  parseOutreachResponse,
  canonicalOffering,
  fallbackDraft,
  countWords,
  checkDraftConstraints,
  OUTREACH_MAX_TOKENS,
  type OutreachDraft,
} from '../../src/outreach/index.js';
import { loadDefaultRoster, renderSignature } from '../../src/offerings/index.js';
import { prop, type StoreRecord } from '../../src/properties/index.js';
import { ScriptedLLM, createMockLogger, createMockMetrics, providerError } from '../helpers.js';

const roster = loadDefaultRoster();
const signature = renderSignature(roster.persona);

function draftReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    primary_client: 'Harborline',
    secondary_clients: ['co-invest', 'Timberland', 'harborline'],
    subject: 'Sunbelt multifamily for Acme',
    body: `Hi Dana,\n\nI'm Jordan Hale, founder of Meridian Bridge Partners.\n\n${signature}`,
    reasoning: '  Real estate program with value-add appetite  ',
    ...overrides,
  });
}

function firmRecord(): StoreRecord {
  return {
    id: 'page-1',
    properties: {
      'Firm Name': prop.title('Acme Capital'),
      Website: prop.url('https://acmecapital.com'),
      'Best Matches': prop.multiSelect(['Harborline', 'Co-Invest']),
      Type: prop.select('Public Pension'),
      'AUM Range': prop.select('$10B+'),
      'Qualification Notes': prop.richText('Best Match: Harborline'),
      'Network Angles': prop.richText('Shared board member'),
      'Harborline Fit': prop.select('Strong'),
      'Keystone Fit': prop.select('N/A'),
      'Northgate Fit': prop.select('Weak'),
    },
  };
}

describe('Outreach Module', () => {
  describe('buildSystemPrompt()', () => {
    test('should speak as the persona and list every offering', () => {
      const prompt = buildSystemPrompt(roster);

      expect(prompt.startsWith('You are writing emails AS Jordan Hale, founder of Meridian Bridge Partners.')).toBe(true);
      for (const offering of roster.offerings) {
        expect(prompt).toContain(`### ${offering.fullName} (${offering.label})`);
      }
      expect(prompt).toContain('     Best regards,\n     Jordan Hale\n     Meridian Bridge Partners');
      expect(prompt).toContain('one of: Harborline, Cedar Yield, Northgate, Keystone, Brightfield, Co-Invest');
    });
  });

  describe('extractFirmContext()', () => {
    test('should read name, website, matches and notes from the record', () => {
      const record = firmRecord();
      const context = extractFirmContext(record);

      expect(context).toEqual({
        firmName: 'Acme Capital',
        website: 'https://acmecapital.com',
        matchedOfferings: ['Harborline', 'Co-Invest'],
        notes: 'Qualification Notes: Best Match: Harborline | Network Angles: Shared board member',
        record,
      });
    });

    test('should leave notes and website null on a bare record', () => {
      const context = extractFirmContext({ id: 'page-2', properties: { Name: prop.title('Beta Trust') } });
      expect(context.firmName).toBe('Beta Trust');
      expect(context.website).toBeNull();
      expect(context.notes).toBeNull();
      expect(context.matchedOfferings).toEqual([]);
    });
  });

  describe('buildFirmContext()', () => {
    test('should render trigger fields, record attributes and fit scores in order', () => {
      const context = buildFirmContext(
        { ...extractFirmContext(firmRecord()), notes: 'Prefers operators', contactName: 'Dana Lee', contactTitle: 'CIO' },
        roster
      );

      expect(context).toBe([
        '**Firm Name:** Acme Capital',
        '**Website:** https://acmecapital.com',
        '**Pre-tagged Best Matches:** Harborline, Co-Invest',
        '**Research Notes:** Prefers operators',
        '**Firm Type:** Public Pension',
        '**AUM Range:** $10B+',
        '**Qualification Notes:** Best Match: Harborline',
        '**Network Angles:** Shared board member',
        '**Fit Scores:** Harborline: Strong, Northgate: Weak',
        '**Contact Name:** Dana Lee',
        '**Contact Title:** CIO',
      ].join('\n'));
    });

    test('should render only the name when nothing else is known', () => {
      expect(buildFirmContext({ firmName: 'Beta Trust' }, roster)).toBe('**Firm Name:** Beta Trust');
    });
  });

  describe('buildUserMessage()', () => {
    test('should embed the firm context', () => {
      const message = buildUserMessage({ firmName: 'Beta Trust' }, roster);
      expect(message).toContain('prospect firm:\n\n**Firm Name:** Beta Trust\n\nGenerate the email');
    });
  });

  describe('parseOutreachResponse()', () => {
    test('should canonicalize offerings and drop unknown secondaries', () => {
      const result = parseOutreachResponse(`\`\`\`json\n${draftReply()}\n\`\`\``, roster);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.primaryOffering).toBe('Harborline');
        expect(result.data.secondaryOfferings).toEqual(['Co-Invest']);
        expect(result.data.subject).toBe('Sunbelt multifamily for Acme');
        expect(result.data.rationale).toBe('Real estate program with value-add appetite');
      }
    });

    test('should map an unknown primary to relationship building', () => {
      const result = parseOutreachResponse(draftReply({ primary_client: 'None', secondary_clients: undefined }), roster);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.primaryOffering).toBe('Relationship Building');
        expect(result.data.secondaryOfferings).toEqual([]);
      }
    });

    test('should reject a draft without a body', () => {
      const result = parseOutreachResponse(draftReply({ body: '   ' }), roster);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('ParseError');
        expect(result.error.code).toBe('SCHEMA_VALIDATION_ERROR');
        expect(result.error.details).toEqual({ errors: ['body: body must not be empty'], raw: draftReply({ body: '   ' }) });
      }
    });
  });

  describe('canonicalOffering()', () => {
    test('should resolve keys and labels', () => {
      expect(canonicalOffering('cedar_yield', roster)).toBe('Cedar Yield');
      expect(canonicalOffering('', roster)).toBe('Relationship Building');
    });
  });

  describe('fallbackDraft()', () => {
    test('should name the firm and end with the signature', () => {
      const draft = fallbackDraft('  Acme Capital ', roster);

      expect(draft.subject).toBe('Meridian Bridge Partners - Introduction');
      expect(draft.primaryOffering).toBe('General');
      expect(draft.secondaryOfferings).toEqual([]);
      expect(draft.body).toContain('I came across Acme Capital and believe');
      expect(draft.body.endsWith(`\n\n${signature}`)).toBe(true);
      expect(checkDraftConstraints(draft, roster.persona)).toEqual([]);
    });

    test('should cope with an empty firm name', () => {
      expect(fallbackDraft('', roster).body).toContain('I came across your organization and believe');
    });
  });

  describe('checkDraftConstraints()', () => {
    const base: OutreachDraft = {
      subject: 'Hello',
      body: `Short note.\n\n${signature}`,
      primaryOffering: 'Keystone',
      secondaryOfferings: [],
      rationale: '',
    };

    test('should flag long bodies', () => {
      const body = `${'word '.repeat(210)}\n${signature}`;
      expect(countWords(body)).toBe(218);
      expect(checkDraftConstraints({ ...base, body }, roster.persona)).toEqual([
        'Body has 218 words, should be <= 200',
      ]);
    });

    test('should flag a missing signature', () => {
      expect(checkDraftConstraints({ ...base, body: 'Short note.' }, roster.persona)).toEqual([
        'Body does not end with the signature block',
      ]);
    });

    test('should pass a conforming draft', () => {
      expect(checkDraftConstraints(base, roster.persona)).toEqual([]);
    });
  });

  describe('OutreachComposer', () => {
    test('should return the generated draft', async () => {
      const llm = new ScriptedLLM([draftReply()]);
      const metrics = createMockMetrics();
      const composer = new OutreachComposer({ llm, roster, logger: createMockLogger(), metrics });

      const outcome = await composer.compose({ firmName: 'Acme Capital', contactName: 'Dana Lee' });

      expect(outcome.source).toBe('llm');
      expect(outcome.error).toBeNull();
      expect(outcome.warnings).toEqual([]);
      expect(outcome.draft.primaryOffering).toBe('Harborline');
      expect(llm.requests).toHaveLength(1);
      expect(llm.requests[0]?.systemPrompt).toBe(buildSystemPrompt(roster));
      expect(llm.requests[0]?.maxOutputTokens).toBe(OUTREACH_MAX_TOKENS);
      expect(llm.requests[0]?.userPrompt).toContain('**Contact Name:** Dana Lee');
      expect(metrics.entries).toContainEqual({
        type: 'increment',
        metric: 'outreach.generated',
        tags: { primary: 'Harborline' },
      });
    });

    test('should fall back when the provider fails', async () => {
      const llm = new ScriptedLLM([providerError('LLM_TIMEOUT', 'timed out')]);
      const logger = createMockLogger();
      const composer = new OutreachComposer({ llm, roster, logger });

      const outcome = await composer.compose({ firmName: 'Acme Capital' });

      expect(outcome.success).toBe(true);
      expect(outcome.source).toBe('fallback');
      expect(outcome.draft).toEqual(fallbackDraft('Acme Capital', roster));
      expect(outcome.error).toEqual({
        kind: 'ComposeError',
        code: 'LLM_TIMEOUT',
        message: 'Outreach generation failed: timed out',
        details: { cause: 'ProviderError' },
      });
      expect(logger.logs.some((l) => l.level === 'warn' && l.msg === 'Using fallback outreach draft')).toBe(true);
    });

    test('should fall back when the reply is not JSON', async () => {
      const llm = new ScriptedLLM(['Dear Acme, ...']);
      const composer = new OutreachComposer({ llm, roster, logger: createMockLogger() });

      const outcome = await composer.compose({ firmName: 'Acme Capital' });

      expect(outcome.source).toBe('fallback');
      expect(outcome.error?.kind).toBe('ComposeError');
      expect(outcome.error?.code).toBe('JSON_PARSE_ERROR');
      expect(outcome.error?.details).toMatchObject({ cause: 'ParseError' });
    });

    test('should surface constraint warnings without failing', async () => {
      const llm = new ScriptedLLM([draftReply({ body: 'Quick hello from me.' })]);
      const composer = new OutreachComposer({ llm, roster, logger: createMockLogger() });

      const outcome = await composer.compose({ firmName: 'Acme Capital' });

      expect(outcome.source).toBe('llm');
      expect(outcome.warnings).toEqual(['Body does not end with the signature block']);
    });

    test('generate should report a ComposeError', async () => {
      const composer = new OutreachComposer({
        llm: new ScriptedLLM([draftReply({ subject: '' })]),
        roster,
        logger: createMockLogger(),
      });

      const result = await composer.generate({ firmName: 'Acme Capital' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('ComposeError');
        expect(result.error.code).toBe('SCHEMA_VALIDATION_ERROR');
      }
    });
  });
});
