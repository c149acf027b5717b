/**
 * Unit tests for the Renderers module
 */

import { describe, test, expect } from '@jest/globals';
import {
  renderQualificationNotes,
  buildScoringUpdate,
  buildDispatchUpdate,
  buildEnrichmentMerge,
  buildContactProperties,
  buildContactStatusUpdate,
  buildOutreachUpdate,
  renderReplyExcerpt,
  buildReplyUpdate,
} from '../../src/renderers/index.js';
import { loadDefaultRoster } from '../../src/offerings/index.js';
import { prop, type StoreRecord } from '../../src/properties/index.js';
import { parseScoringResponse, type ScoringResult } from '../../src/scoring/index.js';
import type { PersonData } from '../../src/normalizer/index.js';
import type { OutreachDraft } from '../../src/outreach/index.js';
import { scoringReply } from '../helpers.js';

const roster = loadDefaultRoster();

function scoringResult(reply: string = scoringReply()): ScoringResult {
  const parsed = parseScoringResponse(reply, roster);
  if (!parsed.success) {
    throw new Error(parsed.error.message);
  }
  return {
    ...parsed.data,
    firmName: 'Acme Capital',
    website: 'acmecapital.com',
    enrichment: '',
    research: 'Acme runs a diversified pension plan.',
    bestMatches: parsed.data.scores.filter((s) => s.fit === 'Strong').map((s) => s.label),
  };
}

const person: PersonData = {
  name: 'Dana Lee',
  firmName: 'Acme Capital',
  title: 'CIO',
  email: 'dana@acme.com',
  linkedinUrl: 'https://linkedin.com/in/danalee',
  phone: '555-0100',
  location: 'Denver',
  organizationType: 'Public Pension',
};

const draft: OutreachDraft = {
  subject: 'Sunbelt multifamily for Acme',
  body: 'Hi Dana',
  primaryOffering: 'Harborline',
  secondaryOfferings: [],
  rationale: '',
};

describe('Renderers Module', () => {
  describe('renderQualificationNotes()', () => {
    test('should list the best match, rationales and summary', () => {
      expect(renderQualificationNotes(scoringResult())).toBe(
        'Best Match: Harborline\n\n' +
          'Harborline: Long-dated real estate program\n' +
          'Cedar Yield: Income sleeve fits\n' +
          'Northgate: Limited venture exposure\n' +
          'Keystone: No public equity mandate\n' +
          'Brightfield: Open to growth equity\n' +
          'Co-Invest: Active co-investor\n\n' +
          'Diversified allocator with an active direct program.'
      );
    });

    test('should omit an empty summary', () => {
      const notes = renderQualificationNotes(scoringResult(scoringReply({ overall_notes: '' })));
      expect(notes.endsWith('Co-Invest: Active co-investor')).toBe(true);
    });
  });

  describe('buildScoringUpdate()', () => {
    test('should write every fit, the status, notes, overview and best matches', () => {
      const result = scoringResult();
      const update = buildScoringUpdate(result);

      expect(update['Harborline Fit']).toEqual(prop.select('Strong'));
      expect(update['Cedar Yield Fit']).toEqual(prop.select('Moderate'));
      expect(update['Keystone Fit']).toEqual(prop.select('N/A'));
      expect(update['Research Status']).toEqual(prop.select('Qualified'));
      expect(update['Qualification Notes']).toEqual(prop.richText(renderQualificationNotes(result)));
      expect(update['Firm Overview']).toEqual(prop.richText('Acme runs a diversified pension plan.'));
      expect(update['Best Matches']).toEqual(prop.multiSelect(['Harborline', 'Co-Invest']));
      expect(Object.keys(update)).toHaveLength(10);
    });

    test('should leave Best Matches alone without a Strong fit', () => {
      const update = buildScoringUpdate(
        scoringResult(scoringReply({ harborline_fit: 'Moderate', co_invest_fit: 'Weak' }))
      );
      expect('Best Matches' in update).toBe(false);
    });
  });

  describe('buildDispatchUpdate()', () => {
    test('should set Researching and clear restart only for a restart', () => {
      expect(buildDispatchUpdate(false)).toEqual({ 'Research Status': prop.select('Researching') });
      expect(buildDispatchUpdate(true)).toEqual({
        'Research Status': prop.select('Researching'),
        'Restart Enrichment': prop.checkbox(false),
      });
    });
  });

  describe('buildEnrichmentMerge()', () => {
    test('should only write fields the relay returned', () => {
      expect(buildEnrichmentMerge({
        recordId: 'page-1',
        firmName: 'Acme Capital',
        linkedinUrl: 'https://linkedin.com/company/acme',
        location: null,
        firmOverview: 'Public pension plan',
        employeeCount: null,
        people: [],
        skippedPeople: 0,
      })).toEqual({
        'LinkedIn Company URL': prop.url('https://linkedin.com/company/acme'),
        'Firm Overview': prop.richText('Public pension plan'),
        'Research Status': prop.select('Qualified'),
      });
    });
  });

  describe('buildContactProperties()', () => {
    test('should write every known field', () => {
      expect(buildContactProperties(person)).toEqual({
        Name: prop.title('Dana Lee'),
        Company: prop.richText('Acme Capital'),
        Status: prop.select('Qualified'),
        Email: prop.email('dana@acme.com'),
        'Title/Role': prop.richText('CIO'),
        'LinkedIn URL': prop.url('https://linkedin.com/in/danalee'),
        'Mobile Phone': prop.phoneNumber('555-0100'),
        'Organization Type': prop.select('Public Pension'),
      });
    });

    test('should mark a contact without email as New', () => {
      const properties = buildContactProperties({
        ...person,
        email: null,
        title: null,
        linkedinUrl: null,
        phone: null,
        organizationType: null,
      });
      expect(properties).toEqual({
        Name: prop.title('Dana Lee'),
        Company: prop.richText('Acme Capital'),
        Status: prop.select('New'),
      });
    });

    test('should honor an explicit status', () => {
      expect(buildContactProperties(person, 'Enriching')['Status']).toEqual(prop.select('Enriching'));
      expect(buildContactStatusUpdate('Enriching')).toEqual({ Status: prop.select('Enriching') });
    });
  });

  describe('buildOutreachUpdate()', () => {
    const record: StoreRecord = {
      id: 'page-1',
      properties: {
        'Firm Name': prop.title('Acme Capital'),
        'Latest Outreach Contact': prop.richText(''),
        'Latest Outreach Subject': prop.richText(''),
        'Last Outreach Run': prop.date(null),
        'Outreach Draft URL': prop.url(null),
      },
    };

    test('should only write properties the record has', () => {
      expect(buildOutreachUpdate(record, {
        draft,
        contactLabel: null,
        contactEmail: 'dana@acme.com',
        draftUrl: 'https://mail.example/draft',
        runDate: '2026-03-02',
      })).toEqual({
        'Latest Outreach Contact': prop.richText('Investment Team'),
        'Latest Outreach Subject': prop.richText('Sunbelt multifamily for Acme'),
        'Last Outreach Run': prop.date('2026-03-02'),
        'Outreach Draft URL': prop.url('https://mail.example/draft'),
      });
    });

    test('should write nothing to a record without outreach columns', () => {
      expect(buildOutreachUpdate({ id: 'page-2', properties: {} }, {
        draft,
        contactLabel: 'Dana Lee',
        contactEmail: null,
        draftUrl: null,
        runDate: '2026-03-02',
      })).toEqual({});
    });
  });

  describe('buildReplyUpdate()', () => {
    test('should tag the reply and append an excerpt', () => {
      expect(buildReplyUpdate('Positive', '2026-03-02', 'Sent intro.', 'Sounds good')).toEqual({
        'Response Status': prop.select('Responded — Positive'),
        'Response Date': prop.date('2026-03-02'),
        Outcome: prop.select('In Discussion'),
        'Follow-up Required': prop.checkbox(false),
        Notes: prop.richText('Sent intro.\n\n[Response received 2026-03-02]\nSounds good...'),
      });
    });

    test('should decline a negative reply and skip notes for an empty body', () => {
      const update = buildReplyUpdate('Negative', '2026-03-02', 'Sent intro.', '');
      expect(update['Outcome']).toEqual(prop.select('Declined'));
      expect('Notes' in update).toBe(false);
    });

    test('should cap the excerpt and keep the newest notes', () => {
      const body = 'b'.repeat(300);
      expect(renderReplyExcerpt(body, '2026-03-02')).toBe(`\n\n[Response received 2026-03-02]\n${'b'.repeat(200)}...`);

      const existing = 'a'.repeat(1990);
      const update = buildReplyUpdate('Neutral', '2026-03-02', existing, body);
      const notes = update['Notes'];
      expect(notes?.type === 'richText' && notes.text.length).toBe(2000);
      expect(notes?.type === 'richText' && notes.text.endsWith(`${'b'.repeat(200)}...`)).toBe(true);
    });

    test('should not split an emoji when cutting the excerpt or the notes', () => {
      const body = `${'b'.repeat(199)}😀c`;
      expect(renderReplyExcerpt(body, '2026-03-02')).toBe(`\n\n[Response received 2026-03-02]\n${'b'.repeat(199)}😀...`);

      const existing = `${'a'.repeat(100)}😀${'a'.repeat(1961)}`;
      const update = buildReplyUpdate('Neutral', '2026-03-02', existing, 'Hi');
      expect(update['Notes']).toEqual(
        prop.richText(`😀${'a'.repeat(1961)}${renderReplyExcerpt('Hi', '2026-03-02')}`)
      );
    });
  });
});
