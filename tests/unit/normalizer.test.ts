/**
 * Unit tests for the Normalizer module
 */

import { describe, test, expect } from '@jest/globals';
import {
  extractDomain,
  normalizeUrl,
  normalizeEmail,
  sanitizeResearch,
  mapOrganizationType,
  normalizeNewFirmEvent,
  normalizeFirmEnrichedEvent,
  normalizeScoringTrigger,
  normalizePersonEnrichedEvent,
  normalizeContactEnrichmentRequest,
  normalizeOutreachTrigger,
  normalizeReplyEvent,
} from '../../src/normalizer/index.js';

describe('Normalizer Module', () => {
  describe('extractDomain()', () => {
    test('should strip protocol, www, path and case', () => {
      expect(extractDomain('https://www.Example.com/path')).toBe('example.com');
      expect(extractDomain('https://www.acmecapital.com')).toBe('acmecapital.com');
    });

    test('should accept bare hosts and ports', () => {
      expect(extractDomain('acmecapital.com')).toBe('acmecapital.com');
      expect(extractDomain('http://invest.acme.org:8080/team/')).toBe('invest.acme.org');
    });

    test('should be idempotent', () => {
      const urls = ['https://www.Example.com/path', 'WWW.Foo.io', 'http://www.www.bar.net/x?y=1'];
      for (const url of urls) {
        const once = extractDomain(url);
        expect(extractDomain(once)).toBe(once);
      }
    });

    test('should return null for empty or unparseable input', () => {
      expect(extractDomain('')).toBeNull();
      expect(extractDomain('   ')).toBeNull();
      expect(extractDomain(null)).toBeNull();
      expect(extractDomain('not a url')).toBeNull();
    });
  });

  describe('normalizeUrl()', () => {
    test('should add https and drop a trailing slash', () => {
      expect(normalizeUrl('acme.com/team/')).toBe('https://acme.com/team');
      expect(normalizeUrl('http://acme.com')).toBe('http://acme.com/');
    });

    test('should return null for blanks', () => {
      expect(normalizeUrl('  ')).toBeNull();
    });
  });

  describe('normalizeEmail()', () => {
    test('should trim and lower-case', () => {
      expect(normalizeEmail('  Dana.Lee@Acme.COM ')).toBe('dana.lee@acme.com');
      expect(normalizeEmail('')).toBeNull();
    });
  });

  describe('sanitizeResearch()', () => {
    test('should flatten line breaks and cap length', () => {
      expect(sanitizeResearch('line one\r\nline two')).toBe('line one  line two');
      expect(sanitizeResearch('abcdef', 3)).toBe('abc');
      expect(sanitizeResearch(null)).toBe('');
    });
  });

  describe('mapOrganizationType()', () => {
    test('should map keywords in priority order', () => {
      expect(mapOrganizationType('State Pension Fund')).toBe('Public Pension');
      expect(mapOrganizationType('University Endowment')).toBe('E&F');
      expect(mapOrganizationType('Single Family Offices')).toBe('Family Office');
      expect(mapOrganizationType('Registered Investment Advisor (RIA)')).toBe('RIA');
      expect(mapOrganizationType('Regional Healthcare System')).toBe('Hospital/Healthcare');
    });

    test('should only match keywords at the start of a word', () => {
      expect(mapOrganizationType('Memorial Hospital')).toBe('Hospital/Healthcare');
    });

    test('should return null when nothing matches', () => {
      expect(mapOrganizationType('Sovereign Wealth Fund')).toBeNull();
      expect(mapOrganizationType(null)).toBeNull();
    });
  });

  describe('normalizeNewFirmEvent()', () => {
    test('should read the CRM automation shape', () => {
      const result = normalizeNewFirmEvent({
        data: {
          id: 'page-1',
          properties: {
            'Firm Name': { type: 'title', title: [{ plain_text: 'Acme Capital' }] },
            Website: { type: 'url', url: 'https://www.acmecapital.com' },
            'Restart Enrichment': { type: 'checkbox', checkbox: true },
          },
        },
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          recordId: 'page-1',
          firmName: 'Acme Capital',
          website: 'https://www.acmecapital.com',
          restart: true,
        });
      }
    });

    test('should read the flat shape', () => {
      const result = normalizeNewFirmEvent({
        notion_page_id: 'page-2',
        name: '  Acme  ',
        restart_enrichment: 'yes',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ recordId: 'page-2', firmName: 'Acme', website: null, restart: true });
      }
    });

    test('should reject a non-object payload', () => {
      const result = normalizeNewFirmEvent('oops');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('InputError');
        expect(result.error.code).toBe('VALIDATION_ERROR');
      }
    });
  });

  describe('normalizeFirmEnrichedEvent()', () => {
    test('should keep named people and count the rest', () => {
      const result = normalizeFirmEnrichedEvent({
        notion_page_id: 'page-1',
        firm_name: 'Acme Capital',
        linkedin_url: 'linkedin.com/company/acme/',
        employee_count: 42,
        people: [
          { name: 'Dana Lee', email: ' Dana@Acme.COM ', organization_type: 'State Pension Fund' },
          { title: 'Analyst' },
          'garbage',
        ],
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.linkedinUrl).toBe('https://linkedin.com/company/acme');
        expect(result.data.employeeCount).toBe('42');
        expect(result.data.skippedPeople).toBe(2);
        expect(result.data.people).toEqual([
          {
            name: 'Dana Lee',
            firmName: 'Acme Capital',
            title: null,
            email: 'dana@acme.com',
            linkedinUrl: null,
            phone: null,
            location: null,
            organizationType: 'Public Pension',
          },
        ]);
      }
    });

    test('should require a record id', () => {
      const result = normalizeFirmEnrichedEvent({ firm_name: 'Acme Capital' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('MISSING_RECORD_ID');
      }
    });
  });

  describe('normalizeScoringTrigger()', () => {
    test('should prefer research over firm_research and sanitize it', () => {
      const result = normalizeScoringTrigger({
        notion_page_id: 'page-1',
        firm_name: 'Acme Capital',
        research: 'Pension plan\nwith RE allocation',
        firm_research: 'ignored',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          recordId: 'page-1',
          firmName: 'Acme Capital',
          website: '',
          research: 'Pension plan with RE allocation',
        });
      }
    });
  });

  describe('normalizePersonEnrichedEvent()', () => {
    test('should carry the firm record id', () => {
      const result = normalizePersonEnrichedEvent({
        name: 'Sam Ortiz',
        firm_name: 'Acme Capital',
        notion_page_id: 'page-1',
        phone: 5551234,
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.firmRecordId).toBe('page-1');
        expect(result.data.phone).toBe('5551234');
      }
    });

    test('should require a name', () => {
      const result = normalizePersonEnrichedEvent({ firm_name: 'Acme Capital' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('MISSING_NAME');
      }
    });
  });

  describe('normalizeContactEnrichmentRequest()', () => {
    test('should fall back to notion_page_id for the contact id', () => {
      const result = normalizeContactEnrichmentRequest({
        notion_page_id: 'contact-9',
        name: 'Sam Ortiz',
        email: 'SAM@ACME.COM',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          contactId: 'contact-9',
          name: 'Sam Ortiz',
          firmName: '',
          linkedinUrl: null,
          email: 'sam@acme.com',
        });
      }
    });
  });

  describe('normalizeOutreachTrigger()', () => {
    test('should split a comma-separated fit list', () => {
      const result = normalizeOutreachTrigger({
        firm_id: 'page-1',
        fit: 'Harborline, Keystone,',
        contact_email: 'A@B.com',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.fit).toEqual(['Harborline', 'Keystone']);
        expect(result.data.contactEmail).toBe('a@b.com');
        expect(result.data.firmName).toBeNull();
      }
    });

    test('should reject a contact email that could carry extra headers', () => {
      const result = normalizeOutreachTrigger({
        firm_id: 'page-1',
        contact_email: 'dana@acme.com\r\nBcc: list@example.com',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          kind: 'InputError',
          code: 'INVALID_EMAIL',
          message: 'contact_email is not a valid email address',
        });
      }
      expect(normalizeOutreachTrigger({ firm_id: 'page-1', contact_email: 'dana at acme' }).success).toBe(false);
    });

    test('should accept a fit array', () => {
      const result = normalizeOutreachTrigger({ firm_id: 'page-1', fit: ['Cedar Yield', ' '] });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.fit).toEqual(['Cedar Yield']);
      }
    });

    test('should require firm_id', () => {
      const result = normalizeOutreachTrigger({ firm_name: 'Acme Capital' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('MISSING_FIRM_ID');
      }
    });
  });

  describe('normalizeReplyEvent()', () => {
    test('should normalize the reply', () => {
      const result = normalizeReplyEvent({
        thread_id: 'thread-1',
        sender_email: 'Dana@Acme.com',
        email_body: '  Sounds good  ',
        received_date: '2026-03-02T09:00:00Z',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          threadId: 'thread-1',
          senderEmail: 'dana@acme.com',
          body: 'Sounds good',
          receivedAt: '2026-03-02T09:00:00Z',
        });
      }
    });

    test('should require thread id and sender', () => {
      const result = normalizeReplyEvent({ thread_id: 'thread-1' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('MISSING_REQUIRED_FIELDS');
      }
    });
  });
});
