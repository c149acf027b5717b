/**
 * Unit tests for the reply classifier
 */

import { describe, test, expect } from '@jest/globals';
import { classifyReply, replyOutcome, replyStatusLabel } from '../../src/classifier/index.js';

describe('Classifier Module', () => {
  describe('classifyReply()', () => {
    test('should tag positive replies', () => {
      expect(classifyReply('Sounds good, happy to find a time next week.')).toBe('Positive');
      expect(classifyReply("Let's discuss on Thursday")).toBe('Positive');
      expect(classifyReply('YES - please send the deck')).toBe('Positive');
    });

    test('should tag negative replies', () => {
      expect(classifyReply('We will pass on this one.')).toBe('Negative');
      expect(classifyReply('Please unsubscribe me')).toBe('Negative');
      expect(classifyReply('Not at this time, thanks')).toBe('Negative');
    });

    test('should prefer negative when both classes appear', () => {
      expect(classifyReply('not interested, but sounds good')).toBe('Negative');
      expect(classifyReply('Great note, but it is not a fit for us')).toBe('Negative');
    });

    test('should default to Neutral', () => {
      expect(classifyReply('Received, will circle back.')).toBe('Neutral');
      expect(classifyReply('')).toBe('Neutral');
      expect(classifyReply(null)).toBe('Neutral');
      expect(classifyReply(undefined)).toBe('Neutral');
    });

    test('should catch inflected declines next to positive words', () => {
      expect(classifyReply("We're passing on this one, but happy to connect later.")).toBe('Negative');
      expect(classifyReply('We have declined all new manager meetings this year, great to hear from you.')).toBe('Negative');
      expect(classifyReply('We declined.')).toBe('Negative');
      expect(classifyReply('Please have me removed from the list')).toBe('Negative');
      expect(classifyReply('We stopped new commitments, but would love to stay in touch')).toBe('Negative');
    });

    test('should only match positive keywords as whole words', () => {
      expect(classifyReply('I recall your earlier email')).toBe('Neutral');
      expect(classifyReply('Thanks for the greatly detailed note')).toBe('Neutral');
      expect(classifyReply('Reconnecting with the team in May')).toBe('Neutral');
    });

    test('should match phrases across line breaks and curly apostrophes', () => {
      expect(classifyReply('We are not\ninterested right now')).toBe('Negative');
      expect(classifyReply('Let’s discuss next week')).toBe('Positive');
    });
  });

  describe('replyStatusLabel()', () => {
    test('should prefix the classification', () => {
      expect(replyStatusLabel('Positive')).toBe('Responded — Positive');
      expect(replyStatusLabel('Neutral')).toBe('Responded — Neutral');
    });
  });

  describe('replyOutcome()', () => {
    test('should decline only negative replies', () => {
      expect(replyOutcome('Negative')).toBe('Declined');
      expect(replyOutcome('Positive')).toBe('In Discussion');
      expect(replyOutcome('Neutral')).toBe('In Discussion');
    });
  });
});
