/**
 * Classifier Module
 *
 * Keyword tagging of inbound replies to outreach. Matching is
 * case-insensitive. Negative keywords match anywhere in the text, so
 * "passing", "declined" and "removed" count as declines. Positive keywords
 * match whole words only, so "call" does not fire inside "recall". Any
 * negative phrase wins over any positive one; a reply with neither is Neutral.
 */

import type { ReplyClassification } from '../types/index.js';

export const POSITIVE_KEYWORDS: readonly string[] = [
  'interested',
  'yes',
  'sounds good',
  "let's discuss",
  'happy to',
  'would love to',
  'absolutely',
  'definitely',
  'great',
  'perfect',
  'schedule',
  'meeting',
  'call',
  'connect',
];

export const NEGATIVE_KEYWORDS: readonly string[] = [
  'not interested',
  'no thank you',
  'pass',
  'not a fit',
  'decline',
  'unsubscribe',
  'remove',
  'stop',
  'not at this time',
];

export type ReplyOutcome = 'Declined' | 'In Discussion';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(keyword: string): string {
  return keyword.split(/\s+/).map(escapeRegExp).join('\\s+');
}

function wholeWordPattern(keyword: string): RegExp {
  return new RegExp(`(?<![\\w'])${phrasePattern(keyword)}(?![\\w'])`, 'i');
}

function substringPattern(keyword: string): RegExp {
  return new RegExp(phrasePattern(keyword), 'i');
}

const POSITIVE_PATTERNS = POSITIVE_KEYWORDS.map(wholeWordPattern);
const NEGATIVE_PATTERNS = NEGATIVE_KEYWORDS.map(substringPattern);

/** Typographic apostrophes are matched as plain ones */
function normalizeReply(text: string): string {
  return text.replace(/[‘’]/g, "'");
}

export function classifyReply(text: string | null | undefined): ReplyClassification {
  const body = normalizeReply(text ?? '');
  if (NEGATIVE_PATTERNS.some((pattern) => pattern.test(body))) {
    return 'Negative';
  }
  if (POSITIVE_PATTERNS.some((pattern) => pattern.test(body))) {
    return 'Positive';
  }
  return 'Neutral';
}

/** "Response Status" select option for a classification */
export function replyStatusLabel(classification: ReplyClassification): string {
  return `Responded — ${classification}`;
}

export function replyOutcome(classification: ReplyClassification): ReplyOutcome {
  return classification === 'Negative' ? 'Declined' : 'In Discussion';
}
