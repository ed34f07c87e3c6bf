/**
 * Verification code extraction from provider emails
 *
 * Patterns run from most to least specific. The last one accepts any bare
 * 6-digit run, skipping the all-zero placeholders some templates carry.
 */

import type { MessageBody } from './types.js';

export const CODE_PATTERNS: readonly RegExp[] = [
  /verification code(?: is)?\s*[:\-]?\s*(\d{6})\b/i,
  /security code(?: is)?\s*[:\-]?\s*(\d{6})\b/i,
  /one-time code for your account\s+(\d{6})\b/i,
  /\bcode(?: is)?\s*[:\-]\s*(\d{6})\b/i,
  /\bcode is\s+(\d{6})\b/i,
];

const BARE_CODE = /\b(\d{6})\b/g;
const PLACEHOLDER = '000000';

const HTML_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

/**
 * Reduce an HTML body to whitespace-normalised text
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(nbsp|amp|lt|gt|quot|#39);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/[ \t]+/g, ' ')
    .trim();
}

/**
 * Plain-text part if present, otherwise the HTML part stripped to text
 */
export function bodyText(body: MessageBody): string {
  if (body.text && body.text.trim() !== '') {
    return body.text;
  }
  return body.html ? stripHtml(body.html) : '';
}

export function extractCode(text: string): string | undefined {
  for (const pattern of CODE_PATTERNS) {
    const match = pattern.exec(text);
    if (match && match[1] !== PLACEHOLDER) {
      return match[1];
    }
  }

  for (const match of text.matchAll(BARE_CODE)) {
    if (match[1] !== PLACEHOLDER) {
      return match[1];
    }
  }
  return undefined;
}
