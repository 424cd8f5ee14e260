/**
 * Input validation and output cleaning for user-facing text.
 *
 * Questions are checked for script-like payloads and prompt-injection
 * phrasing before any provider call. Model output is stripped of markup that
 * a chat widget could execute.
 */

import { ValidationError } from '../api/errors.js';

const BLOCKED_PATTERNS: readonly RegExp[] = [
  /<script/i,
  /javascript:/i,
  /\bon\w+\s*=/i,
  /data:text\/html/i,
  /<iframe/i,
  /<object/i,
  /<embed/i,
  /vbscript:/i,
  /\beval\(/i,
  /\balert\(/i,
];

const INJECTION_PATTERNS: readonly RegExp[] = [
  /ignore\s+(?:all\s+)?(?:previous\s+|prior\s+)?instructions?/i,
  /forget\s+(?:all\s+)?(?:previous\s+)?instructions?/i,
  /you\s+are\s+now\s+(?:a\s+)?(?:different\s+)?(?:ai|assistant|bot)/i,
  /act\s+as\s+(?:if\s+)?(?:you\s+are\s+)?(?:a\s+)?(?:different\s+)?(?:ai|assistant|bot)/i,
  /pretend\s+(?:to\s+be|you\s+are)\s+(?:a\s+)?(?:different\s+)?(?:ai|assistant|bot)/i,
  /system\s+(?:prompt|message|instruction)/i,
  /ignore\s+(?:the\s+)?(?:above|previous|earlier)/i,
  /\bjailbreak/i,
  /bypass\s+(?:safety|security|content|filtering)/i,
];

const OUTPUT_STRIP: readonly RegExp[] = [
  /<script\b[^>]*>[\s\S]*?<\/script>/gi,
  /<(?:script|iframe|object|embed)\b[^>]*>/gi,
  /<\/(?:script|iframe|object|embed)>/gi,
  /(?:javascript|vbscript):/gi,
];

export function hasDangerousContent(text: string): boolean {
  return BLOCKED_PATTERNS.some((pattern) => pattern.test(text));
}

export function isPromptInjection(text: string): boolean {
  return INJECTION_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Validate a user question and return it trimmed.
 *
 * @throws {ValidationError} QuestionRejected
 */
export function validateQuestion(question: string, maxChars: number): string {
  const trimmed = question.trim();

  if (!trimmed) {
    throw new ValidationError('QuestionRejected', 'Question is empty');
  }
  if (trimmed.length > maxChars) {
    throw new ValidationError('QuestionRejected', `Question exceeds ${maxChars} characters`, {
      length: trimmed.length,
      maxChars,
    });
  }
  if (hasDangerousContent(trimmed)) {
    throw new ValidationError('QuestionRejected', 'Question contains unsafe content');
  }
  if (isPromptInjection(trimmed)) {
    throw new ValidationError('QuestionRejected', 'Question contains instruction-override phrasing');
  }

  return trimmed;
}

/**
 * Remove executable markup from model output without truncating it.
 */
export function cleanOutput(text: string): string {
  let cleaned = text;
  for (const pattern of OUTPUT_STRIP) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned
    .replace(/\n[ \t]+\n/g, '\n\n')
    .replace(/[ \t]+/g, ' ')
    .trim();
}
