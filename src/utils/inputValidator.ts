import { logger } from './logger';
import { RequestMetadata, isRecord } from '../types/resilience';

export const MIN_INPUT_LENGTH = 3;
export const MAX_INPUT_LENGTH = 2000;
const MAX_USER_ID_LENGTH = 100;
const MAX_LANGUAGE_LENGTH = 10;
const SUPPORTED_LANGUAGES = ['en', 'english'];

const SPAM_PATTERNS: RegExp[] = [
  /(.)\1{9,}/, // 10+ repeated characters
  /^[^a-zA-Z0-9\s]{20,}$/, // nothing but special characters
  /https?:\/\/\S+/i,
];

const BLOCKED_PATTERNS: RegExp[] = [
  /<script[^>]*>[\s\S]*?<\/script>/i,
  /<script/i,
  /javascript:/i,
  /on\w+\s*=/i,
  /eval\s*\(/i,
  /exec\s*\(/i,
];

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; error: string };

function isSpam(text: string): boolean {
  if (SPAM_PATTERNS.some(pattern => pattern.test(text))) {
    return true;
  }

  const alphaCount = (text.match(/\p{L}/gu) || []).length;
  return text.length > 10 && alphaCount / text.length < 0.3;
}

export function sanitizeText(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/\s+/g, ' ')
    .slice(0, MAX_INPUT_LENGTH)
    .trim();
}

/**
 * Validate and sanitize the user's message.
 */
export function validateInputText(input: unknown): ValidationResult<string> {
  if (input === undefined || input === null) {
    return { valid: false, error: 'Input text is required' };
  }
  if (typeof input !== 'string') {
    return { valid: false, error: 'Input text must be a string' };
  }

  const text = input.trim();

  if (text.length === 0) {
    return { valid: false, error: 'Input cannot be empty' };
  }
  if (text.length > MAX_INPUT_LENGTH) {
    return { valid: false, error: `Input too long. Maximum ${MAX_INPUT_LENGTH} characters allowed` };
  }
  if (text.length < MIN_INPUT_LENGTH) {
    return { valid: false, error: "Input too short. Please share more about how you're feeling" };
  }

  const blocked = BLOCKED_PATTERNS.find(pattern => pattern.test(text));
  if (blocked) {
    logger.warn(`Blocked malicious pattern detected: ${blocked.source}`);
    return { valid: false, error: 'Invalid input detected. Please avoid special characters or code' };
  }

  if (isSpam(text)) {
    return { valid: false, error: 'Input appears invalid. Please share genuine thoughts or feelings' };
  }

  return { valid: true, value: sanitizeText(text) };
}

export function validateMetadata(metadata: unknown): ValidationResult<RequestMetadata> {
  if (metadata === undefined || metadata === null) {
    return { valid: true, value: { language: 'en' } };
  }
  if (!isRecord(metadata)) {
    return { valid: false, error: 'Metadata must be an object' };
  }

  const sanitized: RequestMetadata = {};

  if (metadata.user_id !== undefined && metadata.user_id !== null) {
    const userId = String(metadata.user_id).trim();
    if (userId.length > MAX_USER_ID_LENGTH) {
      return { valid: false, error: 'user_id too long' };
    }
    if (userId) {
      sanitized.user_id = userId;
    }
  }

  if (metadata.language !== undefined && metadata.language !== null) {
    const language = String(metadata.language).trim().toLowerCase();
    if (language.length > MAX_LANGUAGE_LENGTH) {
      return { valid: false, error: 'Invalid language code' };
    }
    if (language && !SUPPORTED_LANGUAGES.includes(language)) {
      logger.info(`Unsupported language '${language}', defaulting to 'en'`);
    }
  }
  sanitized.language = 'en';

  return { valid: true, value: sanitized };
}
