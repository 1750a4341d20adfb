import { Recommendation } from '../types/resilience';

export const MAX_MESSAGE_LENGTH = 500;

export const CRISIS_RESOURCES_MESSAGE = [
  'Please reach out for immediate support:',
  '- Call or text 988 (Suicide & Crisis Lifeline, US)',
  '- Text HOME to 741741 (Crisis Text Line)',
  '- Call 116 123 (Samaritans, UK & Ireland)',
  '- Call your local emergency number (911 / 112) if you are in danger',
].join('\n');

export const FALLBACK_CRISIS_MESSAGE =
  "I'm really glad you told me, and I'm concerned about your safety. You don't have to face this alone, and talking to someone right now can help.";

export const CRISIS_SUPPORT_RECOMMENDATION: Recommendation = {
  type: 'crisis_support',
  name: 'Immediate Crisis Support',
  steps: [
    'Call or text 988 to reach the Suicide & Crisis Lifeline',
    'Text HOME to 741741 to reach a trained crisis counselor',
    'Move away from anything you could use to hurt yourself',
    'Reach out to someone you trust and tell them how you feel',
    'If you are in immediate danger, call your local emergency number',
  ],
  reasoning: 'Your message suggests you may be in crisis, so connecting with people who can help right now comes first.',
};

/**
 * Append the crisis contacts to a reply. The reply body is shortened when needed so
 * the contacts always fit within the message limit.
 */
export function withCrisisResources(body: string): string {
  const separator = '\n\n';
  const budget = MAX_MESSAGE_LENGTH - CRISIS_RESOURCES_MESSAGE.length - separator.length;
  let trimmed = body.trim() || FALLBACK_CRISIS_MESSAGE;

  if (trimmed.length > budget) {
    trimmed = trimmed.slice(0, budget - 3).trimEnd() + '...';
  }

  return trimmed + separator + CRISIS_RESOURCES_MESSAGE;
}
