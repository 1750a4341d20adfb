import {
  AnalysisResult,
  EmotionalPattern,
  Interaction,
  Recommendation,
  STRATEGY_KEYS,
} from '../../types/resilience';

const COACH_PERSONA = 'You are a compassionate mental wellness coach focused on resilience and everyday coping.';

/**
 * Summarize retrieved past interactions for inclusion in a prompt.
 */
export function formatMemoryContext(memoryContext: Interaction[] = []): string {
  if (memoryContext.length === 0) {
    return 'No previous conversations with this user.';
  }

  return memoryContext
    .slice(0, 3)
    .map((item, index) => {
      const message = item.user_message.length > 120 ? item.user_message.slice(0, 117) + '...' : item.user_message;
      return `${index + 1}. [${item.timestamp}] "${message}" (sentiment: ${item.analysis.sentiment}, stress: ${item.analysis.stress_level}, strategy: ${item.strategy_type})`;
    })
    .join('\n');
}

export function formatPatterns(patterns?: EmotionalPattern | null): string {
  if (!patterns || patterns.total_interactions === 0) {
    return 'No emotional history yet.';
  }

  return [
    `- Recurring emotions: ${patterns.recurring_emotions.join(', ') || 'none'}`,
    `- Average stress: ${patterns.avg_stress}`,
    `- Past crisis moments: ${patterns.crisis_frequency}`,
    `- Total conversations: ${patterns.total_interactions}`,
  ].join('\n');
}

function formatAnalysis(analysis: AnalysisResult): string {
  return [
    `- Sentiment: ${analysis.sentiment}`,
    `- Stress Level: ${analysis.stress_level}`,
    `- Emotions: ${analysis.emotions.join(', ')}`,
  ].join('\n');
}

export function buildAnalysisPrompt(
  userInput: string,
  memoryContext?: Interaction[],
  patterns?: EmotionalPattern | null
): string {
  return `${COACH_PERSONA} Analyze the following user input for emotional state and stress level.

User Input: "${userInput}"

Previous conversations:
${formatMemoryContext(memoryContext)}

Emotional history:
${formatPatterns(patterns)}

Provide your analysis in EXACTLY this format (one line each, no extra text):
SENTIMENT: [positive/neutral/negative/deeply_negative]
STRESS_LEVEL: [low/medium/high/crisis]
EMOTIONS: [list 2-4 specific emotions separated by commas, e.g., anxiety, overwhelm, sadness]
CONFIDENCE: [number between 0.0 and 1.0]
REASONING: [one sentence explaining the assessment]

Be precise and concise. Only output the five lines above, nothing else.`;
}

export function buildCrisisPrompt(
  userInput: string,
  analysis: AnalysisResult,
  patterns?: EmotionalPattern | null
): string {
  return `You are a mental health safety assessor. Estimate the risk of self-harm or suicide in the message below.

User Input: "${userInput}"

Current analysis:
${formatAnalysis(analysis)}

Emotional history:
${formatPatterns(patterns)}

Scoring guide:
- 0.0-0.3: everyday stress, no risk indicators
- 0.4-0.6: significant distress, no direct risk statements
- 0.7-0.8: hopelessness or indirect references to not wanting to be here
- 0.9-1.0: explicit statements of self-harm or suicidal intent

Respond with EXACTLY one line:
CRISIS_SCORE: [number between 0.0 and 1.0]`;
}

export function buildReasoningPrompt(
  userInput: string,
  analysis: AnalysisResult,
  patterns: EmotionalPattern | null | undefined,
  crisisScore: number
): string {
  return `${COACH_PERSONA}

The user shared: "${userInput}"

Analysis:
${formatAnalysis(analysis)}
- Crisis score: ${crisisScore.toFixed(2)}

Emotional history:
${formatPatterns(patterns)}

In ONE or TWO sentences, explain what the user seems to be going through and what kind of support would help most. Do not address the user directly.`;
}

export function buildRecommendationPrompt(
  userInput: string,
  analysis: AnalysisResult,
  patterns: EmotionalPattern | null | undefined,
  recentTypes: string[],
  reasoning: string
): string {
  return `${COACH_PERSONA}

The user shared: "${userInput}"

Analysis:
${formatAnalysis(analysis)}

Context: ${reasoning || 'none'}

Emotional history:
${formatPatterns(patterns)}
Recently suggested strategies: ${recentTypes.join(', ') || 'none'}

Choose ONE coping strategy. TYPE must be exactly one of: ${STRATEGY_KEYS.join(', ')}.
Avoid repeating the most recent strategy unless stress is high.

Respond in EXACTLY this format:
TYPE: [strategy key]
STEPS: [4-7 short instructions separated by |]
REASONING: [one sentence on why this fits]`;
}

export function buildSupportPrompt(
  userInput: string,
  analysis: AnalysisResult,
  recommendation: Recommendation | null,
  patterns?: EmotionalPattern | null
): string {
  const strategyLine = recommendation
    ? `\nSuggested strategy: ${recommendation.name ?? recommendation.type}`
    : '';
  const historyLine =
    patterns && patterns.total_interactions > 0
      ? `\nThey have talked with you ${patterns.total_interactions} time(s) before; recurring feelings: ${patterns.recurring_emotions.join(', ') || 'none'}.`
      : '';

  return `${COACH_PERSONA} The user shared: "${userInput}"

Analysis shows:
${formatAnalysis(analysis)}${strategyLine}${historyLine}

Write ONE SHORT supportive message (2-3 sentences max) that:
1. Validates their feelings
2. Offers gentle encouragement
3. Is warm and empathetic

Keep it conversational and natural. Do not give medical advice.`;
}

export function buildCrisisResponsePrompt(userInput: string, analysis: AnalysisResult): string {
  return `You are a calm, caring crisis support companion. The user shared: "${userInput}"

Emotions detected: ${analysis.emotions.join(', ')}

Write 2-3 short sentences that:
1. Acknowledge their pain without judgment
2. Tell them they are not alone and that their life matters
3. Gently encourage them to contact a crisis line or someone they trust right now

Do not list phone numbers; they are added separately. Do not give medical advice.`;
}
