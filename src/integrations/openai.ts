import OpenAI from 'openai';
import { z } from 'zod';
import { JudgeVerdict, RelevanceJudge, TurnAnalysis, TurnExtractor, UserIntent } from '../types';
import { OpenAIConfig } from '../utils/config';
import { JudgeResponseError } from '../utils/errors';

export const USER_INTENTS: UserIntent[] = [
  'request_story',
  'ask_opinion',
  'seek_advice',
  'ask_clarification_question',
  'share_experience',
  'general_conversation',
  'express_emotion',
  'ask_question'
];

// Numbers, or strings that are nothing but a number; null, booleans and arrays are not scores
const judgeScoreSchema = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)
]);

const judgeReplySchema = z.object({
  score: judgeScoreSchema,
  reasoning: z.string().default('')
});

const extractionReplySchema = z.object({
  topics: z.array(z.string()).default([]),
  concepts: z.array(z.string()).default([]),
  intent: z.string().optional()
});

/**
 * Reads a judge reply. JSON `{score, reasoning}` is preferred; a JSON object
 * without a usable score is rejected outright. A reply that
 * merely starts with a number ("7 - strong topic overlap") is also accepted.
 */
export function parseJudgeReply(reply: string): JudgeVerdict {
  const text = reply.trim();

  try {
    const parsed = judgeReplySchema.safeParse(JSON.parse(text));
    if (parsed.success && Number.isFinite(parsed.data.score)) {
      return { score: parsed.data.score, reasoning: parsed.data.reasoning };
    }
  } catch {
    // not JSON, try the leading-number form below
  }

  const match = text.match(/^(-?\d+(?:\.\d+)?)\b\s*[-:.,]?\s*([\s\S]*)$/);
  if (match) {
    return { score: parseFloat(match[1]), reasoning: match[2].trim() };
  }

  throw new JudgeResponseError('Could not parse relevance score from judge reply', text);
}

export function parseExtractionReply(reply: string): TurnAnalysis {
  const parsed = extractionReplySchema.safeParse(JSON.parse(reply));
  if (!parsed.success) {
    throw new Error(`Malformed extraction reply: ${parsed.error.message}`);
  }

  const clean = (values: string[]) => values.map(value => value.trim()).filter(value => value !== '');
  const intent = parsed.data.intent?.trim();

  return {
    topics: clean(parsed.data.topics),
    concepts: clean(parsed.data.concepts),
    intents: intent ? [intent] : []
  };
}

export class OpenAIService implements RelevanceJudge, TurnExtractor {
  private client: OpenAI;
  private config: OpenAIConfig;

  constructor(apiKey: string, config: OpenAIConfig = {
    judgeModel: 'gpt-4o-mini',
    extractionModel: 'gpt-4o-mini'
  }) {
    this.client = new OpenAI({ apiKey });
    this.config = config;
  }

  async judge(contextSummary: string, storyContent: string, signal?: AbortSignal): Promise<JudgeVerdict> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.judgeModel,
        messages: [
          { role: 'system', content: this.getJudgeSystemPrompt() },
          { role: 'user', content: this.getJudgePrompt(contextSummary, storyContent) }
        ],
        temperature: 0,
        max_tokens: 150,
        response_format: { type: 'json_object' }
      }, { signal });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new JudgeResponseError('No content received from OpenAI', '');
      }

      return parseJudgeReply(content);
    } catch (error) {
      console.error('Error judging story relevance:', error);
      throw error;
    }
  }

  async extract(message: string): Promise<TurnAnalysis> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.extractionModel,
        messages: [
          { role: 'system', content: this.getExtractionSystemPrompt() },
          { role: 'user', content: this.getExtractionPrompt(message) }
        ],
        temperature: 0.2,
        max_tokens: 300,
        response_format: { type: 'json_object' }
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('No extraction content received from OpenAI');
      }

      return parseExtractionReply(content);
    } catch (error) {
      // An empty analysis still advances the turn
      console.error('Error analyzing user input:', error);
      return { topics: [], intents: [], concepts: [] };
    }
  }

  getJudgeSystemPrompt(): string {
    return `You are an expert at determining story relevance for conversations.
You will be given a conversation context and a story with its psychological analysis.
Score how relevant this story is to the current conversation context on a scale of 0-10.

Consider:
1. Topic alignment between conversation and story
2. Emotional resonance with current conversation tone
3. Value alignment and psychological relevance
4. Appropriateness for current user intent
5. Potential to advance or enrich the conversation

Respond with JSON: {"score": <number 0-10>, "reasoning": "<one or two sentences>"}`;
  }

  getJudgePrompt(contextSummary: string, storyContent: string): string {
    return `Rate the relevance of this story to the current conversation context:

CONVERSATION CONTEXT:
${contextSummary}

STORY WITH ANALYSIS:
${storyContent}`;
  }

  getExtractionSystemPrompt(): string {
    return `You are an expert conversation analyst. Analyze the user's message to extract:
1. Main topics/themes (2-4 words each)
2. Key concepts mentioned
3. User intent (what they're trying to accomplish)

Respond with JSON: {"topics": string[], "concepts": string[], "intent": string}`;
  }

  getExtractionPrompt(message: string): string {
    return `Analyze this message:

"${message}"

Extract:
- topics: 1-3 main topics (2-4 words each)
- concepts: key concepts, names, or ideas mentioned
- intent: exactly one of ${USER_INTENTS.join(', ')}`;
  }
}
