import { z } from 'zod';
import { ContextDecayConfig, DEFAULT_CONTEXT_DECAY } from '../types';
import { InputValidationError } from './errors';

export interface OpenAIConfig {
  judgeModel: string;
  extractionModel: string;
}

export interface EngineConfig {
  openaiApiKey?: string;
  openai: OpenAIConfig;
  weaviateUrl?: string;
  weaviateApiKey?: string;
  judgeTimeoutMs: number;
  contextDecay: ContextDecayConfig;
  selectionLimit: number;
  maturityTurnThreshold: number;
}

const optionalText = z.string().trim().min(1).optional();

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_JUDGE_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  OPENAI_EXTRACTION_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  WEAVIATE_URL: optionalText,
  WEAVIATE_API_KEY: optionalText,
  JUDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  TOPIC_DECAY_THRESHOLD: z.coerce.number().int().nonnegative().default(DEFAULT_CONTEXT_DECAY.topicDecayThreshold),
  CONCEPT_DECAY_THRESHOLD: z.coerce.number().int().nonnegative().default(DEFAULT_CONTEXT_DECAY.conceptDecayThreshold),
  STORY_REPETITION_PENALTY_BASE: z.coerce.number().positive().default(DEFAULT_CONTEXT_DECAY.storyRepetitionPenaltyBase),
  SELECTION_LIMIT: z.coerce.number().int().positive().default(3),
  MATURITY_TURN_THRESHOLD: z.coerce.number().int().nonnegative().default(5)
});

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Blank values fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw InputValidationError.fromZod('Invalid engine configuration', parsed.error);
  }

  const vars = parsed.data;
  return {
    openaiApiKey: vars.OPENAI_API_KEY,
    openai: {
      judgeModel: vars.OPENAI_JUDGE_MODEL,
      extractionModel: vars.OPENAI_EXTRACTION_MODEL
    },
    weaviateUrl: vars.WEAVIATE_URL,
    weaviateApiKey: vars.WEAVIATE_API_KEY,
    judgeTimeoutMs: vars.JUDGE_TIMEOUT_MS,
    contextDecay: {
      topicDecayThreshold: vars.TOPIC_DECAY_THRESHOLD,
      conceptDecayThreshold: vars.CONCEPT_DECAY_THRESHOLD,
      storyRepetitionPenaltyBase: vars.STORY_REPETITION_PENALTY_BASE
    },
    selectionLimit: vars.SELECTION_LIMIT,
    maturityTurnThreshold: vars.MATURITY_TURN_THRESHOLD
  };
}
