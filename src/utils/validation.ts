import { z } from 'zod';
import { ContextDecayConfig, ConversationState, TurnInput } from '../types';
import { InputValidationError } from './errors';

const label = z.string().trim().min(1, 'labels must be non-empty');

export const turnInputSchema = z.object({
  topics: z.array(label),
  intents: z.array(label),
  concepts: z.array(label)
});

export const contextDecaySchema = z.object({
  topicDecayThreshold: z.number().int().nonnegative(),
  conceptDecayThreshold: z.number().int().nonnegative(),
  storyRepetitionPenaltyBase: z.number().positive()
});

const turnNumber = z.number().int().nonnegative();

const conceptMentionSchema = z.object({
  count: z.number().int().positive(),
  firstTurn: turnNumber,
  lastTurn: turnNumber
});

// Concept labels are user text; rebuilding from entries keeps keys such as
// "__proto__" as own properties instead of assigning through them.
const conceptMapSchema = z
  .preprocess(
    value => (typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.entries(value) : value),
    z.array(z.tuple([z.string().min(1), conceptMentionSchema]))
  )
  .transform(entries => Object.fromEntries(entries));

export const conversationStateSchema = z
  .object({
    sessionId: z.string().min(1),
    turnCount: turnNumber,
    lastUpdatedTimestamp: z.number().nonnegative(),
    currentTopics: z.array(z.string()).max(5),
    userIntentHistory: z.array(z.string()).max(5),
    mentionedConcepts: conceptMapSchema,
    retrievedStoryHistory: z.array(
      z.object({
        storyId: z.string().min(1),
        toldAtTurn: turnNumber
      })
    ),
    conversationFlow: z.object({
      dominantTheme: z.string().nullable(),
      themeStabilityCount: turnNumber,
      lastTopicShiftTurn: turnNumber,
      lastThemeRefreshTurn: turnNumber
    }),
    contextDecay: contextDecaySchema
  })
  .superRefine((state, ctx) => {
    for (const [concept, mention] of Object.entries(state.mentionedConcepts)) {
      if (mention.lastTurn > state.turnCount || mention.firstTurn > mention.lastTurn) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['mentionedConcepts', concept],
          message: 'concept turns must satisfy firstTurn <= lastTurn <= turnCount'
        });
      }
    }
    state.retrievedStoryHistory.forEach((telling, index) => {
      if (telling.toldAtTurn > state.turnCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['retrievedStoryHistory', index, 'toldAtTurn'],
          message: 'story cannot be told after the current turn'
        });
      }
    });
  });

export function validateTurnInput(input: unknown): TurnInput {
  const parsed = turnInputSchema.safeParse(input);
  if (!parsed.success) {
    throw InputValidationError.fromZod('Malformed turn input', parsed.error);
  }
  return parsed.data;
}

export function validateContextDecay(config: unknown): ContextDecayConfig {
  const parsed = contextDecaySchema.safeParse(config);
  if (!parsed.success) {
    throw InputValidationError.fromZod('Malformed context decay config', parsed.error);
  }
  return parsed.data;
}

export function validateConversationState(value: unknown): ConversationState {
  const parsed = conversationStateSchema.safeParse(value);
  if (!parsed.success) {
    throw InputValidationError.fromZod('Malformed conversation state', parsed.error);
  }
  return parsed.data;
}

export function validateLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InputValidationError('Selection limit must be a positive integer', [`limit: ${limit}`]);
  }
  return limit;
}
