import { TurnAnalysis } from './story';

export interface ContextDecayConfig {
  topicDecayThreshold: number; // turns without a theme refresh before topics go stale
  conceptDecayThreshold: number; // turns without a mention before a concept is pruned
  storyRepetitionPenaltyBase: number; // scales every repetition tier
}

export interface ConceptMention {
  count: number;
  firstTurn: number;
  lastTurn: number;
}

export interface StoryTelling {
  storyId: string;
  toldAtTurn: number;
}

export interface ConversationFlow {
  dominantTheme: string | null;
  themeStabilityCount: number;
  lastTopicShiftTurn: number;
  lastThemeRefreshTurn: number;
}

export interface ConversationState {
  sessionId: string;
  turnCount: number;
  lastUpdatedTimestamp: number;
  currentTopics: string[]; // most recent first
  userIntentHistory: string[]; // oldest first
  mentionedConcepts: Record<string, ConceptMention>;
  retrievedStoryHistory: StoryTelling[];
  conversationFlow: ConversationFlow;
  contextDecay: ContextDecayConfig;
}

export type TurnInput = TurnAnalysis;

export type UserIntent =
  | 'request_story'
  | 'ask_opinion'
  | 'seek_advice'
  | 'ask_clarification_question'
  | 'share_experience'
  | 'general_conversation'
  | 'express_emotion'
  | 'ask_question';

export type ConversationMaturity = 'new' | 'established';

export interface ConversationContext {
  sessionId: string;
  turnCount: number;
  currentTopics: string[];
  dominantTheme: string | null;
  recentIntents: string[];
  keyConcepts: string[];
  conversationMaturity: ConversationMaturity;
}

export type UsageRecordResult =
  | { recorded: true; toldAtTurn: number; storyIds: string[] }
  | { recorded: false; reason: 'no_such_session' | 'cancelled' };

export const MAX_CURRENT_TOPICS = 5;
export const MAX_INTENT_HISTORY = 5;

export const DEFAULT_CONTEXT_DECAY: ContextDecayConfig = {
  topicDecayThreshold: 3,
  conceptDecayThreshold: 5,
  storyRepetitionPenaltyBase: 1.0
};

export * from './story';
