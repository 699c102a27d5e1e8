import {
  ConceptMention,
  ContextDecayConfig,
  ConversationFlow,
  ConversationState,
  MAX_CURRENT_TOPICS,
  MAX_INTENT_HISTORY,
  TurnInput
} from '../types';
import { decay } from './decay';

export function createInitialState(
  sessionId: string,
  contextDecay: ContextDecayConfig,
  now: number = Date.now()
): ConversationState {
  return {
    sessionId,
    turnCount: 0,
    lastUpdatedTimestamp: now,
    currentTopics: [],
    userIntentHistory: [],
    mentionedConcepts: {},
    retrievedStoryHistory: [],
    conversationFlow: {
      dominantTheme: null,
      themeStabilityCount: 0,
      lastTopicShiftTurn: 0,
      lastThemeRefreshTurn: 0
    },
    contextDecay: { ...contextDecay }
  };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

export function mergeTopics(current: string[], incoming: string[]): string[] {
  const fresh = unique(incoming);
  const carried = current.filter(topic => !fresh.includes(topic));
  return [...fresh, ...carried].slice(0, MAX_CURRENT_TOPICS);
}

export function appendIntents(history: string[], incoming: string[]): string[] {
  return [...history, ...incoming].slice(-MAX_INTENT_HISTORY);
}

function updateFlow(
  flow: ConversationFlow,
  topics: string[],
  hadNewTopics: boolean,
  turn: number
): ConversationFlow {
  // Turns without topics leave the theme alone so that it can go stale
  if (!hadNewTopics || topics.length === 0) return { ...flow };

  const top = topics[0];
  if (top === flow.dominantTheme) {
    return {
      ...flow,
      themeStabilityCount: flow.themeStabilityCount + 1,
      lastThemeRefreshTurn: turn
    };
  }

  return {
    dominantTheme: top,
    themeStabilityCount: 1,
    lastTopicShiftTurn: turn,
    lastThemeRefreshTurn: turn
  };
}

/**
 * One user turn: bump the counter, fold in topics, intents and concepts,
 * recompute the conversation flow and finish with a decay pass.
 * Input is expected to be validated already.
 */
export function applyTurn(state: ConversationState, input: TurnInput, now: number = Date.now()): ConversationState {
  const turn = state.turnCount + 1;

  const currentTopics = mergeTopics(state.currentTopics, input.topics);
  const userIntentHistory = appendIntents(state.userIntentHistory, input.intents);

  // Labels are free text, so they are kept in a Map and never used as plain-object keys
  const concepts = new Map<string, ConceptMention>();
  for (const [label, mention] of Object.entries(state.mentionedConcepts)) {
    concepts.set(label, { ...mention });
  }

  // A concept repeated within one message counts as a single mention
  for (const concept of unique(input.concepts)) {
    const existing = concepts.get(concept);
    if (existing) {
      existing.count += 1;
      existing.lastTurn = turn;
    } else {
      concepts.set(concept, { count: 1, firstTurn: turn, lastTurn: turn });
    }
  }
  const mentionedConcepts: Record<string, ConceptMention> = Object.fromEntries(concepts);

  const conversationFlow = updateFlow(state.conversationFlow, currentTopics, input.topics.length > 0, turn);

  return decay({
    ...state,
    turnCount: turn,
    lastUpdatedTimestamp: now,
    currentTopics,
    userIntentHistory,
    mentionedConcepts,
    retrievedStoryHistory: state.retrievedStoryHistory.slice(),
    conversationFlow
  });
}

export function recordTellings(state: ConversationState, storyIds: string[], now: number = Date.now()): ConversationState {
  const tellings = unique(storyIds).map(storyId => ({ storyId, toldAtTurn: state.turnCount }));
  return {
    ...state,
    lastUpdatedTimestamp: now,
    retrievedStoryHistory: [...state.retrievedStoryHistory, ...tellings]
  };
}
