import { ConceptMention, ConversationState } from '../types';

// Forgetting rules. Everything here is pure: inputs are never mutated.

export function isConceptActive(mention: ConceptMention, turnCount: number, threshold: number): boolean {
  return turnCount - mention.lastTurn <= threshold;
}

export function isThemeStale(state: ConversationState): boolean {
  const flow = state.conversationFlow;
  if (flow.dominantTheme === null) return false;
  return state.turnCount - flow.lastThemeRefreshTurn > state.contextDecay.topicDecayThreshold;
}

/**
 * Topics still in play. The raw `currentTopics` list is kept for audit; once the
 * dominant theme has gone unrefreshed past the topic threshold the whole list
 * is treated as decayed.
 */
export function activeTopicList(state: ConversationState): string[] {
  if (isThemeStale(state)) return [];
  return state.currentTopics.slice();
}

export function activeConceptLabels(state: ConversationState): string[] {
  const { turnCount, contextDecay } = state;
  return Object.entries(state.mentionedConcepts)
    .filter(([, mention]) => isConceptActive(mention, turnCount, contextDecay.conceptDecayThreshold))
    .map(([label]) => label);
}

/**
 * Prunes concepts not mentioned within `conceptDecayThreshold` turns.
 * Story history is left untouched: repetition penalties depend on all of it.
 */
export function decay(state: ConversationState): ConversationState {
  const { turnCount, contextDecay } = state;
  const mentionedConcepts: Record<string, ConceptMention> = Object.fromEntries(
    Object.entries(state.mentionedConcepts)
      .filter(([, mention]) => isConceptActive(mention, turnCount, contextDecay.conceptDecayThreshold))
      .map(([label, mention]) => [label, { ...mention }] as const)
  );

  return {
    ...state,
    mentionedConcepts
  };
}
