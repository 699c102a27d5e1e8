import { ConversationState, SelectionResult } from '../types';
import { activeTopicList, isConceptActive, isThemeStale } from './decay';

// Read-only views over a conversation state. Nothing here mutates its input.

export interface UsageStats {
  totalTold: number;
  uniqueTold: number;
  repetitionRate: number; // share of tellings that repeated an earlier story
  averageGap: number | null; // mean turns between repeat tellings of the same story
}

export interface TopicStability {
  dominantTheme: string | null;
  stabilityCount: number;
  lastTopicShiftTurn: number;
  turnsSinceShift: number;
  stale: boolean;
}

export interface StateSummary {
  sessionId: string;
  turnCount: number;
  currentTopics: string[];
  dominantTheme: string | null;
  storiesToldCount: number;
  keyConceptsCount: number;
  lastUpdated: string;
}

export interface RelevanceInsights {
  status: 'success' | 'no_relevant_stories';
  degraded: boolean;
  scoringSummary: {
    totalCandidates: number;
    selectedCount: number;
    scoreRange: { highest: number; lowest: number } | null;
  };
  topStories: Array<{
    rank: number;
    storyId: string;
    title: string;
    relevanceScore: number;
    selectionReasoning: string;
    hasAnalysis: boolean;
  }>;
}

export function activeTopics(state: ConversationState): string[] {
  return activeTopicList(state);
}

export function activeConcepts(state: ConversationState): Array<{ label: string; count: number; lastTurn: number }> {
  const { turnCount, contextDecay } = state;
  return Object.entries(state.mentionedConcepts)
    .filter(([, mention]) => isConceptActive(mention, turnCount, contextDecay.conceptDecayThreshold))
    .map(([label, mention]) => ({ label, count: mention.count, lastTurn: mention.lastTurn }));
}

export function usageStats(state: ConversationState): UsageStats {
  const history = state.retrievedStoryHistory;
  const lastSeen = new Map<string, number>();
  const gaps: number[] = [];

  for (const telling of history) {
    const previous = lastSeen.get(telling.storyId);
    if (previous !== undefined) {
      gaps.push(telling.toldAtTurn - previous);
    }
    lastSeen.set(telling.storyId, telling.toldAtTurn);
  }

  const totalTold = history.length;
  const uniqueTold = lastSeen.size;

  return {
    totalTold,
    uniqueTold,
    repetitionRate: totalTold === 0 ? 0 : (totalTold - uniqueTold) / totalTold,
    averageGap: gaps.length === 0 ? null : gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length
  };
}

export function topicStability(state: ConversationState): TopicStability {
  const flow = state.conversationFlow;
  return {
    dominantTheme: flow.dominantTheme,
    stabilityCount: flow.themeStabilityCount,
    lastTopicShiftTurn: flow.lastTopicShiftTurn,
    turnsSinceShift: flow.dominantTheme === null ? 0 : state.turnCount - flow.lastTopicShiftTurn,
    stale: isThemeStale(state)
  };
}

/**
 * Stories told within the last `windowTurns` turns, most recent first.
 * This view decays; the underlying history does not.
 */
export function recentlyToldStoryIds(state: ConversationState, windowTurns: number = 10): string[] {
  const seen = new Set<string>();
  const recent: string[] = [];

  for (let i = state.retrievedStoryHistory.length - 1; i >= 0; i--) {
    const telling = state.retrievedStoryHistory[i];
    if (state.turnCount - telling.toldAtTurn > windowTurns) continue;
    if (!seen.has(telling.storyId)) {
      seen.add(telling.storyId);
      recent.push(telling.storyId);
    }
  }

  return recent;
}

export function summarizeState(state: ConversationState): StateSummary {
  return {
    sessionId: state.sessionId,
    turnCount: state.turnCount,
    currentTopics: state.currentTopics.slice(),
    dominantTheme: state.conversationFlow.dominantTheme,
    storiesToldCount: state.retrievedStoryHistory.length,
    keyConceptsCount: Object.keys(state.mentionedConcepts).length,
    lastUpdated: new Date(state.lastUpdatedTimestamp).toISOString()
  };
}

// Advisory only; expiring sessions is the host application's call
export function shouldSuggestReset(state: ConversationState, maxTurns: number = 50): boolean {
  return state.turnCount > maxTurns;
}

export function buildRelevanceInsights(result: SelectionResult, limit: number = 5): RelevanceInsights {
  const stories = result.stories.slice(0, limit);
  const scores = stories.map(entry => entry.breakdown.finalScore);

  return {
    status: stories.length > 0 ? 'success' : 'no_relevant_stories',
    degraded: result.degraded,
    scoringSummary: {
      totalCandidates: result.candidateCount,
      selectedCount: result.stories.length,
      scoreRange: scores.length > 0 ? { highest: Math.max(...scores), lowest: Math.min(...scores) } : null
    },
    topStories: stories.map((entry, index) => ({
      rank: index + 1,
      storyId: entry.story.id,
      title: (entry.story.title || 'Untitled').substring(0, 50),
      relevanceScore: entry.breakdown.finalScore,
      selectionReasoning: entry.reasoning,
      hasAnalysis: entry.story.metadata !== undefined
    }))
  };
}
