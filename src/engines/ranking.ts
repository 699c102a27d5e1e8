import { ConversationState, RankedStory, ScoreBreakdown, ScoredCandidate } from '../types';

export const METADATA_WEIGHT = 0.3;
export const SEMANTIC_WEIGHT = 0.7;
export const CONFIDENCE_BONUS_RATE = 0.1;
export const MIN_RELEVANCE_SCORE = 1.0;

// [max turns since last telling, multiplier]
const REPETITION_TIERS: Array<[number, number]> = [
  [2, 3.0],
  [5, 2.0],
  [10, 1.5]
];

export interface RankOptions {
  limit: number;
  degraded: boolean;
}

export function turnsSinceLastTold(state: ConversationState, storyId: string): number | null {
  let lastTold: number | null = null;
  for (const telling of state.retrievedStoryHistory) {
    if (telling.storyId === storyId && (lastTold === null || telling.toldAtTurn > lastTold)) {
      lastTold = telling.toldAtTurn;
    }
  }
  return lastTold === null ? null : state.turnCount - lastTold;
}

export function repetitionTier(turnsSince: number | null): number {
  if (turnsSince === null) return 1.0;
  for (const [maxTurns, multiplier] of REPETITION_TIERS) {
    if (turnsSince <= maxTurns) return multiplier;
  }
  return 1.0;
}

/**
 * Divisor for a story's base score. Never-told stories are not penalised;
 * otherwise the tier is scaled by the session's penalty base.
 */
export function repetitionMultiplier(state: ConversationState, storyId: string): number {
  const turnsSince = turnsSinceLastTold(state, storyId);
  if (turnsSince === null) return 1.0;
  return repetitionTier(turnsSince) * state.contextDecay.storyRepetitionPenaltyBase;
}

export function computeBreakdown(state: ConversationState, candidate: ScoredCandidate, degraded: boolean): ScoreBreakdown {
  const { story, metadataScore } = candidate;
  const semanticScore = degraded ? 0 : candidate.semanticScore;

  const baseScore = degraded
    ? metadataScore
    : METADATA_WEIGHT * metadataScore + SEMANTIC_WEIGHT * semanticScore;

  const multiplier = repetitionMultiplier(state, story.id);
  const confidence = story.metadata?.confidence;
  const confidenceBonus = typeof confidence === 'number' ? CONFIDENCE_BONUS_RATE * confidence : 0;

  return {
    storyId: story.id,
    metadataScore,
    semanticScore,
    baseScore,
    repetitionMultiplier: multiplier,
    confidenceBonus,
    finalScore: baseScore / multiplier + confidenceBonus
  };
}

function compareRanked(a: RankedStory, b: RankedStory): number {
  const byScore = b.breakdown.finalScore - a.breakdown.finalScore;
  if (byScore !== 0) return byScore;
  if (a.story.id < b.story.id) return -1;
  if (a.story.id > b.story.id) return 1;
  return 0;
}

/**
 * Stage 3: combine, penalise, threshold and order. Returns at most `limit`
 * stories and never pads with stories at or below the relevance floor.
 */
export function rankStories(state: ConversationState, candidates: ScoredCandidate[], options: RankOptions): RankedStory[] {
  const ranked: RankedStory[] = candidates.map(candidate => {
    const breakdown = computeBreakdown(state, candidate, options.degraded);
    return {
      story: candidate.story,
      breakdown,
      reasoning: `Metadata: ${breakdown.metadataScore.toFixed(1)}, Semantic: ${breakdown.semanticScore.toFixed(1)}, Penalty: ${breakdown.repetitionMultiplier.toFixed(1)}x`
    };
  });

  return ranked
    .filter(entry => entry.breakdown.finalScore > MIN_RELEVANCE_SCORE)
    .sort(compareRanked)
    .slice(0, options.limit);
}
