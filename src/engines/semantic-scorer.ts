import {
  AdapterFailure,
  ConversationContext,
  ConversationState,
  RelevanceJudge,
  ScoredCandidate,
  SemanticOutcome,
  Story
} from '../types';
import { JudgeResponseError, describeError } from '../utils/errors';
import { activeConceptLabels, activeTopicList } from './decay';
import { MetadataScored } from './metadata-filter';

export const SEMANTIC_SCORE_MIN = 0;
export const SEMANTIC_SCORE_MAX = 10;

const STORY_CONTENT_PREVIEW = 800;
const MONOLOGUE_PREVIEW = 200;

export interface SemanticScorerOptions {
  timeoutMs?: number;
}

export interface SemanticScoringResult {
  scored: ScoredCandidate[];
  degraded: boolean;
  failure?: AdapterFailure;
}

export function buildConversationContext(state: ConversationState, maturityTurnThreshold: number = 5): ConversationContext {
  return {
    sessionId: state.sessionId,
    turnCount: state.turnCount,
    currentTopics: activeTopicList(state),
    dominantTheme: state.conversationFlow.dominantTheme,
    recentIntents: state.userIntentHistory.slice(-3),
    keyConcepts: activeConceptLabels(state),
    conversationMaturity: state.turnCount > maturityTurnThreshold ? 'established' : 'new'
  };
}

export function renderContextSummary(context: ConversationContext): string {
  return [
    `Current Topics: ${context.currentTopics.join(', ')}`,
    `Dominant Theme: ${context.dominantTheme ?? ''}`,
    `Recent User Intents: ${context.recentIntents.join(', ')}`,
    `Key Concepts: ${context.keyConcepts.join(', ')}`,
    `Conversation Maturity: ${context.conversationMaturity}`
  ].join('\n');
}

export function describeStory(story: Story): string {
  const metadata = story.metadata || {};
  const monologue = metadata.internalMonologue ? metadata.internalMonologue.substring(0, MONOLOGUE_PREVIEW) : 'N/A';

  return `Story Content: ${story.content.substring(0, STORY_CONTENT_PREVIEW)}

Analysis:
- Trigger: ${metadata.triggerDescription || 'N/A'}
- Emotions: ${(metadata.emotions || []).join(', ')}
- Internal Thought: ${monologue}
- Violated Value: ${metadata.violatedValue || 'N/A'}`;
}

/**
 * Stage 2. Wraps the external relevance judge: every call is bounded by a
 * timeout, and raised errors, timeouts and unusable scores come back as
 * failure values instead of exceptions.
 */
export class SemanticScorer {
  private judge: RelevanceJudge | null;
  private timeoutMs: number;

  constructor(judge: RelevanceJudge | null, options: SemanticScorerOptions = {}) {
    this.judge = judge;
    this.timeoutMs = options.timeoutMs ?? 8000;
  }

  async scoreSemantic(contextSummary: string, story: Story, signal?: AbortSignal): Promise<SemanticOutcome> {
    const judge = this.judge;
    if (!judge) {
      return { ok: false, failure: { kind: 'unavailable', message: 'No relevance judge configured' } };
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.timeoutMs);
    });

    try {
      const verdict = await Promise.race([
        judge.judge(contextSummary, describeStory(story), controller.signal),
        timeout
      ]);

      if (verdict === 'timeout') {
        controller.abort();
        return { ok: false, failure: { kind: 'timeout', message: `Judge timed out after ${this.timeoutMs}ms` } };
      }

      if (typeof verdict.score !== 'number' || !Number.isFinite(verdict.score)) {
        return { ok: false, failure: { kind: 'unparsable', message: `Unusable score for story ${story.id}` } };
      }

      const score = Math.max(SEMANTIC_SCORE_MIN, Math.min(SEMANTIC_SCORE_MAX, verdict.score));
      return { ok: true, score, reasoning: verdict.reasoning };
    } catch (error) {
      console.error(`Error scoring semantic relevance for story ${story.id}:`, error);
      const kind = error instanceof JudgeResponseError ? 'unparsable' : 'error';
      return { ok: false, failure: { kind, message: describeError(error) } };
    } finally {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Scores every candidate concurrently. A single failure degrades the whole
   * batch to metadata-only so all candidates are ranked on the same scale.
   */
  async scoreCandidates(
    contextSummary: string,
    candidates: MetadataScored[],
    signal?: AbortSignal
  ): Promise<SemanticScoringResult> {
    const metadataOnly = (failure: AdapterFailure): SemanticScoringResult => ({
      scored: candidates.map(candidate => ({ ...candidate, semanticScore: 0 })),
      degraded: true,
      failure
    });

    if (candidates.length === 0) {
      return { scored: [], degraded: false };
    }

    if (!this.judge) {
      return metadataOnly({ kind: 'unavailable', message: 'No relevance judge configured' });
    }

    const outcomes = await Promise.all(
      candidates.map(candidate => this.scoreSemantic(contextSummary, candidate.story, signal))
    );

    const scored: ScoredCandidate[] = [];
    for (let i = 0; i < candidates.length; i++) {
      const outcome = outcomes[i];
      if (!outcome.ok) {
        console.warn(`Semantic judge failed (${outcome.failure.kind}), using metadata-only scoring`);
        return metadataOnly(outcome.failure);
      }
      scored.push({
        ...candidates[i],
        semanticScore: outcome.score,
        semanticReasoning: outcome.reasoning
      });
    }

    return { scored, degraded: false };
  }
}
