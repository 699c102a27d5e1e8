import { EventEmitter } from 'events';
import {
  ConversationState,
  RelevanceJudge,
  SelectionResult,
  Story,
  StoryCorpus,
  TurnExtractor,
  TurnInput,
  UsageRecordResult
} from '../types';
import { ConversationStateStore } from '../storage/conversation-store';
import { MetadataFilterOptions, filterByMetadata } from '../engines/metadata-filter';
import { SemanticScorer, buildConversationContext, renderContextSummary } from '../engines/semantic-scorer';
import { rankStories } from '../engines/ranking';
import { UsageStats, activeTopics, usageStats } from '../engines/analytics';
import { validateLimit } from '../utils/validation';

export interface StoryRelevanceEngineOptions {
  store?: ConversationStateStore;
  judge?: RelevanceJudge | null;
  extractor?: TurnExtractor;
  corpus?: StoryCorpus;
  judgeTimeoutMs?: number;
  maturityTurnThreshold?: number;
  defaultLimit?: number;
  metadataFilter?: MetadataFilterOptions;
}

export interface SelectOptions {
  limit?: number;
  signal?: AbortSignal;
}

export interface TurnResult {
  state: ConversationState;
  selection: SelectionResult;
}

/**
 * Per-turn pipeline: state update, metadata pre-filter, semantic scoring,
 * penalty ranking and usage recording. The session lock is only held for
 * state mutations, never while the judge is working.
 *
 * Events: `turn_processed`, `stories_selected`, `degraded_mode`, `session_reset`.
 */
export class StoryRelevanceEngine extends EventEmitter {
  readonly store: ConversationStateStore;
  private scorer: SemanticScorer;
  private extractor?: TurnExtractor;
  private corpus?: StoryCorpus;
  private maturityTurnThreshold: number;
  private defaultLimit: number;
  private metadataFilter: MetadataFilterOptions;

  constructor(options: StoryRelevanceEngineOptions = {}) {
    super();
    this.store = options.store || new ConversationStateStore();
    this.scorer = new SemanticScorer(options.judge ?? null, { timeoutMs: options.judgeTimeoutMs });
    this.extractor = options.extractor;
    this.corpus = options.corpus;
    this.maturityTurnThreshold = options.maturityTurnThreshold ?? 5;
    this.defaultLimit = validateLimit(options.defaultLimit ?? 3);
    this.metadataFilter = options.metadataFilter || {};
  }

  getOrCreate(sessionKey: string): Promise<ConversationState> {
    return this.store.getOrCreate(sessionKey);
  }

  async updateTurn(sessionKey: string, input: TurnInput): Promise<ConversationState> {
    const state = await this.store.updateTurn(sessionKey, input);
    this.emit('turn_processed', { sessionKey, turn: state.turnCount });
    return state;
  }

  recordStoryUsage(sessionKey: string, storyId: string): Promise<UsageRecordResult> {
    return this.store.recordStoryUsage(sessionKey, storyId);
  }

  async reset(sessionKey: string): Promise<boolean> {
    const existed = await this.store.reset(sessionKey);
    if (existed) {
      this.emit('session_reset', { sessionKey });
    }
    return existed;
  }

  async select(sessionKey: string, candidates: Story[], options: SelectOptions = {}): Promise<SelectionResult> {
    const limit = validateLimit(options.limit ?? this.defaultLimit);
    const signal = options.signal;

    // Snapshot: nothing below holds the session lock until usage is recorded
    const state = await this.store.getOrCreate(sessionKey);
    const unique = this.dedupe(candidates);

    const base: SelectionResult = {
      sessionKey,
      turn: state.turnCount,
      status: 'empty',
      degraded: false,
      candidateCount: unique.length,
      filteredCount: 0,
      stories: []
    };

    if (signal?.aborted) {
      return { ...base, status: 'cancelled' };
    }

    // Stage 1
    const filtered = filterByMetadata(state, unique, this.metadataFilter);

    // Stage 2
    const contextSummary = renderContextSummary(buildConversationContext(state, this.maturityTurnThreshold));
    const semantic = await this.scorer.scoreCandidates(contextSummary, filtered.candidates, signal);

    const result: SelectionResult = {
      ...base,
      filteredCount: filtered.filteredCount,
      degraded: semantic.degraded,
      degradedReason: semantic.failure
    };

    if (semantic.degraded) {
      this.emit('degraded_mode', { sessionKey, reason: semantic.failure });
    }

    if (signal?.aborted) {
      return { ...result, status: 'cancelled' };
    }

    // Stage 3
    const ranked = rankStories(state, semantic.scored, { limit, degraded: semantic.degraded });
    if (ranked.length === 0) {
      console.log(`No stories cleared the relevance threshold for ${sessionKey}`);
      return result;
    }

    const usage = await this.store.recordStoryUsages(
      sessionKey,
      ranked.map(entry => entry.story.id),
      signal
    );

    if (!usage.recorded && usage.reason === 'cancelled') {
      return { ...result, status: 'cancelled' };
    }
    if (!usage.recorded) {
      console.warn(`Session ${sessionKey} was reset during selection; usage not recorded`);
    }

    const selection: SelectionResult = {
      ...result,
      status: 'selected',
      stories: ranked,
      ...(usage.recorded ? { recordedAtTurn: usage.toldAtTurn } : {})
    };
    console.log(`📖 Selected ${ranked.length} stories from ${filtered.filteredCount} filtered candidates for ${sessionKey}`);
    this.emit('stories_selected', selection);
    return selection;
  }

  /**
   * Full turn from a raw user message. Requires an extractor and a corpus.
   */
  async processMessage(sessionKey: string, message: string, options: SelectOptions = {}): Promise<TurnResult> {
    if (!this.extractor || !this.corpus) {
      throw new Error('processMessage requires both an extractor and a story corpus');
    }

    const analysis = await this.extractor.extract(message);
    const state = await this.updateTurn(sessionKey, analysis);
    const stories = await this.corpus.listStories();
    const selection = await this.select(sessionKey, stories, options);

    return { state, selection };
  }

  async activeTopics(sessionKey: string): Promise<string[] | null> {
    const state = await this.store.getState(sessionKey);
    return state ? activeTopics(state) : null;
  }

  async usageStats(sessionKey: string): Promise<UsageStats | null> {
    const state = await this.store.getState(sessionKey);
    return state ? usageStats(state) : null;
  }

  private dedupe(stories: Story[]): Story[] {
    const seen = new Set<string>();
    return stories.filter(story => {
      if (seen.has(story.id)) return false;
      seen.add(story.id);
      return true;
    });
  }
}
