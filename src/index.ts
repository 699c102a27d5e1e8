import { runRelevanceDemo } from './demo/relevance-demo';

export * from './types';
export { StoryRelevanceEngine } from './core/relevance-engine';
export type { StoryRelevanceEngineOptions, SelectOptions, TurnResult } from './core/relevance-engine';
export { ConversationStateStore, serialize, deserialize } from './storage/conversation-store';
export { InMemoryStoryCorpus, mergeStoriesWithAnalyses, analysisToMetadata } from './storage/story-corpus';
export { decay, activeConceptLabels, activeTopicList, isConceptActive, isThemeStale } from './engines/decay';
export { applyTurn, createInitialState, mergeTopics, appendIntents } from './engines/conversation-state';
export { scoreMetadata, filterByMetadata } from './engines/metadata-filter';
export { SemanticScorer, buildConversationContext, renderContextSummary, describeStory } from './engines/semantic-scorer';
export { rankStories, computeBreakdown, repetitionMultiplier, repetitionTier, turnsSinceLastTold } from './engines/ranking';
export * from './engines/analytics';
export { OpenAIService, parseJudgeReply, parseExtractionReply } from './integrations/openai';
export { WeaviateService } from './integrations/weaviate';
export { loadEngineConfig } from './utils/config';
export type { EngineConfig } from './utils/config';
export { InputValidationError, JudgeResponseError } from './utils/errors';

// Main execution
if (require.main === module) {
  runRelevanceDemo().catch(error => {
    console.error('❌ Demo failed:', error);
    process.exitCode = 1;
  });
}
