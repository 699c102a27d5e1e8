import { parseExtractionReply, parseJudgeReply } from '../integrations/openai';
import { WeaviateService, storyFromRow } from '../integrations/weaviate';
import { SemanticScorer } from '../engines/semantic-scorer';
import { InMemoryStoryCorpus, analysisToMetadata, mergeStoriesWithAnalyses } from '../storage/story-corpus';
import { loadEngineConfig } from '../utils/config';
import { InputValidationError, JudgeResponseError } from '../utils/errors';

// Mock implementations
class MockWeaviateService extends WeaviateService {
  requests: Array<[number, number]> = [];
  private total: number;

  constructor(total: number, pageSize: number) {
    super('https://weaviate.test', 'test-key', pageSize);
    this.total = total;
  }

  protected async fetchStoryPage(offset: number, limit: number): Promise<unknown> {
    this.requests.push([offset, limit]);
    const end = Math.min(offset + limit, this.total);
    const rows: Array<{ storyId: string; content: string }> = [];
    for (let i = offset; i < end; i++) {
      rows.push({ storyId: `story-${i}`, content: `content ${i}` });
    }
    return rows;
  }
}

describe('Integrations', () => {
  describe('Judge replies', () => {
    test('reads JSON verdicts, coercing string scores', () => {
      expect(parseJudgeReply('{"score": 7, "reasoning": "shared topic"}')).toEqual({ score: 7, reasoning: 'shared topic' });
      expect(parseJudgeReply('{"score": "6.5"}')).toEqual({ score: 6.5, reasoning: '' });
    });

    test('accepts a reply that leads with a number', () => {
      expect(parseJudgeReply('8 - strong emotional overlap')).toEqual({ score: 8, reasoning: 'strong emotional overlap' });
      expect(parseJudgeReply('  4.5')).toEqual({ score: 4.5, reasoning: '' });
    });

    test('rejects replies without a score', () => {
      expect(() => parseJudgeReply('quite relevant')).toThrow(JudgeResponseError);
      expect(() => parseJudgeReply('{"score": "high"}')).toThrow(JudgeResponseError);
    });

    test('null, empty, boolean and array scores are not read as numbers', () => {
      expect(() => parseJudgeReply('{"score": null, "reasoning": "cannot judge"}')).toThrow(JudgeResponseError);
      expect(() => parseJudgeReply('{"score": "", "reasoning": "cannot judge"}')).toThrow(JudgeResponseError);
      expect(() => parseJudgeReply('{"score": false}')).toThrow(JudgeResponseError);
      expect(() => parseJudgeReply('{"score": [7]}')).toThrow(JudgeResponseError);
    });

    test('a null score degrades the selection as unparsable', async () => {
      const scorer = new SemanticScorer({
        judge: async () => parseJudgeReply('{"score": null, "reasoning": "cannot judge"}')
      });

      const result = await scorer.scoreCandidates('ctx', [{ story: { id: 'story-a', content: 'a' }, metadataScore: 2 }]);
      expect(result.degraded).toBe(true);
      expect(result.failure?.kind).toBe('unparsable');
      expect(result.scored).toEqual([{ story: { id: 'story-a', content: 'a' }, metadataScore: 2, semanticScore: 0 }]);
    });
  });

  describe('Extraction replies', () => {
    test('trims labels and wraps the intent', () => {
      const analysis = parseExtractionReply('{"topics": [" work stress ", ""], "concepts": ["deadline"], "intent": "seek_advice"}');

      expect(analysis).toEqual({ topics: ['work stress'], concepts: ['deadline'], intents: ['seek_advice'] });
    });

    test('missing fields become empty lists', () => {
      expect(parseExtractionReply('{}')).toEqual({ topics: [], concepts: [], intents: [] });
    });
  });

  describe('Configuration', () => {
    test('defaults apply when variables are unset or blank', () => {
      const config = loadEngineConfig({ OPENAI_API_KEY: '  ', JUDGE_TIMEOUT_MS: '' });

      expect(config.openaiApiKey).toBeUndefined();
      expect(config.judgeTimeoutMs).toBe(8000);
      expect(config.openai).toEqual({ judgeModel: 'gpt-4o-mini', extractionModel: 'gpt-4o-mini' });
      expect(config.contextDecay).toEqual({ topicDecayThreshold: 3, conceptDecayThreshold: 5, storyRepetitionPenaltyBase: 1.0 });
      expect(config.selectionLimit).toBe(3);
      expect(config.maturityTurnThreshold).toBe(5);
    });

    test('reads numeric overrides from strings', () => {
      const config = loadEngineConfig({
        OPENAI_API_KEY: 'test-key',
        TOPIC_DECAY_THRESHOLD: '4',
        STORY_REPETITION_PENALTY_BASE: '1.5',
        SELECTION_LIMIT: '2'
      });

      expect(config.openaiApiKey).toBe('test-key');
      expect(config.contextDecay.topicDecayThreshold).toBe(4);
      expect(config.contextDecay.storyRepetitionPenaltyBase).toBe(1.5);
      expect(config.selectionLimit).toBe(2);
    });

    test('invalid values are rejected', () => {
      expect(() => loadEngineConfig({ SELECTION_LIMIT: '0' })).toThrow(InputValidationError);
      expect(() => loadEngineConfig({ JUDGE_TIMEOUT_MS: 'soon' })).toThrow(InputValidationError);
    });
  });

  describe('Story corpus', () => {
    test('analysis rows become story metadata', () => {
      expect(analysisToMetadata({
        story_id: 'story-a',
        trigger_title: 'Moved deadline',
        trigger_category: 'Stressor',
        trigger_description: 'Launch moved forward',
        emotions: ['stressed'],
        internal_monologue: null,
        violated_value: 'fairness',
        confidence_score: 4
      })).toEqual({
        triggerCategory: 'Stressor',
        triggerDescription: 'Launch moved forward',
        emotions: ['stressed'],
        violatedValue: 'fairness',
        confidence: 4
      });
    });

    test('trigger fields need a trigger title and confidence needs a value', () => {
      expect(analysisToMetadata({
        story_id: 'story-a',
        trigger_title: null,
        trigger_category: 'Stressor',
        violated_value: null,
        confidence_score: 5
      })).toEqual({});
    });

    test('merges analyses by story id', () => {
      const merged = mergeStoriesWithAnalyses(
        [{ id: 'story-a', content: 'a' }, { id: 'story-b', content: 'b', metadata: { emotions: ['sad'] } }],
        [{ story_id: 'story-a', emotions: ['angry'] }]
      );

      expect(merged).toEqual([
        { id: 'story-a', content: 'a', metadata: { emotions: ['angry'] } },
        { id: 'story-b', content: 'b', metadata: { emotions: ['sad'] } }
      ]);
    });

    test('in-memory corpus applies analyses to stored stories', async () => {
      const corpus = new InMemoryStoryCorpus([{ id: 'story-a', content: 'a' }]);
      corpus.applyAnalyses([{ story_id: 'story-a', violated_value: 'honesty', confidence_score: 3 }]);

      expect(corpus.size()).toBe(1);
      expect(await corpus.listStories()).toEqual([
        { id: 'story-a', content: 'a', metadata: { violatedValue: 'honesty', confidence: 3 } }
      ]);
    });

    test('vector store listing pages through the whole corpus', async () => {
      const corpus = new MockWeaviateService(5, 2);

      const stories = await corpus.listStories();

      expect(stories.map(story => story.id)).toEqual(['story-0', 'story-1', 'story-2', 'story-3', 'story-4']);
      expect(corpus.requests).toEqual([[0, 2], [2, 2], [4, 2]]);
    });

    test('an exact multiple of the page size stops on the empty page', async () => {
      const corpus = new MockWeaviateService(4, 2);

      expect(await corpus.listStories()).toHaveLength(4);
      expect(corpus.requests).toEqual([[0, 2], [2, 2], [4, 2]]);
    });

    test('vector store page size must be positive', () => {
      expect(() => new WeaviateService('https://weaviate.test', 'test-key', 0)).toThrow('Weaviate page size must be a positive integer, got 0');
    });

    test('vector store rows map to stories without empty metadata', () => {
      expect(storyFromRow({ storyId: 'story-c', content: 'c', title: '', emotions: [], confidence: null })).toEqual({
        id: 'story-c',
        content: 'c'
      });
      expect(storyFromRow({ storyId: 'story-a', content: 'a', title: 'A', triggerCategory: 'Stressor', confidence: 2 })).toEqual({
        id: 'story-a',
        content: 'a',
        title: 'A',
        metadata: { triggerCategory: 'Stressor', confidence: 2 }
      });
    });
  });
});
