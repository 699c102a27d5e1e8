import dotenv from 'dotenv';
import { StoryRelevanceEngine } from '../core/relevance-engine';
import { OpenAIService } from '../integrations/openai';
import { WeaviateService } from '../integrations/weaviate';
import { InMemoryStoryCorpus } from '../storage/story-corpus';
import { ConversationStateStore } from '../storage/conversation-store';
import { buildRelevanceInsights, summarizeState, usageStats } from '../engines/analytics';
import { loadEngineConfig } from '../utils/config';
import { AdapterFailure, SelectionResult, Story, StoryCorpus, TurnInput } from '../types';

dotenv.config();

const SAMPLE_STORIES: Story[] = [
  {
    id: 'story-deadline',
    title: 'The deadline that moved twice',
    content: 'My manager moved the launch date forward twice in one week, and I stayed late every night to keep up.',
    metadata: {
      triggerCategory: 'Stressor',
      triggerDescription: 'A launch date moved at work without warning',
      emotions: ['stressed', 'frustrated'],
      internalMonologue: 'Nobody asked whether this was even possible.',
      violatedValue: 'Respect for people\'s time and fairness',
      confidence: 4
    }
  },
  {
    id: 'story-credit',
    title: 'Someone else presented my slides',
    content: 'A colleague presented my analysis to leadership as their own while I sat in the room.',
    metadata: {
      triggerCategory: 'Social Interaction',
      triggerDescription: 'Credit taken for work in a meeting',
      emotions: ['angry', 'hurt'],
      violatedValue: 'Fairness and honesty',
      confidence: 5
    }
  },
  {
    id: 'story-garden',
    title: 'Tomatoes in July',
    content: 'The first summer I grew tomatoes I learned patience from a plant that refused to hurry.'
  }
];

// Scripted analyses used when no OpenAI key is configured
const SCRIPTED_TURNS: TurnInput[] = [
  { topics: ['work stress'], intents: ['share_experience'], concepts: ['deadline'] },
  { topics: ['work stress', 'manager'], intents: ['seek_advice'], concepts: ['fairness'] },
  { topics: ['work stress'], intents: ['seek_advice'], concepts: ['fairness', 'respect'] },
  { topics: ['gardening'], intents: ['request_story'], concepts: ['patience'] }
];

const MESSAGES = [
  'Work has been brutal lately, the deadlines keep moving.',
  'My manager keeps changing plans. How do I push back without seeming difficult?',
  'It just feels unfair, honestly. What would you do?',
  'Okay, enough about work. Tell me about your garden.'
];

export async function runRelevanceDemo(): Promise<void> {
  console.log('📚 Story Relevance Engine Demo');
  console.log('==============================');

  const config = loadEngineConfig();
  const openai = config.openaiApiKey ? new OpenAIService(config.openaiApiKey, config.openai) : null;

  let corpus: StoryCorpus = new InMemoryStoryCorpus(SAMPLE_STORIES);
  if (config.weaviateUrl && config.weaviateApiKey) {
    const weaviate = new WeaviateService(config.weaviateUrl, config.weaviateApiKey);
    console.log('Initializing Weaviate schema...');
    await weaviate.initializeSchema();
    corpus = weaviate;
  }

  const engine = new StoryRelevanceEngine({
    store: new ConversationStateStore(config.contextDecay),
    judge: openai,
    extractor: openai || undefined,
    corpus,
    judgeTimeoutMs: config.judgeTimeoutMs,
    maturityTurnThreshold: config.maturityTurnThreshold,
    defaultLimit: config.selectionLimit
  });

  engine.on('degraded_mode', (event: { reason?: AdapterFailure }) => {
    console.warn(`⚠️  Degraded mode: ${event.reason?.kind} - ${event.reason?.message}`);
  });

  const sessionKey = 'demo-bot:demo-user';

  for (let i = 0; i < MESSAGES.length; i++) {
    console.log(`\n💬 Turn ${i + 1}: ${MESSAGES[i]}`);

    let selection: SelectionResult;
    if (openai) {
      selection = (await engine.processMessage(sessionKey, MESSAGES[i])).selection;
    } else {
      await engine.updateTurn(sessionKey, SCRIPTED_TURNS[i]);
      selection = await engine.select(sessionKey, await corpus.listStories());
    }

    const insights = buildRelevanceInsights(selection);
    if (insights.status === 'no_relevant_stories') {
      console.log('  No story cleared the relevance threshold');
    }
    insights.topStories.forEach(story => {
      console.log(`  ${story.rank}. ${story.title} (${story.relevanceScore.toFixed(2)}) - ${story.selectionReasoning}`);
    });
  }

  const state = await engine.getOrCreate(sessionKey);
  console.log('\n🎯 Session Summary:', summarizeState(state));
  console.log('📊 Usage:', usageStats(state));
}
