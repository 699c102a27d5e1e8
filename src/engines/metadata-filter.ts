import { ConversationState, Story } from '../types';
import { activeConceptLabels, activeTopicList } from './decay';

export const WORK_ALIGNED_CATEGORIES = ['Social Interaction', 'Stressor'];
export const WORK_CUE = 'work';
export const ADVICE_INTENT = 'seek_advice';
export const STORY_REQUEST_INTENT = 'request_story';
export const NEGATIVE_AFFECT = [
  'frustrated',
  'angry',
  'stressed',
  'anxious',
  'overwhelmed',
  'resentful',
  'hurt',
  'disappointed',
  'sad'
];

export interface MetadataFilterOptions {
  // Also score trigger descriptions, story requests and internal monologue
  extendedCues?: boolean;
  passThreshold?: number;
}

export interface MetadataScored {
  story: Story;
  metadataScore: number;
}

export interface MetadataFilterResult {
  candidates: MetadataScored[];
  filteredCount: number;
  fellBack: boolean;
}

const DEFAULT_PASS_THRESHOLD = 0.5;

function lower(values: string[]): string[] {
  return values.map(value => value.toLowerCase());
}

/**
 * Cheap, explainable alignment between the conversation and a story's
 * structured analysis. Missing metadata fields add nothing.
 */
export function scoreMetadata(
  state: ConversationState,
  story: Story,
  options: MetadataFilterOptions = {}
): number {
  const metadata = story.metadata;
  if (!metadata) return 0;

  const topics = lower(activeTopicList(state));
  const concepts = lower(activeConceptLabels(state));
  const intents = state.userIntentHistory;
  const latestIntent = intents.length > 0 ? intents[intents.length - 1] : undefined;
  let score = 0;

  // Trigger category alignment
  if (metadata.triggerCategory && WORK_ALIGNED_CATEGORIES.includes(metadata.triggerCategory)) {
    if (topics.some(topic => topic.includes(WORK_CUE))) {
      score += 1.5;
    }
  }

  // Emotional alignment
  const emotions = lower(metadata.emotions || []);
  if (latestIntent === ADVICE_INTENT && emotions.some(emotion => NEGATIVE_AFFECT.includes(emotion))) {
    score += 2.0;
  }

  // Value alignment, weighted by extraction confidence
  if (metadata.violatedValue && metadata.confidence !== undefined) {
    const violatedValue = metadata.violatedValue.toLowerCase();
    for (const concept of concepts) {
      if (violatedValue.includes(concept)) {
        score += metadata.confidence * 0.5;
      }
    }
  }

  if (options.extendedCues) {
    score += scoreExtendedCues(story, topics, concepts, intents);
  }

  return score;
}

function scoreExtendedCues(story: Story, topics: string[], concepts: string[], intents: string[]): number {
  const metadata = story.metadata || {};
  let score = 0;

  if (metadata.triggerDescription) {
    const description = metadata.triggerDescription.toLowerCase();
    for (const topic of topics) {
      if (topic.split(/\s+/).some(word => word !== '' && description.includes(word))) {
        score += 2.0;
      }
    }
  }

  if (metadata.emotions && metadata.emotions.length > 0 && intents.includes(STORY_REQUEST_INTENT)) {
    score += 1.0;
  }

  if (metadata.internalMonologue) {
    const monologue = metadata.internalMonologue.toLowerCase();
    for (const concept of concepts) {
      if (monologue.includes(concept)) {
        score += 1.0;
      }
    }
  }

  return score;
}

/**
 * Stage 1 pre-filter. Keeps stories scoring above the pass threshold; when
 * nothing passes, every story goes through so the semantic stage still sees
 * the whole corpus.
 */
export function filterByMetadata(
  state: ConversationState,
  stories: Story[],
  options: MetadataFilterOptions = {}
): MetadataFilterResult {
  const threshold = options.passThreshold ?? DEFAULT_PASS_THRESHOLD;
  const scored = stories.map(story => ({ story, metadataScore: scoreMetadata(state, story, options) }));
  const passed = scored.filter(candidate => candidate.metadataScore > threshold);

  if (passed.length === 0) {
    if (stories.length > 0) {
      console.warn(`No stories passed metadata filtering, falling back to all ${stories.length} stories`);
    }
    return { candidates: scored, filteredCount: scored.length, fellBack: true };
  }

  console.log(`Filtered ${passed.length} stories from ${stories.length} based on metadata`);
  return { candidates: passed, filteredCount: passed.length, fellBack: false };
}
