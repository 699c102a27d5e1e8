import { Story, StoryAnalysisRecord, StoryCorpus, StoryMetadata } from '../types';

export function analysisToMetadata(record: StoryAnalysisRecord): StoryMetadata {
  const metadata: StoryMetadata = {};

  // Trigger fields only count when the analysis produced a trigger at all
  if (record.trigger_title) {
    if (record.trigger_category) metadata.triggerCategory = record.trigger_category;
    if (record.trigger_description) metadata.triggerDescription = record.trigger_description;
  }
  if (record.emotions && record.emotions.length > 0) {
    metadata.emotions = record.emotions.slice();
  }
  if (record.internal_monologue) {
    metadata.internalMonologue = record.internal_monologue;
  }
  if (record.violated_value) {
    metadata.violatedValue = record.violated_value;
    if (typeof record.confidence_score === 'number') {
      metadata.confidence = record.confidence_score;
    }
  }

  return metadata;
}

/**
 * Attaches analysis rows to their stories. Stories without a row keep
 * whatever metadata they already carried.
 */
export function mergeStoriesWithAnalyses(stories: Story[], analyses: StoryAnalysisRecord[]): Story[] {
  const lookup = new Map<string, StoryMetadata>();
  for (const analysis of analyses) {
    if (analysis.story_id) {
      lookup.set(analysis.story_id, analysisToMetadata(analysis));
    }
  }

  return stories.map(story => {
    const metadata = lookup.get(story.id);
    return metadata ? { ...story, metadata } : { ...story };
  });
}

export class InMemoryStoryCorpus implements StoryCorpus {
  private stories: Map<string, Story> = new Map();

  constructor(stories: Story[] = []) {
    stories.forEach(story => this.addStory(story));
  }

  addStory(story: Story): void {
    this.stories.set(story.id, { ...story });
  }

  applyAnalyses(analyses: StoryAnalysisRecord[]): void {
    const merged = mergeStoriesWithAnalyses(Array.from(this.stories.values()), analyses);
    merged.forEach(story => this.stories.set(story.id, story));
  }

  async listStories(): Promise<Story[]> {
    return Array.from(this.stories.values()).map(story => ({ ...story }));
  }

  size(): number {
    return this.stories.size;
  }
}
