import weaviate, { ApiKey, WeaviateClient } from 'weaviate-ts-client';
import { z } from 'zod';
import { Story, StoryCorpus } from '../types';

const STORY_CLASS = 'Story';

const storyRowSchema = z.object({
  storyId: z.string().min(1),
  content: z.string(),
  title: z.string().nullish(),
  triggerCategory: z.string().nullish(),
  triggerDescription: z.string().nullish(),
  emotions: z.array(z.string()).nullish(),
  internalMonologue: z.string().nullish(),
  violatedValue: z.string().nullish(),
  confidence: z.number().nullish()
});

type StoryRow = z.infer<typeof storyRowSchema>;

export function storyFromRow(row: StoryRow): Story {
  const story: Story = { id: row.storyId, content: row.content };
  if (row.title) story.title = row.title;

  const metadata: NonNullable<Story['metadata']> = {};
  if (row.triggerCategory) metadata.triggerCategory = row.triggerCategory;
  if (row.triggerDescription) metadata.triggerDescription = row.triggerDescription;
  if (row.emotions && row.emotions.length > 0) metadata.emotions = row.emotions;
  if (row.internalMonologue) metadata.internalMonologue = row.internalMonologue;
  if (row.violatedValue) metadata.violatedValue = row.violatedValue;
  if (typeof row.confidence === 'number') metadata.confidence = row.confidence;

  if (Object.keys(metadata).length > 0) story.metadata = metadata;
  return story;
}

export class WeaviateService implements StoryCorpus {
  private client: WeaviateClient;
  private pageSize: number;

  constructor(url: string, apiKey: string, pageSize: number = 200) {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new Error(`Weaviate page size must be a positive integer, got ${pageSize}`);
    }
    this.client = weaviate.client({
      scheme: 'https',
      host: url.replace('https://', ''),
      apiKey: new ApiKey(apiKey)
    });
    this.pageSize = pageSize;
  }

  async initializeSchema(): Promise<void> {
    try {
      const schema = await this.client.schema.getter().do();
      const exists = (schema.classes || []).some(existing => existing.class === STORY_CLASS);

      if (!exists) {
        const storyClass = {
          class: STORY_CLASS,
          description: 'Pre-authored stories with their psychological analysis',
          vectorizer: 'none',
          properties: [
            { name: 'storyId', dataType: ['text'], description: 'Unique identifier for the story' },
            { name: 'title', dataType: ['text'], description: 'Short story title' },
            { name: 'content', dataType: ['text'], description: 'Full story text' },
            { name: 'triggerCategory', dataType: ['text'], description: 'Category of the triggering event' },
            { name: 'triggerDescription', dataType: ['text'], description: 'What triggered the story' },
            { name: 'emotions', dataType: ['text[]'], description: 'Emotions felt in the story' },
            { name: 'internalMonologue', dataType: ['text'], description: 'Narrator internal thought' },
            { name: 'violatedValue', dataType: ['text'], description: 'Value that was violated' },
            { name: 'confidence', dataType: ['int'], description: 'Analysis confidence 1-5' }
          ]
        };

        await this.client.schema.classCreator().withClass(storyClass).do();
        console.log('Story class created successfully');
      }
    } catch (error) {
      console.error('Error initializing Weaviate schema:', error);
      throw error;
    }
  }

  async storeStory(story: Story): Promise<string> {
    try {
      const metadata = story.metadata || {};
      const result = await this.client.data.creator()
        .withClassName(STORY_CLASS)
        .withProperties({
          storyId: story.id,
          title: story.title || '',
          content: story.content,
          triggerCategory: metadata.triggerCategory || '',
          triggerDescription: metadata.triggerDescription || '',
          emotions: metadata.emotions || [],
          internalMonologue: metadata.internalMonologue || '',
          violatedValue: metadata.violatedValue || '',
          ...(typeof metadata.confidence === 'number' ? { confidence: metadata.confidence } : {})
        })
        .do();

      return result.id || story.id;
    } catch (error) {
      console.error('Error storing story:', error);
      throw error;
    }
  }

  /**
   * Every stored story, read page by page until a short page comes back.
   */
  async listStories(): Promise<Story[]> {
    try {
      const stories: Story[] = [];
      let offset = 0;

      for (;;) {
        const rows = z.array(z.unknown()).safeParse(await this.fetchStoryPage(offset, this.pageSize));
        if (!rows.success) {
          console.warn(`Weaviate returned no story rows at offset ${offset}`);
          break;
        }

        for (const raw of rows.data) {
          const row = storyRowSchema.safeParse(raw);
          if (row.success) {
            stories.push(storyFromRow(row.data));
          } else {
            console.warn(`Skipping malformed story row: ${row.error.message}`);
          }
        }

        if (rows.data.length < this.pageSize) break;
        offset += rows.data.length;
      }

      return stories;
    } catch (error) {
      console.error('Error listing stories:', error);
      throw error;
    }
  }

  protected async fetchStoryPage(offset: number, limit: number): Promise<unknown> {
    const result = await this.client.graphql.get()
      .withClassName(STORY_CLASS)
      .withFields('storyId title content triggerCategory triggerDescription emotions internalMonologue violatedValue confidence')
      .withLimit(limit)
      .withOffset(offset)
      .do();

    return result?.data?.Get?.[STORY_CLASS];
  }
}
