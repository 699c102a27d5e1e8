import { JudgeVerdict, RelevanceJudge, Story, TurnAnalysis, TurnExtractor } from '../types';

export const deadlineStory: Story = {
  id: 'story-a',
  title: 'The moving deadline',
  content: 'marker-deadline: the launch moved twice in one week.',
  metadata: {
    triggerCategory: 'Stressor',
    emotions: ['stressed'],
    violatedValue: 'fairness',
    confidence: 4
  }
};

export const creditStory: Story = {
  id: 'story-b',
  title: 'Borrowed slides',
  content: 'marker-credit: a colleague presented my analysis as their own.',
  metadata: {
    triggerCategory: 'Social Interaction',
    emotions: ['angry'],
    violatedValue: 'honesty',
    confidence: 2
  }
};

export const gardenStory: Story = {
  id: 'story-c',
  content: 'marker-garden: tomatoes taught me patience.'
};

export const workAdviceTurn: TurnAnalysis = {
  topics: ['work stress'],
  intents: ['seek_advice'],
  concepts: ['fairness']
};

// Scores stories by a marker found in the story text
export class ScriptedJudge implements RelevanceJudge {
  calls: string[] = [];
  private scores: Record<string, number>;

  constructor(scores: Record<string, number>) {
    this.scores = scores;
  }

  async judge(contextSummary: string, storyContent: string): Promise<JudgeVerdict> {
    this.calls.push(storyContent);
    const entry = Object.entries(this.scores).find(([marker]) => storyContent.includes(marker));
    return { score: entry ? entry[1] : 0, reasoning: `scripted for ${entry ? entry[0] : 'unknown'}` };
  }
}

export class HangingJudge implements RelevanceJudge {
  aborted = 0;

  judge(contextSummary: string, storyContent: string, signal?: AbortSignal): Promise<JudgeVerdict> {
    return new Promise((_, reject) => {
      signal?.addEventListener('abort', () => {
        this.aborted++;
        reject(new Error('aborted'));
      });
    });
  }
}

export class FailingJudge implements RelevanceJudge {
  async judge(): Promise<JudgeVerdict> {
    throw new Error('judge unreachable');
  }
}

export class GatedJudge implements RelevanceJudge {
  called: Promise<void>;
  private markCalled: () => void = () => undefined;
  private gate: Promise<void>;
  private open: () => void = () => undefined;
  private score: number;

  constructor(score: number) {
    this.score = score;
    this.called = new Promise(resolve => { this.markCalled = resolve; });
    this.gate = new Promise(resolve => { this.open = resolve; });
  }

  release(): void {
    this.open();
  }

  async judge(): Promise<JudgeVerdict> {
    this.markCalled();
    await this.gate;
    return { score: this.score, reasoning: 'gated' };
  }
}

export class FixedExtractor implements TurnExtractor {
  messages: string[] = [];
  private analysis: TurnAnalysis;

  constructor(analysis: TurnAnalysis) {
    this.analysis = analysis;
  }

  async extract(message: string): Promise<TurnAnalysis> {
    this.messages.push(message);
    return {
      topics: this.analysis.topics.slice(),
      intents: this.analysis.intents.slice(),
      concepts: this.analysis.concepts.slice()
    };
  }
}
