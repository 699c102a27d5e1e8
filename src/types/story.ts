// Story corpus, scoring and selection contracts

export interface StoryMetadata {
  triggerCategory?: string;
  triggerDescription?: string;
  emotions?: string[];
  internalMonologue?: string;
  violatedValue?: string;
  confidence?: number; // 1-5
}

export interface Story {
  id: string;
  content: string;
  title?: string;
  metadata?: StoryMetadata;
}

// Column-shaped analysis row as produced by the extraction pipeline
export interface StoryAnalysisRecord {
  story_id: string;
  trigger_title?: string | null;
  trigger_description?: string | null;
  trigger_category?: string | null;
  emotions?: string[] | null;
  internal_monologue?: string | null;
  violated_value?: string | null;
  value_reasoning?: string | null;
  confidence_score?: number | null;
}

export interface ScoreBreakdown {
  storyId: string;
  metadataScore: number;
  semanticScore: number;
  baseScore: number;
  repetitionMultiplier: number;
  confidenceBonus: number;
  finalScore: number;
}

export interface JudgeVerdict {
  score: number; // 0-10
  reasoning: string;
}

export type AdapterFailureKind = 'error' | 'timeout' | 'unparsable' | 'unavailable';

export interface AdapterFailure {
  kind: AdapterFailureKind;
  message: string;
}

export type SemanticOutcome =
  | { ok: true; score: number; reasoning: string }
  | { ok: false; failure: AdapterFailure };

export interface ScoredCandidate {
  story: Story;
  metadataScore: number;
  semanticScore: number;
  semanticReasoning?: string;
}

export interface RankedStory {
  story: Story;
  breakdown: ScoreBreakdown;
  reasoning: string;
}

export type SelectionStatus = 'selected' | 'empty' | 'cancelled';

export interface SelectionResult {
  sessionKey: string;
  turn: number; // turn of the state snapshot that was ranked
  recordedAtTurn?: number; // turn the tellings were written at; later than `turn` if turns arrived mid-selection
  status: SelectionStatus;
  degraded: boolean;
  degradedReason?: AdapterFailure;
  candidateCount: number;
  filteredCount: number;
  stories: RankedStory[];
}

// Collaborators consumed through narrow interfaces

export interface RelevanceJudge {
  judge(contextSummary: string, storyContent: string, signal?: AbortSignal): Promise<JudgeVerdict>;
}

export interface TurnAnalysis {
  topics: string[];
  intents: string[];
  concepts: string[];
}

export interface TurnExtractor {
  extract(message: string): Promise<TurnAnalysis>;
}

export interface StoryCorpus {
  listStories(): Promise<Story[]>;
}
