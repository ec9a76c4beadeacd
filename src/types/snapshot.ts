/**
 * Snapshot pipeline types
 *
 * Wire-facing shapes use snake_case, matching the JSON the API returns.
 */

// ============================================
// ENUMS
// ============================================

export type SectionName =
  | 'Customer Information'
  | 'Background'
  | 'Solution'
  | 'Engagement Details'
  | 'Results and Achievements'
  | 'Adoption and Usage'
  | 'Financial Impact'
  | 'Long-Term Impact'
  | 'Visuals'
  | 'Additional Commentary'
  | 'Executive Summary';

export type MeetingType =
  | 'discussion'
  | 'one_on_one'
  | 'small_group'
  | 'large_group'
  | 'kickoff'
  | 'review';

export type AnalysisMethod = 'hybrid_nlp_llm' | 'nlp_only' | 'llm_only';
export type OutputFormat = 'json' | 'markdown';

// ============================================
// TRANSCRIPT
// ============================================

export interface SpeakerTurn {
  speaker: string;
  text: string;
  start: string;
  end: string;
}

export interface TranscriptData {
  text: string;
  speakers: string[];
  speaker_turns: SpeakerTurn[];
  duration: number;
  metadata: {
    filename: string;
    caption_count: number;
    speaker_count: number;
  };
}

// ============================================
// ANALYSIS
// ============================================

export type EntityMap = Record<string, string[]>;

export interface TranscriptStructure {
  meeting_type: MeetingType;
  speaker_count: number;
  total_turns: number;
  duration_seconds: number;
  speaker_turns_count: Record<string, number>;
  speaker_word_count: Record<string, number>;
  avg_turn_length: number;
}

export interface LlmInsights {
  entities: EntityMap;
  topics: string[];
  structure: Record<string, unknown>;
  data_availability: Record<string, number>;
}

export interface AnalysisResult {
  entities: EntityMap;
  topics: string[];
  key_phrases: string[];
  structure: TranscriptStructure;
  llm_insights: LlmInsights;
  data_availability: Record<string, number>;
  metadata: {
    analysis_method: AnalysisMethod;
    nlp_enabled: boolean;
  };
}

/**
 * What a section generator is given as prior analysis. The Executive Summary
 * has no real analysis to offer, so it passes a bare map.
 */
export type AnalysisInput =
  | { kind: 'analysis'; result: AnalysisResult }
  | { kind: 'map'; values: Record<string, unknown> };

export interface AnalysisView {
  entities: EntityMap;
  topics: string[];
}

// ============================================
// LLM
// ============================================

export interface TokenUsage {
  input: number;
  output: number;
}

export interface LlmMetadata {
  model: string;
  tokens_used: TokenUsage;
  finish_reason: string | null;
}

export interface LlmResponse {
  content: string;
  metadata: LlmMetadata;
}

export interface SampleRequest {
  prompt: string;
  systemPrompt: string;
  temperature?: number;
  maxTokens?: number;
  model?: string;
}

export interface LlmSampler {
  sample(request: SampleRequest): Promise<LlmResponse>;
}

// ============================================
// SECTIONS
// ============================================

export interface SectionMetadata {
  model: string | null;
  tokens_used: TokenUsage | null;
  finish_reason: string | null;
  error?: string;
}

export interface SectionResult {
  readonly section_name: string;
  readonly content: string;
  readonly confidence: number;
  readonly missing_fields: readonly string[];
  readonly metadata: SectionMetadata;
}

export type SectionSet = Map<string, SectionResult>;

// ============================================
// VALIDATION
// ============================================

export interface ValidationResult {
  factual_consistency: boolean;
  completeness: boolean;
  quality: boolean;
  issues: string[];
  improvements: string[];
  requires_improvements: boolean;
  missing_critical_info: string[];
}

/** A section as the validator accepts it: a generated result, a bare record, or raw text. */
export type ValidatableSection = Pick<SectionResult, 'content'> | string;

// ============================================
// OUTPUT
// ============================================

export interface SectionContent {
  content: string;
  confidence: number;
  missing_fields: string[];
}

export interface SnapshotMetadata {
  avg_confidence: number;
  total_sections: number;
  entities_extracted: EntityMap;
  topics_identified: string[];
  low_confidence_sections: string[];
}

export interface SnapshotOutput {
  sections: Record<string, SectionContent>;
  metadata: SnapshotMetadata;
  validation: ValidationResult;
  missing_fields: string[];
}

export interface StoredSnapshot {
  id: string;
  user_id: string;
  snapshot: SnapshotOutput;
  created_at: string;
}
