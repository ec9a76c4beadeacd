/**
 * Transcript analyzer
 *
 * Rule-based entity, topic and key-phrase extraction plus one Claude pass for
 * deeper insights. Extraction problems degrade to empty results; only the
 * caller's own bugs escape.
 */

import stopwordList from '../data/stopwords.json';
import {
  AnalysisResult,
  EntityMap,
  LlmInsights,
  LlmSampler,
  MeetingType,
  TranscriptData,
  TranscriptStructure,
} from '../types';
import { Settings } from './config';
import { errorMessage } from './errors';
import { SYSTEM_PROMPTS } from './templates';

export interface TranscriptAnalyzer {
  analyze(text: string, transcriptData?: TranscriptData): Promise<AnalysisResult>;
}

const STOPWORDS = new Set<string>(stopwordList);
const TOP_TOPICS = 15;
const TOP_PHRASES = 15;
const LLM_TRANSCRIPT_LIMIT = 3000;

const ORG_PATTERN =
  /\b(?:[A-Z][\w&-]*\s){1,3}(?:Inc|Corp|Corporation|LLC|Ltd|Limited|Group|Technologies|Systems|Solutions|Labs|Company)\b/g;
const MONEY_PATTERN = /\$\d+(?:,\d{3})*(?:\.\d+)?(?:\s?(?:million|billion|thousand|[kmb])\b)?/gi;
const PERCENT_PATTERN = /\b\d+(?:\.\d+)?(?:%|\s?percent\b)/gi;
const DATE_PATTERN =
  /\b\d{4}-\d{2}-\d{2}\b|\b(?:January|February|March|April|May|June|July|August|September|October|November|December)(?:\s+\d{1,2}(?:st|nd|rd|th)?)?(?:,?\s+\d{4})?/g;
const SPEAKER_LABEL_PATTERN = /^([A-Z][^:(\n]{0,60}?)(?:\s*\([^)]+\))?:\s/gm;

// ============================================
// NLP HELPERS
// ============================================

function unique(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v !== ''))];
}

function matchAll(text: string, pattern: RegExp): string[] {
  return text.match(pattern) ?? [];
}

export function extractEntities(text: string, speakers: string[] = []): EntityMap {
  const labelled = [...text.matchAll(SPEAKER_LABEL_PATTERN)].map((m) => m[1]);

  const entities: EntityMap = {
    PERSON: unique([...speakers, ...labelled]).filter((name) => name !== 'Unknown'),
    ORG: unique(matchAll(text, ORG_PATTERN)),
    DATE: unique(matchAll(text, DATE_PATTERN)),
    MONEY: unique(matchAll(text, MONEY_PATTERN)),
    PERCENT: unique(matchAll(text, PERCENT_PATTERN)),
  };

  return Object.fromEntries(Object.entries(entities).filter(([, values]) => values.length > 0));
}

export function tokenize(text: string): string[] {
  return matchAll(text.toLowerCase(), /[a-z]+/g).filter((token) => token.length > 3 && !STOPWORDS.has(token));
}

function mostCommon(items: string[], limit: number): string[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }

  // Stable sort keeps first-seen order among ties
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([item]) => item);
}

export function extractTopics(text: string, limit = TOP_TOPICS): string[] {
  return mostCommon(tokenize(text), limit);
}

function ngrams(tokens: string[], size: number): string[] {
  const grams: string[] = [];
  for (let i = 0; i + size <= tokens.length; i++) {
    grams.push(tokens.slice(i, i + size).join(' '));
  }
  return grams;
}

export function extractKeyPhrases(text: string, limit = TOP_PHRASES): string[] {
  const tokens = tokenize(text);
  const bigrams = mostCommon(ngrams(tokens, 2), Math.floor(limit / 2));
  const trigrams = mostCommon(ngrams(tokens, 3), limit - bigrams.length);

  return [...trigrams, ...bigrams].slice(0, limit);
}

export function detectMeetingType(speakerCount: number, text: string): MeetingType {
  const lower = text.toLowerCase();
  if (lower.includes('kickoff') || lower.includes('introduction')) return 'kickoff';
  if (lower.includes('review') || lower.includes('retrospective')) return 'review';

  if (speakerCount === 2) return 'one_on_one';
  if (speakerCount > 4) return 'large_group';
  return 'small_group';
}

export function analyzeStructure(data?: TranscriptData): TranscriptStructure {
  if (!data) {
    return {
      meeting_type: 'discussion',
      speaker_count: 0,
      total_turns: 0,
      duration_seconds: 0,
      speaker_turns_count: {},
      speaker_word_count: {},
      avg_turn_length: 0,
    };
  }

  const turnsCount: Record<string, number> = {};
  const wordCount: Record<string, number> = {};
  let totalWords = 0;

  for (const turn of data.speaker_turns) {
    const words = turn.text.split(/\s+/).filter(Boolean).length;
    turnsCount[turn.speaker] = (turnsCount[turn.speaker] ?? 0) + 1;
    wordCount[turn.speaker] = (wordCount[turn.speaker] ?? 0) + words;
    totalWords += words;
  }

  const totalTurns = data.speaker_turns.length;

  return {
    meeting_type: detectMeetingType(data.speakers.length, data.text),
    speaker_count: data.speakers.length,
    total_turns: totalTurns,
    duration_seconds: data.duration,
    speaker_turns_count: turnsCount,
    speaker_word_count: wordCount,
    avg_turn_length: totalTurns > 0 ? totalWords / totalTurns : 0,
  };
}

// ============================================
// LLM INSIGHTS
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function toEntityMap(value: unknown): EntityMap {
  if (!isRecord(value)) return {};
  const map: EntityMap = {};
  for (const [type, items] of Object.entries(value)) {
    const strings = toStringArray(items);
    if (strings.length > 0) map[type] = strings;
  }
  return map;
}

function toScoreMap(value: unknown): Record<string, number> {
  if (!isRecord(value)) return {};
  const scores: Record<string, number> = {};
  for (const [section, score] of Object.entries(value)) {
    if (typeof score === 'number' && Number.isFinite(score)) {
      scores[section] = Math.min(1, Math.max(0, score));
    }
  }
  return scores;
}

const EMPTY_INSIGHTS: LlmInsights = { entities: {}, topics: [], structure: {}, data_availability: {} };

/**
 * Reads the analysis JSON Claude returns, tolerating prose around the object.
 * Returns null when no JSON object can be recovered.
 */
export function parseInsights(content: string): LlmInsights | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (!jsonMatch) return null;
    try {
      parsed = JSON.parse(jsonMatch[0]);
    } catch {
      return null;
    }
  }

  if (!isRecord(parsed)) return null;

  return {
    entities: toEntityMap(parsed.entities),
    topics: toStringArray(parsed.topics),
    structure: isRecord(parsed.structure) ? parsed.structure : {},
    data_availability: toScoreMap(parsed.data_availability),
  };
}

export function assessDataAvailability(text: string, entities: EntityMap): Record<string, number> {
  const lower = text.toLowerCase();
  const mentions = (keywords: string[]) => keywords.some((k) => lower.includes(k));
  const has = (type: string) => (entities[type] ?? []).length > 0;

  return {
    'Customer Information': has('ORG') && has('PERSON') ? 0.9 : 0.5,
    Background: mentions(['problem', 'challenge', 'issue', 'pain']) ? 0.8 : 0.3,
    Solution: mentions(['solution', 'implement', 'deploy', 'product']) ? 0.7 : 0.3,
    'Results and Achievements': mentions(['result', 'improvement', 'saved', 'increased']) ? 0.7 : 0.2,
    'Financial Impact': has('MONEY') || has('PERCENT') ? 0.7 : 0.2,
    'Engagement Details': 0.4,
    'Adoption and Usage': 0.4,
    'Long-Term Impact': 0.4,
  };
}

function buildAnalysisPrompt(text: string, entities: EntityMap, topics: string[]): string {
  const excerpt = text.length > LLM_TRANSCRIPT_LIMIT ? `${text.slice(0, LLM_TRANSCRIPT_LIMIT)}...` : text;

  return `Analyze this meeting transcript and extract structured information.

TRANSCRIPT:
${excerpt}

ALREADY EXTRACTED ENTITIES:
${JSON.stringify(entities, null, 2)}

ALREADY EXTRACTED TOPICS:
${topics.join(', ')}

Return a JSON object with these keys:

"entities": people, companies, products, locations and technologies, grouped by type
"topics": main themes, problems, solutions and metrics discussed
"structure": meeting type (kickoff, review, planning, consultation...), number of speakers, discussion phases, key decisions
"data_availability": a score from 0.0 to 1.0 for each of Customer Information, Background, Solution, Engagement Details, Results and Achievements, Adoption and Usage, Financial Impact, Long-Term Impact, Additional Commentary

OUTPUT: Valid JSON only, no additional text.`;
}

// ============================================
// ANALYZER
// ============================================

export class SnapshotAnalyzer implements TranscriptAnalyzer {
  constructor(
    private readonly sampler: LlmSampler,
    private readonly settings: Pick<Settings, 'llm' | 'nlp'>
  ) {}

  async analyze(text: string, transcriptData?: TranscriptData): Promise<AnalysisResult> {
    console.log(`[Analyzer] Analyzing transcript (${text.length} chars)`);
    const { nlp } = this.settings;

    let entities: EntityMap = {};
    if (nlp.extractEntities) {
      try {
        entities = extractEntities(text, transcriptData?.speakers ?? []);
      } catch (err) {
        console.warn('[Analyzer] Entity extraction failed:', errorMessage(err));
      }
    }

    let topics: string[] = [];
    if (nlp.extractTopics) {
      try {
        topics = extractTopics(text);
      } catch (err) {
        console.warn('[Analyzer] Topic extraction failed:', errorMessage(err));
      }
    }

    let keyPhrases: string[] = [];
    try {
      keyPhrases = extractKeyPhrases(text);
    } catch (err) {
      console.warn('[Analyzer] Key phrase extraction failed:', errorMessage(err));
    }

    const insights = await this.llmAnalysis(text, entities, topics);
    const availability =
      Object.keys(insights.data_availability).length > 0
        ? insights.data_availability
        : assessDataAvailability(text, entities);

    const entityCount = Object.values(entities).reduce((sum, list) => sum + list.length, 0);
    console.log(`[Analyzer] Found ${entityCount} entities, ${topics.length} topics, ${keyPhrases.length} key phrases`);

    return {
      entities,
      topics,
      key_phrases: keyPhrases,
      structure: analyzeStructure(transcriptData),
      llm_insights: insights,
      data_availability: availability,
      metadata: {
        analysis_method: nlp.extractEntities || nlp.extractTopics ? 'hybrid_nlp_llm' : 'llm_only',
        nlp_enabled: nlp.extractEntities,
      },
    };
  }

  private async llmAnalysis(text: string, entities: EntityMap, topics: string[]): Promise<LlmInsights> {
    try {
      const response = await this.sampler.sample({
        prompt: buildAnalysisPrompt(text, entities, topics),
        systemPrompt: SYSTEM_PROMPTS.analyzer,
        temperature: 0.2,
        maxTokens: this.settings.llm.maxTokensAnalysis,
      });

      const insights = parseInsights(response.content);
      if (!insights) {
        console.warn('[Analyzer] LLM response was not valid JSON, using fallback');
        return { ...EMPTY_INSIGHTS, structure: { meeting_type: 'unknown' } };
      }
      return insights;
    } catch (err) {
      console.warn('[Analyzer] LLM analysis failed:', errorMessage(err));
      return { ...EMPTY_INSIGHTS };
    }
  }
}
