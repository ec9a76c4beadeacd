/**
 * Section Generator
 *
 * Produces one snapshot section from the transcript and prior analysis:
 * builds the prompt, samples Claude, then scores the text and lists the
 * fields it could not fill. Sampling failures propagate to the caller.
 */

import { AnalysisInput, AnalysisView, LlmSampler, SectionMetadata, SectionResult } from '../types';
import { MissingTemplateKeyError, fillTemplate } from '../services/templates';

const TRANSCRIPT_LIMIT = 5000;
const SECTION_TEMPERATURE = 0.3;
const ENTITIES_PER_TYPE = 5;
const TOPICS_IN_PROMPT = 10;

export const INFERRED_MARKER = '[INFERRED]';

export const SCORING_PLACEHOLDERS = [
  'not mentioned',
  'not specified',
  'not available',
  'not stated',
  'unclear from transcript',
  'no information provided',
] as const;

export const MISSING_FIELD_PLACEHOLDERS = [
  'not mentioned',
  'not specified',
  'not available',
  'not stated',
  'unclear',
] as const;

// ============================================
// RESULTS
// ============================================

const EMPTY_METADATA: SectionMetadata = { model: null, tokens_used: null, finish_reason: null };

export function createSectionResult(
  sectionName: string,
  content: string,
  confidence: number,
  missingFields: readonly string[] = [],
  metadata: SectionMetadata = EMPTY_METADATA
): SectionResult {
  if (!sectionName.trim()) {
    throw new Error('Section name must not be empty');
  }
  if (!(confidence >= 0 && confidence <= 1)) {
    throw new Error(`Confidence must be between 0 and 1, got ${confidence}`);
  }

  return Object.freeze({
    section_name: sectionName,
    content,
    confidence,
    missing_fields: Object.freeze([...missingFields]),
    metadata: Object.freeze({ ...metadata }),
  });
}

/** Stand-in for a section whose generation call failed. */
export function errorPlaceholder(sectionName: string, error: string): SectionResult {
  return createSectionResult(sectionName, `[Section generation failed: ${error}]`, 0, [], {
    ...EMPTY_METADATA,
    error,
  });
}

// ============================================
// PROMPT
// ============================================

export function normalizeAnalysis(analysis: AnalysisInput): AnalysisView {
  switch (analysis.kind) {
    case 'analysis':
      return { entities: analysis.result.entities, topics: analysis.result.topics };
    case 'map': {
      const { entities, topics } = analysis.values;
      const view: AnalysisView = { entities: {}, topics: [] };

      if (typeof entities === 'object' && entities !== null && !Array.isArray(entities)) {
        for (const [type, list] of Object.entries(entities)) {
          if (Array.isArray(list)) {
            view.entities[type] = list.filter((e): e is string => typeof e === 'string');
          }
        }
      }
      if (Array.isArray(topics)) {
        view.topics = topics.filter((t): t is string => typeof t === 'string');
      }
      return view;
    }
  }
}

export function formatEntities(entities: AnalysisView['entities']): string {
  const parts = Object.entries(entities)
    .filter(([, list]) => list.length > 0)
    .map(([type, list]) => `${type}: ${list.slice(0, ENTITIES_PER_TYPE).join(', ')}`);

  return parts.length > 0 ? parts.join('; ') : 'No entities extracted';
}

export function formatTopics(topics: string[]): string {
  return topics.length > 0 ? topics.slice(0, TOPICS_IN_PROMPT).join(', ') : 'No specific topics identified';
}

function truncateTranscript(transcript: string): string {
  return transcript.length > TRANSCRIPT_LIMIT ? `${transcript.slice(0, TRANSCRIPT_LIMIT)}...` : transcript;
}

// ============================================
// SCORING
// ============================================

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/**
 * Heuristic trust score for generated text: starts at 1.0, adjusted for
 * placeholder phrases, inferred values, section-specific signals and length,
 * then clamped to [0, 1].
 */
export function scoreConfidence(sectionName: string, content: string): number {
  const lower = content.toLowerCase();
  let score = 1.0;

  for (const phrase of SCORING_PLACEHOLDERS) {
    if (lower.includes(phrase)) score -= 0.1;
  }

  score -= 0.05 * countOccurrences(content, INFERRED_MARKER);

  switch (sectionName) {
    case 'Customer Information': {
      const labelIndex = lower.indexOf('company name:');
      if (labelIndex === -1) {
        score -= 0.2;
      } else {
        const start = labelIndex + 'company name:'.length;
        const following = lower.slice(start, start + 50);
        if (!SCORING_PLACEHOLDERS.some((p) => following.includes(p))) score += 0.1;
      }
      if (!lower.includes('industry:')) score -= 0.1;
      break;
    }
    case 'Background':
      if (lower.includes('problem') || lower.includes('challenge')) score += 0.05;
      break;
    case 'Solution':
      if (lower.includes('product') || lower.includes('service')) score += 0.05;
      break;
    case 'Results and Achievements':
      if (/\d+%|\d+\s*hours?|\$\d+/.test(content)) score += 0.1;
      break;
    case 'Financial Impact':
      score += /\$\d+|\d+%\s*roi|savings/.test(lower) ? 0.15 : -0.2;
      break;
  }

  if (content.length < 100) {
    score -= 0.2;
  } else if (content.length < 200) {
    score -= 0.1;
  }

  return Math.max(0, Math.min(1, score));
}

/** A labelled field is missing when its label is absent or followed by a placeholder. */
export function isFieldMissing(lowerContent: string, label: string): boolean {
  const index = lowerContent.indexOf(label);
  if (index === -1) return true;

  const start = index + label.length;
  const following = lowerContent.slice(start, start + 100);
  return MISSING_FIELD_PLACEHOLDERS.some((p) => following.includes(p));
}

export function findMissingFields(sectionName: string, content: string): string[] {
  const lower = content.toLowerCase();
  const missing: string[] = [];

  switch (sectionName) {
    case 'Customer Information':
      if (isFieldMissing(lower, 'company name')) missing.push('company_name');
      if (isFieldMissing(lower, 'industry')) missing.push('industry');
      if (isFieldMissing(lower, 'location')) missing.push('location');
      if (isFieldMissing(lower, 'primary contact')) missing.push('primary_contact');
      break;
    case 'Engagement Details':
      if (isFieldMissing(lower, 'start date')) missing.push('start_date');
      if (isFieldMissing(lower, 'completion date')) missing.push('completion_date');
      break;
    case 'Financial Impact':
      if (!/\$\d+|cost savings/.test(lower)) missing.push('cost_savings');
      if (!lower.includes('roi') && !lower.includes('return on investment')) missing.push('roi_percentage');
      break;
    case 'Adoption and Usage':
      if (!lower.includes('users') && !lower.includes('adoption')) {
        missing.push('user_count', 'adoption_rate');
      }
      break;
  }

  return missing;
}

// ============================================
// GENERATOR
// ============================================

export interface SectionGeneratorOptions {
  sectionName: string;
  systemPrompt: string;
  template: string;
  sampler: LlmSampler;
  maxTokens: number;
}

export class SectionGenerator {
  readonly sectionName: string;
  private readonly systemPrompt: string;
  private readonly template: string;
  private readonly sampler: LlmSampler;
  private readonly maxTokens: number;

  constructor(options: SectionGeneratorOptions) {
    this.sectionName = options.sectionName;
    this.systemPrompt = options.systemPrompt;
    this.template = options.template;
    this.sampler = options.sampler;
    this.maxTokens = options.maxTokens;
  }

  async generate(
    transcript: string,
    analysis: AnalysisInput,
    context: Record<string, string> = {}
  ): Promise<SectionResult> {
    const view = normalizeAnalysis(analysis);
    console.log(
      `[SectionGenerator] Generating ${this.sectionName} (${Object.keys(view.entities).length} entity types, ${view.topics.length} topics)`
    );

    const prompt = this.buildPrompt(transcript, view, context);
    const response = await this.sampler.sample({
      prompt,
      systemPrompt: this.systemPrompt,
      temperature: SECTION_TEMPERATURE,
      maxTokens: this.maxTokens,
    });

    const content = response.content;
    const confidence = scoreConfidence(this.sectionName, content);
    const missingFields = findMissingFields(this.sectionName, content);

    console.log(
      `[SectionGenerator] ${this.sectionName}: confidence ${confidence.toFixed(2)}, ${missingFields.length} missing fields, ${content.length} chars`
    );

    return createSectionResult(this.sectionName, content, confidence, missingFields, {
      model: response.metadata.model,
      tokens_used: response.metadata.tokens_used,
      finish_reason: response.metadata.finish_reason,
    });
  }

  buildPrompt(transcript: string, view: AnalysisView, context: Record<string, string>): string {
    const vars: Record<string, string> = {
      transcript: truncateTranscript(transcript),
      entities: formatEntities(view.entities),
      topics: formatTopics(view.topics),
      ...context,
    };

    try {
      return fillTemplate(this.template, vars);
    } catch (err) {
      if (!(err instanceof MissingTemplateKeyError)) throw err;
      console.warn(`[SectionGenerator] ${this.sectionName}: missing template variable "${err.key}", retrying`);
      return fillTemplate(this.template, { ...vars, all_sections: '' });
    }
  }
}
