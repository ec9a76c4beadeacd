/**
 * Validator
 *
 * Combines fixed rule checks with one Claude review of the whole snapshot.
 * The review is best effort: if sampling fails the verdict falls back to
 * "no problems found" and only the rule checks count.
 */

import { LlmSampler, ValidatableSection, ValidationResult } from '../types';
import { errorMessage } from '../services/errors';
import { SYSTEM_PROMPTS } from '../services/templates';
import { CRITICAL_SECTIONS } from './sections';

export type SectionsInput = ReadonlyMap<string, ValidatableSection> | Record<string, ValidatableSection>;

const REVIEW_TEXT_LIMIT = 4000;
const REVIEW_TEMPERATURE = 0.2;
const REVIEW_MAX_TOKENS = 1500;
const SHORT_SECTION_LENGTH = 50;

const QUALITY_PROBLEM_KEYWORDS = ['problem', 'concern', 'poor', 'unclear', 'unprofessional', 'issue'];

export type LlmReview = ValidationResult;

export const OPTIMISTIC_REVIEW: Readonly<LlmReview> = Object.freeze({
  factual_consistency: true,
  completeness: true,
  quality: true,
  issues: [],
  improvements: [],
  requires_improvements: false,
  missing_critical_info: [],
});

function isSectionMap(sections: SectionsInput): sections is ReadonlyMap<string, ValidatableSection> {
  return sections instanceof Map;
}

function sectionEntries(sections: SectionsInput): Array<[string, string]> {
  const entries: Array<[string, ValidatableSection]> = isSectionMap(sections)
    ? [...sections.entries()]
    : Object.entries(sections);

  return entries.map(([name, section]) => [name, typeof section === 'string' ? section : section.content]);
}

export function buildSectionsText(sections: SectionsInput): string {
  return sectionEntries(sections)
    .map(([name, content]) => `## ${name}\n${content}`)
    .join('\n\n');
}

/**
 * Lines of the block that follows `marker`, up to the first blank line.
 * Empty when the marker is absent.
 */
export function extractBlock(response: string, marker: string): string[] {
  const parts = response.split(marker);
  if (parts.length < 2) return [];

  return parts[1]
    .split('\n\n')[0]
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

function hasQualityProblems(lines: string[]): boolean {
  return lines.some((line) => {
    const lower = line.toLowerCase();
    if (lower.startsWith('no ') || lower.includes('no problems') || lower.includes('none')) {
      return false;
    }
    return QUALITY_PROBLEM_KEYWORDS.some((keyword) => lower.includes(keyword));
  });
}

export function parseReview(response: string): LlmReview {
  const lower = response.toLowerCase();

  return {
    factual_consistency: !lower.includes('contradiction'),
    completeness: !lower.includes('missing'),
    quality: !hasQualityProblems(extractBlock(response, 'QUALITY ISSUES:')),
    issues: extractBlock(response, 'FACTUAL CONSISTENCY:'),
    improvements: extractBlock(response, 'IMPROVEMENTS:'),
    requires_improvements: lower.includes('improvement'),
    missing_critical_info: [],
  };
}

export function heuristicIssues(sections: SectionsInput): string[] {
  const entries = sectionEntries(sections);
  const names = new Set(entries.map(([name]) => name));
  const issues: string[] = [];

  for (const critical of CRITICAL_SECTIONS) {
    if (!names.has(critical)) {
      issues.push(`Missing critical section: ${critical}`);
    }
  }

  for (const [name, content] of entries) {
    if (content.length < SHORT_SECTION_LENGTH) {
      issues.push(`Section '${name}' is very short (< ${SHORT_SECTION_LENGTH} chars)`);
    }
  }

  return issues;
}

export function mergeValidation(review: LlmReview, heuristic: string[]): ValidationResult {
  return {
    factual_consistency: review.factual_consistency,
    completeness: review.completeness,
    quality: review.quality,
    issues: [...review.issues, ...heuristic],
    improvements: [...review.improvements],
    requires_improvements: review.requires_improvements || heuristic.length > 0,
    missing_critical_info: [...review.missing_critical_info],
  };
}

/** ISO dates mentioned anywhere in the sections, in order of appearance. */
export function extractDates(sections: SectionsInput): string[] {
  return sectionEntries(sections).flatMap(([, content]) => content.match(/\d{4}-\d{2}-\d{2}/g) ?? []);
}

function buildReviewPrompt(sectionsText: string): string {
  return `Review these Customer Success Snapshot sections for consistency and quality:

${sectionsText.slice(0, REVIEW_TEXT_LIMIT)}

Give your feedback in exactly this format:

FACTUAL CONSISTENCY:
[Contradictions in dates, names, numbers or facts]

COMPLETENESS:
[Critical information that is absent]

QUALITY ISSUES:
[Problems with tone, clarity or professionalism]

IMPROVEMENTS:
[Specific enhancements]

OUTPUT: Structured feedback as shown above`;
}

export class Validator {
  constructor(private readonly sampler: LlmSampler) {}

  async validate(sections: SectionsInput): Promise<ValidationResult> {
    const count = sectionEntries(sections).length;
    console.log(`[Validator] Validating ${count} sections`);

    const dates = extractDates(sections);
    if (dates.length > 0) {
      console.log(`[Validator] Dates referenced: ${dates.join(', ')}`);
    }

    const review = await this.review(buildSectionsText(sections));
    const result = mergeValidation(review, heuristicIssues(sections));

    console.log(
      `[Validator] ${result.issues.length} issues found, requires improvements: ${result.requires_improvements}`
    );
    return result;
  }

  private async review(sectionsText: string): Promise<LlmReview> {
    try {
      const response = await this.sampler.sample({
        prompt: buildReviewPrompt(sectionsText),
        systemPrompt: SYSTEM_PROMPTS.validator,
        temperature: REVIEW_TEMPERATURE,
        maxTokens: REVIEW_MAX_TOKENS,
      });
      return parseReview(response.content);
    } catch (err) {
      console.warn('[Validator] LLM review failed, assuming no problems:', errorMessage(err));
      return { ...OPTIMISTIC_REVIEW, issues: [], improvements: [], missing_critical_info: [] };
    }
  }
}
