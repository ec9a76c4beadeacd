/**
 * Snapshot section catalogue, in output order. Executive Summary is last and
 * is synthesized from the other ten.
 */

import { SectionName } from '../types';
import { SectionTemplateKey, SystemPromptKey } from '../services/templates';

export interface SectionDefinition {
  name: SectionName;
  templateKey: SectionTemplateKey;
  systemPromptKey: SystemPromptKey;
}

export const EXECUTIVE_SUMMARY: SectionName = 'Executive Summary';

export const SECTION_CATALOGUE: readonly SectionDefinition[] = [
  { name: 'Customer Information', templateKey: 'customer_information', systemPromptKey: 'customer_information' },
  { name: 'Background', templateKey: 'background', systemPromptKey: 'background' },
  { name: 'Solution', templateKey: 'solution', systemPromptKey: 'solution' },
  { name: 'Engagement Details', templateKey: 'engagement_details', systemPromptKey: 'engagement' },
  { name: 'Results and Achievements', templateKey: 'results_achievements', systemPromptKey: 'results' },
  { name: 'Adoption and Usage', templateKey: 'adoption_usage', systemPromptKey: 'adoption' },
  { name: 'Financial Impact', templateKey: 'financial_impact', systemPromptKey: 'financial' },
  { name: 'Long-Term Impact', templateKey: 'long_term_impact', systemPromptKey: 'strategic' },
  { name: 'Visuals', templateKey: 'visuals', systemPromptKey: 'visuals' },
  { name: 'Additional Commentary', templateKey: 'additional_commentary', systemPromptKey: 'commentary' },
  { name: EXECUTIVE_SUMMARY, templateKey: 'executive_summary', systemPromptKey: 'executive_summary' },
];

export const CRITICAL_SECTIONS: readonly SectionName[] = ['Customer Information', 'Background', 'Solution'];

export function sectionSlug(name: string): string {
  return name.toLowerCase().replace(/ /g, '_');
}

export function findSection(name: string): SectionDefinition | undefined {
  return SECTION_CATALOGUE.find((s) => s.name === name);
}

export function contentSections(): SectionDefinition[] {
  return SECTION_CATALOGUE.filter((s) => s.name !== EXECUTIVE_SUMMARY);
}
