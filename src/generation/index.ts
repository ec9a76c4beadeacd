/**
 * Generation Module
 *
 * The snapshot pipeline:
 * - Orchestrator: sequences the stages and owns the fan-out policy
 * - Section Generator: one section per call, scored and checked for gaps
 * - Validator: rule checks merged with a Claude review
 */

export { SnapshotOrchestrator, assembleSnapshot, buildAllSectionsText } from './orchestrator';
export type { OrchestratorOptions, OrchestratorSettings, ImproveOutcome } from './orchestrator';
export {
  SectionGenerator,
  createSectionResult,
  errorPlaceholder,
  findMissingFields,
  normalizeAnalysis,
  scoreConfidence,
} from './section-generator';
export { Validator } from './validator';
export type { SectionsInput } from './validator';
export { SECTION_CATALOGUE, EXECUTIVE_SUMMARY, findSection, sectionSlug } from './sections';
