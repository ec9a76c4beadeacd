/**
 * Snapshot Orchestrator
 *
 * Runs the pipeline for one transcript:
 * parse → analyze → generate → validate → improve → summarize → re-validate → assemble
 *
 * Individual section failures become zero-confidence placeholders; any other
 * stage failure fails the whole request.
 */

import {
  AnalysisResult,
  LlmSampler,
  SectionResult,
  SectionSet,
  SnapshotOutput,
  TranscriptData,
  ValidationResult,
} from '../types';
import { Settings } from '../services/config';
import { SnapshotError, errorMessage, errorType, isSnapshotError } from '../services/errors';
import { SECTION_TEMPLATES, SYSTEM_PROMPTS } from '../services/templates';
import { TranscriptParser, parseVttContent } from '../services/transcript';
import { SnapshotAnalyzer, TranscriptAnalyzer } from '../services/analyzer';
import { SectionGenerator, errorPlaceholder } from './section-generator';
import { EXECUTIVE_SUMMARY, SectionDefinition, contentSections, findSection } from './sections';
import { Validator } from './validator';

export type OrchestratorSettings = Pick<Settings, 'llm' | 'workflow' | 'nlp'>;

export interface OrchestratorOptions {
  sampler: LlmSampler;
  settings: OrchestratorSettings;
  parser?: TranscriptParser;
  analyzer?: TranscriptAnalyzer;
}

export interface ImproveOutcome {
  sections: SectionSet;
  lowConfidenceSections: string[];
}

// ============================================
// PURE STAGES
// ============================================

/** `## name\ncontent` blocks for every section except the Executive Summary. */
export function buildAllSectionsText(sections: SectionSet): string {
  return [...sections.values()]
    .filter((section) => section.section_name !== EXECUTIVE_SUMMARY)
    .map((section) => `## ${section.section_name}\n${section.content}`)
    .join('\n\n');
}

export function assembleSnapshot(
  sections: SectionSet,
  analysis: Pick<AnalysisResult, 'entities' | 'topics'>,
  validation: ValidationResult,
  lowConfidenceSections: string[] = []
): SnapshotOutput {
  const missing = new Set<string>();
  let totalConfidence = 0;
  const output: SnapshotOutput['sections'] = {};

  for (const [name, section] of sections) {
    section.missing_fields.forEach((field) => missing.add(field));
    totalConfidence += section.confidence;
    output[name] = {
      content: section.content,
      confidence: section.confidence,
      missing_fields: [...section.missing_fields],
    };
  }

  return {
    sections: output,
    metadata: {
      avg_confidence: sections.size > 0 ? totalConfidence / sections.size : 0,
      total_sections: sections.size,
      entities_extracted: analysis.entities,
      topics_identified: analysis.topics,
      low_confidence_sections: lowConfidenceSections,
    },
    validation,
    missing_fields: [...missing],
  };
}

// ============================================
// ORCHESTRATOR
// ============================================

export class SnapshotOrchestrator {
  private readonly sampler: LlmSampler;
  private readonly settings: OrchestratorSettings;
  private readonly parser: TranscriptParser;
  private readonly analyzer: TranscriptAnalyzer;
  private readonly validator: Validator;

  constructor(options: OrchestratorOptions) {
    this.sampler = options.sampler;
    this.settings = options.settings;
    this.parser = options.parser ?? parseVttContent;
    this.analyzer = options.analyzer ?? new SnapshotAnalyzer(options.sampler, options.settings);
    this.validator = new Validator(options.sampler);
  }

  async generate(vttContent: string, filename = 'transcript.vtt'): Promise<SnapshotOutput> {
    if (!vttContent || !vttContent.trim()) {
      throw new SnapshotError('INVALID_INPUT', 'vtt_content is required and must not be empty', { filename });
    }

    try {
      return await this.run(vttContent, filename);
    } catch (err) {
      if (isSnapshotError(err) && (err.code === 'INVALID_INPUT' || err.code === 'PARSE_ERROR')) {
        throw err;
      }

      console.error(`[Orchestrator] Snapshot generation failed for ${filename}:`, errorMessage(err));
      throw new SnapshotError(
        'INTERNAL_ERROR',
        `Snapshot generation failed: ${errorMessage(err)}`,
        { filename, error: errorMessage(err), error_type: errorType(err) },
        { cause: err }
      );
    }
  }

  private async run(vttContent: string, filename: string): Promise<SnapshotOutput> {
    console.log(`[Orchestrator] Starting snapshot generation for ${filename}`);

    // 1. Parse
    const transcript = this.parse(vttContent, filename);

    // 2. Analyze
    const analysis = await this.analyzer.analyze(transcript.text, transcript);

    // 3. Generate
    const generated = await this.generateSections(transcript, analysis);

    // 4. Validate
    const firstPass = await this.validator.validate(generated);

    // 5. Improve
    let improved: ImproveOutcome = { sections: generated, lowConfidenceSections: [] };
    if (firstPass.requires_improvements) {
      improved = this.improveSections(generated, firstPass);
    }

    // 6. Summarize
    const summary = await this.synthesizeSummary(improved.sections);
    const allSections: SectionSet = new Map(improved.sections);
    allSections.set(EXECUTIVE_SUMMARY, summary);

    // 7. Re-validate
    const validation = await this.validator.validate(allSections);

    // 8. Assemble
    const snapshot = assembleSnapshot(allSections, analysis, validation, improved.lowConfidenceSections);

    console.log(
      `[Orchestrator] Snapshot complete: ${snapshot.metadata.total_sections} sections, avg confidence ${snapshot.metadata.avg_confidence.toFixed(2)}, ${validation.issues.length} issues`
    );
    return snapshot;
  }

  private parse(vttContent: string, filename: string): TranscriptData {
    try {
      return this.parser(vttContent, filename);
    } catch (err) {
      if (isSnapshotError(err) && err.code === 'PARSE_ERROR') throw err;

      throw new SnapshotError(
        'PARSE_ERROR',
        errorMessage(err),
        { filename, ...(isSnapshotError(err) ? err.details : {}) },
        { cause: err }
      );
    }
  }

  private createGenerator(definition: SectionDefinition): SectionGenerator {
    return new SectionGenerator({
      sectionName: definition.name,
      systemPrompt: SYSTEM_PROMPTS[definition.systemPromptKey],
      template: SECTION_TEMPLATES[definition.templateKey].template,
      sampler: this.sampler,
      maxTokens: this.settings.llm.maxTokensPerSection,
    });
  }

  /**
   * Generates the ten content sections. In parallel mode every call is started
   * at once and all are awaited before results are combined; failures never
   * cancel siblings in either mode.
   */
  async generateSections(transcript: TranscriptData, analysis: AnalysisResult): Promise<SectionSet> {
    const definitions = contentSections();
    const parallel = this.settings.workflow.parallelSectionGeneration;
    const run = (definition: SectionDefinition): Promise<SectionResult> =>
      this.createGenerator(definition).generate(transcript.text, { kind: 'analysis', result: analysis });

    console.log(`[Orchestrator] Generating ${definitions.length} sections (${parallel ? 'parallel' : 'sequential'})`);

    const sections: SectionSet = new Map();

    if (parallel) {
      const settled = await Promise.allSettled(definitions.map(run));
      settled.forEach((outcome, i) => {
        const name = definitions[i].name;
        sections.set(name, outcome.status === 'fulfilled' ? outcome.value : this.placeholder(name, outcome.reason));
      });
    } else {
      for (const definition of definitions) {
        try {
          sections.set(definition.name, await run(definition));
        } catch (err) {
          sections.set(definition.name, this.placeholder(definition.name, err));
        }
      }
    }

    return sections;
  }

  private placeholder(sectionName: string, err: unknown): SectionResult {
    console.error(`[Orchestrator] Section ${sectionName} failed:`, errorMessage(err));
    return errorPlaceholder(sectionName, errorMessage(err));
  }

  /**
   * Reports sections under the confidence threshold. Sections are returned
   * unchanged; no regeneration happens here.
   */
  improveSections(sections: SectionSet, validation: ValidationResult): ImproveOutcome {
    for (const issue of validation.issues) {
      console.log(`[Orchestrator] Validation issue: ${issue}`);
    }

    const threshold = this.settings.workflow.minConfidenceThreshold;
    const lowConfidenceSections = [...sections.values()]
      .filter((section) => section.confidence < threshold)
      .map((section) => section.section_name);

    if (lowConfidenceSections.length > 0) {
      console.warn(
        `[Orchestrator] ${lowConfidenceSections.length} sections below confidence ${threshold}: ${lowConfidenceSections.join(', ')}`
      );
    }

    return { sections, lowConfidenceSections };
  }

  async synthesizeSummary(sections: SectionSet): Promise<SectionResult> {
    const definition = findSection(EXECUTIVE_SUMMARY);
    if (!definition) {
      throw new Error('Executive Summary is missing from the section catalogue');
    }

    return this.createGenerator(definition).generate(
      '',
      { kind: 'map', values: {} },
      { all_sections: buildAllSectionsText(sections) }
    );
  }
}
