import { describe, expect, it } from 'vitest';
import { FakeSampler, SAMPLE_VTT, SECTION_TEXT, pipelineResponder, testSettings } from '../testing/fakes';
import { SnapshotError } from '../services/errors';
import { SYSTEM_PROMPTS } from '../services/templates';
import { LlmResponse, LlmSampler, SampleRequest, SectionSet, ValidationResult } from '../types';
import { SnapshotOrchestrator, assembleSnapshot, buildAllSectionsText } from './orchestrator';
import { createSectionResult } from './section-generator';
import { OPTIMISTIC_REVIEW } from './validator';
import { SECTION_CATALOGUE } from './sections';

const ALL_SECTION_NAMES = SECTION_CATALOGUE.map((s) => s.name);

const ALL_MISSING_FIELDS = [
  'company_name',
  'industry',
  'location',
  'primary_contact',
  'start_date',
  'completion_date',
  'user_count',
  'adoption_rate',
  'cost_savings',
  'roi_percentage',
];

const cleanValidation: ValidationResult = { ...OPTIMISTIC_REVIEW, issues: [], improvements: [], missing_critical_info: [] };

function orchestratorWith(sampler: FakeSampler, env: Record<string, string> = {}) {
  return new SnapshotOrchestrator({ sampler, settings: testSettings(env) });
}

/** Holds every call open briefly and records how many were in flight at once. */
class SlowSampler implements LlmSampler {
  inFlight = 0;
  peak = 0;
  private readonly inner = new FakeSampler(pipelineResponder());

  async sample(request: SampleRequest): Promise<LlmResponse> {
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return await this.inner.sample(request);
    } finally {
      this.inFlight--;
    }
  }
}

function failing(message: string) {
  return () => {
    throw new Error(message);
  };
}

describe('assembleSnapshot', () => {
  it('averages confidence and collects missing fields', () => {
    const sections: SectionSet = new Map([
      ['A', createSectionResult('A', 'alpha', 0.8, ['location'])],
      ['B', createSectionResult('B', 'beta', 0.7)],
    ]);

    const snapshot = assembleSnapshot(sections, { entities: {}, topics: [] }, cleanValidation);

    expect(snapshot.metadata.avg_confidence).toBeCloseTo(0.75, 10);
    expect(snapshot.metadata.total_sections).toBe(2);
    expect(snapshot.missing_fields).toEqual(['location']);
    expect(snapshot.sections.A).toEqual({ content: 'alpha', confidence: 0.8, missing_fields: ['location'] });
  });

  it('lists each missing field once', () => {
    const sections: SectionSet = new Map([
      ['A', createSectionResult('A', 'alpha', 0.8, ['location', 'industry'])],
      ['B', createSectionResult('B', 'beta', 0.7, ['industry'])],
    ]);

    expect(assembleSnapshot(sections, { entities: {}, topics: [] }, cleanValidation).missing_fields).toEqual([
      'location',
      'industry',
    ]);
  });

  it('reports zero confidence for no sections', () => {
    const snapshot = assembleSnapshot(new Map(), { entities: { ORG: ['Acme'] }, topics: ['sales'] }, cleanValidation);

    expect(snapshot.metadata).toEqual({
      avg_confidence: 0,
      total_sections: 0,
      entities_extracted: { ORG: ['Acme'] },
      topics_identified: ['sales'],
      low_confidence_sections: [],
    });
  });
});

describe('buildAllSectionsText', () => {
  it('joins every section except the executive summary', () => {
    const sections: SectionSet = new Map([
      ['Background', createSectionResult('Background', 'The problem.', 1)],
      ['Executive Summary', createSectionResult('Executive Summary', 'Summary.', 1)],
      ['Solution', createSectionResult('Solution', 'The product.', 1)],
    ]);

    expect(buildAllSectionsText(sections)).toBe('## Background\nThe problem.\n\n## Solution\nThe product.');
  });
});

describe('SnapshotOrchestrator', () => {
  describe.each([
    ['sequential', 'false'],
    ['parallel', 'true'],
  ])('%s generation', (_mode, parallel) => {
    const env = { WORKFLOW_PARALLEL_SECTION_GENERATION: parallel };

    it('produces all eleven sections in catalogue order', async () => {
      const sampler = new FakeSampler(pipelineResponder());

      const snapshot = await orchestratorWith(sampler, env).generate(SAMPLE_VTT, 'acme-kickoff.vtt');

      expect(Object.keys(snapshot.sections)).toEqual(ALL_SECTION_NAMES);
      expect(snapshot.metadata.total_sections).toBe(11);
      expect(snapshot.sections['Customer Information'].confidence).toBeCloseTo(0.7, 10);
      expect(snapshot.sections['Financial Impact'].confidence).toBeCloseTo(0.8, 10);
      expect(snapshot.sections.Background).toEqual({ content: SECTION_TEXT, confidence: 1, missing_fields: [] });
      expect(snapshot.metadata.avg_confidence).toBeCloseTo(10.5 / 11, 10);
      expect(snapshot.missing_fields).toEqual(ALL_MISSING_FIELDS);
      expect(snapshot.metadata.entities_extracted.ORG).toEqual(['Acme Corporation']);
      expect(snapshot.metadata.low_confidence_sections).toEqual([]);
      expect(snapshot.validation).toEqual({ ...cleanValidation, issues: ['All facts align.'] });

      // analysis, ten sections, review, summary, review
      expect(sampler.requests).toHaveLength(14);
    });

    it('replaces a failed section with a zero-confidence placeholder', async () => {
      const sampler = new FakeSampler(pipelineResponder({ financial: failing('upstream overloaded') }));

      const snapshot = await orchestratorWith(sampler, env).generate(SAMPLE_VTT);

      expect(Object.keys(snapshot.sections)).toEqual(ALL_SECTION_NAMES);
      expect(snapshot.sections['Financial Impact']).toEqual({
        content: '[Section generation failed: upstream overloaded]',
        confidence: 0,
        missing_fields: [],
      });
      expect(snapshot.sections.Background.confidence).toBe(1);
      expect(snapshot.missing_fields).toEqual(ALL_MISSING_FIELDS.slice(0, 8));
      expect(snapshot.metadata.low_confidence_sections).toEqual(['Financial Impact']);
      expect(snapshot.validation.requires_improvements).toBe(true);
      expect(snapshot.validation.issues).toContain("Section 'Financial Impact' is very short (< 50 chars)");
    });
  });

  it('launches all ten section calls at once when parallel', async () => {
    const sampler = new SlowSampler();

    await new SnapshotOrchestrator({
      sampler,
      settings: testSettings({ WORKFLOW_PARALLEL_SECTION_GENERATION: 'true' }),
    }).generate(SAMPLE_VTT);

    expect(sampler.peak).toBe(10);
    expect(sampler.inFlight).toBe(0);
  });

  it('keeps one call in flight at a time when sequential', async () => {
    const sampler = new SlowSampler();

    await new SnapshotOrchestrator({ sampler, settings: testSettings() }).generate(SAMPLE_VTT);

    expect(sampler.peak).toBe(1);
  });

  it('generates sections one at a time in catalogue order when sequential', async () => {
    const sampler = new FakeSampler(pipelineResponder());

    await orchestratorWith(sampler).generate(SAMPLE_VTT);

    const sectionPrompts = SECTION_CATALOGUE.slice(0, 10).map((s) => SYSTEM_PROMPTS[s.systemPromptKey]);
    expect(sampler.requests.slice(1, 11).map((r) => r.systemPrompt)).toEqual(sectionPrompts);
    expect(sampler.requests.slice(1, 11).every((r) => r.maxTokens === 1500 && r.temperature === 0.3)).toBe(true);
  });

  it('builds the executive summary from the other sections', async () => {
    const sampler = new FakeSampler(pipelineResponder());

    await orchestratorWith(sampler).generate(SAMPLE_VTT);

    const [summaryRequest] = sampler.requestsFor('executive_summary');
    expect(summaryRequest.prompt).toContain(`## Customer Information\n${SECTION_TEXT}`);
    expect(summaryRequest.prompt).toContain(`## Additional Commentary\n${SECTION_TEXT}`);
    expect(summaryRequest.prompt).not.toContain('## Executive Summary');
    expect(sampler.requestsFor('validator')).toHaveLength(2);
  });

  it('rejects empty input before calling the LLM', async () => {
    const sampler = new FakeSampler(pipelineResponder());

    const error = await orchestratorWith(sampler).generate('  \n ').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SnapshotError);
    expect(error).toMatchObject({ code: 'INVALID_INPUT' });
    expect(sampler.requests).toHaveLength(0);
  });

  it('passes parse errors through unchanged', async () => {
    const sampler = new FakeSampler(pipelineResponder());

    await expect(orchestratorWith(sampler).generate('not a transcript', 'bad.vtt')).rejects.toMatchObject({
      code: 'PARSE_ERROR',
      message: "Invalid VTT format: content must start with 'WEBVTT'",
    });
    expect(sampler.requests).toHaveLength(0);
  });

  it('reports any parser failure as a parse error', async () => {
    const orchestrator = new SnapshotOrchestrator({
      sampler: new FakeSampler(pipelineResponder()),
      settings: testSettings(),
      parser: () => {
        throw new Error('unreadable captions');
      },
    });

    await expect(orchestrator.generate('WEBVTT', 'call.vtt')).rejects.toMatchObject({
      code: 'PARSE_ERROR',
      message: 'unreadable captions',
      details: { filename: 'call.vtt' },
    });
  });

  it('wraps other stage failures as internal errors', async () => {
    const orchestrator = new SnapshotOrchestrator({
      sampler: new FakeSampler(pipelineResponder()),
      settings: testSettings(),
      analyzer: {
        analyze: async () => {
          throw new TypeError('nlp down');
        },
      },
    });

    await expect(orchestrator.generate(SAMPLE_VTT, 'call.vtt')).rejects.toMatchObject({
      code: 'INTERNAL_ERROR',
      message: 'Snapshot generation failed: nlp down',
      details: { filename: 'call.vtt', error: 'nlp down', error_type: 'TypeError' },
    });
  });

  it('fails the whole request when the summary cannot be generated', async () => {
    const sampler = new FakeSampler(pipelineResponder({ executive_summary: failing('summary unavailable') }));

    await expect(orchestratorWith(sampler).generate(SAMPLE_VTT)).rejects.toMatchObject({
      code: 'INTERNAL_ERROR',
      message: 'Snapshot generation failed: summary unavailable',
    });
  });

  it('improves nothing but reports sections under the threshold', () => {
    const orchestrator = orchestratorWith(new FakeSampler(), { WORKFLOW_MIN_CONFIDENCE_THRESHOLD: '0.75' });
    const sections: SectionSet = new Map([
      ['Background', createSectionResult('Background', 'text', 0.7)],
      ['Solution', createSectionResult('Solution', 'text', 0.75)],
    ]);

    const outcome = orchestrator.improveSections(sections, {
      ...cleanValidation,
      issues: ['Too vague'],
      requires_improvements: true,
    });

    expect(outcome.sections).toBe(sections);
    expect(outcome.lowConfidenceSections).toEqual(['Background']);
  });
});
