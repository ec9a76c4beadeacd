import { describe, expect, it } from 'vitest';
import { SnapshotOutput } from '../types';
import { formatSnapshotMarkdown } from './markdown';

function snapshot(overrides: Partial<SnapshotOutput['validation']> = {}): SnapshotOutput {
  return {
    sections: {
      Background: { content: 'The team struggled with manual reporting.', confidence: 0.8, missing_fields: [] },
      Solution: { content: 'An automated dashboard.', confidence: 0.6, missing_fields: [] },
    },
    metadata: {
      avg_confidence: 0.7,
      total_sections: 2,
      entities_extracted: {},
      topics_identified: [],
      low_confidence_sections: [],
    },
    validation: {
      factual_consistency: true,
      completeness: true,
      quality: true,
      issues: [],
      improvements: [],
      requires_improvements: false,
      missing_critical_info: [],
      ...overrides,
    },
    missing_fields: [],
  };
}

describe('formatSnapshotMarkdown', () => {
  it('renders metadata, sections and a passing validation', () => {
    expect(formatSnapshotMarkdown(snapshot())).toBe(
      [
        '# Customer Success Snapshot',
        '',
        '## Metadata',
        '',
        '- **Average Confidence**: 0.70',
        '- **Total Sections**: 2',
        '',
        '## Background',
        '',
        'The team struggled with manual reporting.',
        '',
        '*Confidence: 0.80*',
        '',
        '## Solution',
        '',
        'An automated dashboard.',
        '',
        '*Confidence: 0.60*',
        '',
        '## Validation',
        '',
        'All quality checks passed',
      ].join('\n')
    );
  });

  it('lists validation issues when improvements are needed', () => {
    const markdown = formatSnapshotMarkdown(
      snapshot({ requires_improvements: true, issues: ['Missing critical section: Customer Information', 'Dates disagree'] })
    );

    expect(markdown.endsWith(
      ['## Validation Issues', '', '- Missing critical section: Customer Information', '- Dates disagree'].join('\n')
    )).toBe(true);
  });
});
