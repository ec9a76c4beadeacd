/**
 * Markdown rendering for snapshots
 */

import { SnapshotOutput } from '../types';

export function formatSnapshotMarkdown(snapshot: SnapshotOutput): string {
  const lines: string[] = ['# Customer Success Snapshot\n'];

  lines.push('## Metadata\n');
  lines.push(`- **Average Confidence**: ${snapshot.metadata.avg_confidence.toFixed(2)}`);
  lines.push(`- **Total Sections**: ${snapshot.metadata.total_sections}`);
  lines.push('');

  for (const [name, section] of Object.entries(snapshot.sections)) {
    lines.push(`## ${name}\n`);
    lines.push(section.content);
    lines.push('');
    lines.push(`*Confidence: ${section.confidence.toFixed(2)}*`);
    lines.push('');
  }

  if (!snapshot.validation.requires_improvements) {
    lines.push('## Validation\n');
    lines.push('All quality checks passed');
  } else {
    lines.push('## Validation Issues\n');
    for (const issue of snapshot.validation.issues) {
      lines.push(`- ${issue}`);
    }
  }

  return lines.join('\n');
}
