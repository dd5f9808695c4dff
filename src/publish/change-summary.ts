/**
 * Commit and pull request text for a guidance refresh.
 */

import type { PatternExample } from '../patterns/types.js';
import { truncateText } from '../sessions/text-sanitizer.js';

export interface PatternHighlight {
  title: string;
  count: number;
  example?: PatternExample;
}

/** What one agent's run changed, as reported in commits and PRs. */
export interface AgentChangeSummary {
  agent: string;
  docTitle: string;
  /** Paths relative to the repository root. */
  outputPath: string;
  statePath: string;
  totalSessions: number;
  newSessions: string[];
  updatedSessions: string[];
  newPatternTitles: string[];
  /** Up to three patterns with the highest counts. */
  topPatterns: PatternHighlight[];
}

const PREVIEW_IDS = 5;

/** `chore: refresh agent guidance (codex: 2 new / 1 updated)` */
export function commitSubject(summaries: AgentChangeSummary[]): string {
  const parts = summaries.map(
    (s) => `${s.agent}: ${s.newSessions.length} new / ${s.updatedSessions.length} updated`,
  );
  return `chore: refresh agent guidance (${parts.join(', ')})`;
}

/** Lists new pattern titles; empty when nothing was discovered. */
export function commitBody(summaries: AgentChangeSummary[]): string {
  const lines = summaries.flatMap((s) => s.newPatternTitles.map((title) => `- [${s.agent}] ${title}`));
  return lines.length > 0 ? `New patterns:\n${lines.join('\n')}` : '';
}

export function pullRequestTitle(summaries: AgentChangeSummary[]): string {
  const active = summaries
    .filter((s) => s.newSessions.length > 0 || s.updatedSessions.length > 0)
    .map((s) => s.agent);
  return active.length > 0 ? `Update agent guidance (${active.join(', ')})` : 'Update agent guidance';
}

function previewIds(ids: string[]): string {
  if (ids.length === 0) return 'None';
  const shown = ids.slice(0, PREVIEW_IDS).join(', ');
  return ids.length > PREVIEW_IDS ? `${shown}, ...` : shown;
}

function describeExample(example: PatternExample | undefined): string {
  if (!example) return 'no direct example stored';
  return `session ${example.session_id ?? 'unknown'}: "${truncateText(example.text, 100)}"`;
}

export function pullRequestBody(summaries: AgentChangeSummary[], agentFlags: string): string {
  const summary = summaries.flatMap((s) => [
    `- regenerate ${s.outputPath} with updated guidance across ${s.totalSessions} session(s)`,
    `- update ${s.statePath} to record processed conversations`,
  ]);

  const motivation = summaries.map((s) => {
    const lines = s.topPatterns.length > 0
      ? s.topPatterns.map((p) => `- ${p.title}: ${p.count} session(s); ${describeExample(p.example)}`)
      : ['- No new insights detected'];
    return `### ${s.docTitle}\n${lines.join('\n')}`;
  });

  return [
    '## Summary',
    summary.length > 0 ? summary.join('\n') : '- No changes detected',
    '',
    '## Motivation',
    motivation.join('\n\n'),
    '',
    '## Newly Processed Sessions',
    summaries.map((s) => `- ${s.agent}: ${previewIds(s.newSessions)}`).join('\n'),
    '',
    '## Updated Sessions',
    summaries.map((s) => `- ${s.agent}: ${previewIds(s.updatedSessions)}`).join('\n'),
    '',
    '## Testing',
    `- guidance-updater update --dry-run ${agentFlags}`,
    '',
  ].join('\n');
}
