/**
 * Renders a guidance document from pattern records.
 *
 * Output is a pure function of its input: the same patterns, profile and
 * manual body always produce the same bytes.
 */

import type { AgentProfile } from '../config/agent-profiles.js';
import type { PatternRecord } from '../patterns/types.js';
import { collapseWhitespace, truncateText } from '../sessions/text-sanitizer.js';

export const CLOSING_PARAGRAPH =
  'Regularly revisit this document as new patterns emerge. The automation in this repository will ' +
  'refresh guidance when new sessions highlight fresh themes.';

export interface RenderInput {
  profile: Pick<AgentProfile, 'docTitle' | 'docIntro' | 'calloutHeader' | 'staticCallouts' | 'manualSection'>;
  patterns: PatternRecord[];
  /** Static identifiers in catalog order. */
  staticOrder: string[];
  /** Raw text between the manual markers. */
  manualBody: string;
  quoteLength: number;
}

function compareTitles(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Static patterns in catalog order (unknown static ids after, by id), then
 * dynamic ones by count descending, then title.
 */
export function orderPatterns(patterns: PatternRecord[], staticOrder: string[]): PatternRecord[] {
  const rank = new Map(staticOrder.map((id, index) => [id, index]));
  const statics = patterns
    .filter((p) => p.origin === 'static')
    .sort((a, b) =>
      (rank.get(a.identifier) ?? rank.size) - (rank.get(b.identifier) ?? rank.size)
      || compareTitles(a.identifier, b.identifier));
  const dynamics = patterns
    .filter((p) => p.origin === 'dynamic')
    .sort((a, b) => b.occurrence_count - a.occurrence_count || compareTitles(a.title, b.title));
  return [...statics, ...dynamics];
}

function renderPattern(pattern: PatternRecord, index: number, quoteLength: number): string[] {
  const count = String(pattern.occurrence_count);
  const lines = [`## ${index}. ${pattern.title}`];
  for (const bullet of pattern.bullets) {
    lines.push(`- ${bullet.replaceAll('{count}', count)}`);
  }
  lines.push(`- _Observed in ${count} session(s)._`);
  for (const example of pattern.examples) {
    lines.push(`- Example: "${truncateText(collapseWhitespace(example.text), quoteLength)}"`);
  }
  return lines;
}

export function renderGuidanceDocument(input: RenderInput): string {
  const { profile } = input;
  const lines: string[] = [`# ${profile.docTitle}`, '', profile.docIntro, ''];

  orderPatterns(input.patterns, input.staticOrder).forEach((pattern, i) => {
    lines.push(...renderPattern(pattern, i + 1, input.quoteLength), '');
  });

  lines.push(CLOSING_PARAGRAPH);

  if (profile.staticCallouts.length > 0) {
    lines.push('', profile.calloutHeader, '');
    for (const callout of profile.staticCallouts) {
      lines.push(`- ${callout}`);
    }
  }

  const { manualSection } = profile;
  lines.push(
    '',
    manualSection.header,
    '',
    `${manualSection.startMarker}${input.manualBody}${manualSection.endMarker}`,
  );

  return `${lines.join('\n')}\n`;
}
