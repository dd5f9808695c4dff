/**
 * The operator-owned block of a guidance document.
 *
 * Everything between the profile's start and end markers belongs to the
 * operator and is carried into every regenerated document unchanged.
 */

import type { ManualSectionSpec } from '../config/agent-profiles.js';

/** Text strictly between the markers, or null when the pair is absent. */
export function extractManualBody(document: string, section: ManualSectionSpec): string | null {
  const start = document.indexOf(section.startMarker);
  if (start === -1) return null;
  const bodyStart = start + section.startMarker.length;
  const end = document.indexOf(section.endMarker, bodyStart);
  if (end === -1) return null;
  return document.slice(bodyStart, end);
}

/** Body for a fresh block holding `lines`. */
export function manualBodyFromLines(lines: readonly string[]): string {
  return lines.length > 0 ? `\n\n${lines.join('\n')}\n\n` : '\n';
}

/**
 * Manual body for the next render.
 *
 * - an existing block is reused byte for byte
 * - a hand-written document (not headed by `docTitle`) without markers
 *   donates its bullet lines
 * - otherwise the profile's default lines
 */
export function resolveManualBody(
  existing: string | null,
  section: ManualSectionSpec,
  docTitle: string,
): string {
  if (existing === null) return manualBodyFromLines(section.defaultLines);

  const body = extractManualBody(existing, section);
  if (body !== null) return body;

  const generated = existing.trimStart().startsWith(`# ${docTitle}`);
  if (!generated) {
    const bullets = existing
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.startsWith('-'));
    if (bullets.length > 0) return manualBodyFromLines(bullets);
  }
  return manualBodyFromLines(section.defaultLines);
}
