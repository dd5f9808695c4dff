/**
 * Builds the discovery prompt from session excerpts.
 */

import type { Session } from '../sessions/types.js';
import { truncateText } from '../sessions/text-sanitizer.js';
import type { DiscoveryPrompt, EffectiveMode } from './types.js';

export interface PromptOptions {
  mode: EffectiveMode;
  capacity: number;
  knownTitles: string[];
  /** Characters per session excerpt. */
  excerptChars: number;
  maxSessions: number;
  /** Agent the guidance is written for, named in the instructions. */
  agentLabel: string;
}

/** One session's messages joined with spaces and cut to the budget. */
export function sessionExcerpt(session: Session, excerptChars: number): string {
  const joined = session.messages.map((message) => message.text).join(' ');
  return truncateText(joined, excerptChars);
}

function responseShape(mode: EffectiveMode): string {
  const novelty = mode === 'dynamic'
    ? ',\n    "novelty": <integer 1-10, how different this is from the known patterns>'
    : '';
  return `[
  {
    "title": "<short imperative title>",
    "description": "<one sentence>",
    "guidance": ["<instruction for the agent>", "..."],
    "keywords": ["<lowercase phrase users type when this applies>", "..."],
    "examples": ["<verbatim user quote>", "..."]${novelty}
  }
]`;
}

/**
 * Build the prompt for one discovery call.
 *
 * Sessions are taken in the given order (new before updated) up to
 * `maxSessions`.
 */
export function buildDiscoveryPrompt(sessions: Session[], options: PromptOptions): DiscoveryPrompt {
  const excerpts = sessions
    .slice(0, options.maxSessions)
    .map((session, i) => `### Session ${i + 1} (${session.id})\n${sessionExcerpt(session, options.excerptChars)}`);

  const known = options.knownTitles.length > 0
    ? options.knownTitles.map((title) => `- ${title}`).join('\n')
    : '- (none yet)';

  const task = options.mode === 'dynamic'
    ? `Identify up to ${options.capacity} recurring user preferences or corrections that are NOT already covered by the known patterns. Score each one's novelty from 1 (already covered) to 10 (entirely new).`
    : `Identify up to ${options.capacity} recurring user preferences or corrections. Describe each with keywords close to the known patterns they belong to.`;

  const text = `You maintain the standing instructions for the ${options.agentLabel} coding agent.
Below are excerpts of recent user sessions.

${excerpts.join('\n\n')}

## Known patterns
${known}

## Task
${task}
Quote users verbatim in "examples" (1-3 quotes). Give 1-3 guidance lines.

Respond with a JSON array only, no markdown:
${responseShape(options.mode)}`;

  return {
    text,
    mode: options.mode,
    knownTitles: options.knownTitles,
    capacity: options.capacity,
  };
}
