import type { AgentProfile } from '../config/agent-profiles.js';
import { readClaudeHistory } from './claude-history-reader.js';
import { readCodexHistory } from './codex-history-reader.js';
import type { SessionCorpus } from './types.js';

/** Load the session corpus for an agent profile. */
export async function readSessions(profile: AgentProfile): Promise<SessionCorpus> {
  switch (profile.source) {
    case 'codex':
      return readCodexHistory(profile.paths.history);
    case 'claude':
      return readClaudeHistory({
        projectsDir: profile.paths.history,
        historyFile: profile.paths.historyFile,
      });
  }
}
