/**
 * Commits regenerated guidance to a branch and opens or updates its pull
 * request.
 *
 * Every step runs after the documents and state are on disk. A failure
 * raises PublishError and leaves the working tree as it is; nothing is
 * reset or retried.
 */

import { dirname, relative, resolve } from 'node:path';
import { CommandRunner, findRepoRoot } from './git.js';
import {
  commitBody,
  commitSubject,
  pullRequestBody,
  pullRequestTitle,
} from './change-summary.js';
import type { AgentChangeSummary } from './change-summary.js';

export interface PublishRequest {
  /** Absolute paths of every document and state file to stage. */
  files: string[];
  branch: string;
  baseBranch: string;
  push: boolean;
  /** Absolute summary paths are rewritten relative to the repository root. */
  summaries: AgentChangeSummary[];
  /** `--agent` flags for the testing line of the PR body. */
  agentFlags: string;
}

export type PullRequestAction = 'created' | 'updated' | 'gh-unavailable';

export type PublishOutcome =
  | { status: 'skipped'; reason: 'not-a-repository' | 'no-changes' }
  | { status: 'committed'; branch: string; pushed: boolean; pullRequest?: PullRequestAction; warnings: string[] };

/** Creates the git and gh runner for a repository root. */
export type RunnerFactory = (repoRoot: string) => CommandRunner;

export class Publisher {
  constructor(
    private readonly createRunner: RunnerFactory = (root) => new CommandRunner(root),
    private readonly locateRepo: (dir: string) => Promise<string | null> = findRepoRoot,
  ) {}

  async publish(request: PublishRequest): Promise<PublishOutcome> {
    if (request.files.length === 0) {
      return { status: 'skipped', reason: 'no-changes' };
    }
    const repoRoot = await this.locateRepo(dirname(request.files[0]));
    if (!repoRoot) {
      return { status: 'skipped', reason: 'not-a-repository' };
    }

    const git = this.createRunner(repoRoot);
    const files = request.files.map((file) => relative(repoRoot, file));
    const toRepo = (path: string): string => relative(repoRoot, resolve(repoRoot, path));
    const summaries = request.summaries.map((s) => ({
      ...s,
      outputPath: toRepo(s.outputPath),
      statePath: toRepo(s.statePath),
    }));

    const status = await git.run('status', 'git', ['status', '--porcelain', '--', ...files]);
    if (status.length === 0) {
      return { status: 'skipped', reason: 'no-changes' };
    }

    const warnings: string[] = [];
    await this.ensureBranch(git, request.branch, request.baseBranch, warnings);

    await git.run('stage', 'git', ['add', '--', ...files]);
    const body = commitBody(summaries);
    // --only keeps anything else already staged out of the commit.
    await git.run('commit', 'git', [
      'commit',
      '--only',
      '-m', commitSubject(summaries),
      ...(body ? ['-m', body] : []),
      '--',
      ...files,
    ]);

    if (!request.push) {
      return { status: 'committed', branch: request.branch, pushed: false, warnings };
    }

    if (!(await git.attempt('git', ['push', '--set-upstream', 'origin', request.branch]))) {
      await git.run('push', 'git', ['push', 'origin', request.branch]);
    }

    const pullRequest = await this.syncPullRequest(git, request, summaries);
    return { status: 'committed', branch: request.branch, pushed: true, pullRequest, warnings };
  }

  private async ensureBranch(
    git: CommandRunner,
    branch: string,
    baseBranch: string,
    warnings: string[],
  ): Promise<void> {
    if (!(await git.attempt('git', ['fetch', 'origin']))) {
      warnings.push('could not fetch origin; using local refs');
    }

    const current = await git.run('branch', 'git', ['rev-parse', '--abbrev-ref', 'HEAD']);
    if (current === branch) return;

    if (await git.attempt('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`])) {
      await git.run('checkout', 'git', ['checkout', branch]);
      return;
    }

    await git.run('checkout', 'git', ['checkout', baseBranch]);
    if (!(await git.attempt('git', ['pull', '--ff-only', 'origin', baseBranch]))) {
      warnings.push(`could not fast-forward ${baseBranch}; branching from local state`);
    }
    await git.run('checkout', 'git', ['checkout', '-B', branch]);
  }

  private async syncPullRequest(
    git: CommandRunner,
    request: PublishRequest,
    summaries: AgentChangeSummary[],
  ): Promise<PullRequestAction> {
    if (!(await git.attempt('gh', ['--version']))) {
      return 'gh-unavailable';
    }

    const title = pullRequestTitle(summaries);
    const body = pullRequestBody(summaries, request.agentFlags);

    const state = await git.capture('gh', ['pr', 'view', request.branch, '--json', 'state', '--jq', '.state']);
    if (state === 'OPEN') {
      await git.run('pull-request', 'gh', ['pr', 'edit', request.branch, '--title', title, '--body', body]);
      return 'updated';
    }

    await git.run('pull-request', 'gh', [
      'pr', 'create',
      '--base', request.baseBranch,
      '--head', request.branch,
      '--title', title,
      '--body', body,
    ]);
    return 'created';
  }
}
