import { Inject, Injectable, Optional } from '@nestjs/common';

import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { COMMAND_RUNNER, runCommand, type CommandRunner } from './command-runner';
import type { CodeHosting } from './collaborator.types';

const REVIEW_COMMENTS_JQ =
  '.[] | "- \\(.path):\\(.line // .original_line // "?") @\\(.user.login): \\(.body)"';
const REVIEW_BODIES_JQ =
  '.[] | select(.body != null and .body != "") | "- @\\(.user.login) (\\(.state)): \\(.body)"';

/**
 * Code-hosting adapter backed by the GitHub CLI. Every call is bounded by the
 * configured `gh` timeout and rejects on failure.
 */
@Injectable()
export class GitHubCli implements CodeHosting {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(
    @Inject(APP_CONFIG) config: Pick<AppConfig, 'github'>,
    @Optional() @Inject(COMMAND_RUNNER) runner?: CommandRunner,
  ) {
    this.binary = config.github.binary;
    this.timeoutMs = config.github.timeoutMs;
    this.runner = runner ?? runCommand;
  }

  async resolveHeadBranch(repo: string, prNumber: number): Promise<string> {
    const output = await this.gh([
      'pr',
      'view',
      String(prNumber),
      '--repo',
      repo,
      '--json',
      'headRefName',
      '--jq',
      '.headRefName',
    ]);
    const branch = output.trim();
    if (!branch) {
      throw new Error(`no head branch reported for ${repo}#${prNumber}`);
    }
    return branch;
  }

  async postComment(repo: string, prNumber: number, body: string): Promise<void> {
    await this.gh(['pr', 'comment', String(prNumber), '--repo', repo, '--body', body]);
  }

  async fetchReviewComments(repo: string, prNumber: number): Promise<string> {
    const output = await this.gh([
      'api',
      `repos/${repo}/pulls/${prNumber}/comments`,
      '--paginate',
      '--jq',
      REVIEW_COMMENTS_JQ,
    ]);
    return output.trim();
  }

  async fetchReviewBodies(repo: string, prNumber: number): Promise<string> {
    const output = await this.gh([
      'api',
      `repos/${repo}/pulls/${prNumber}/reviews`,
      '--paginate',
      '--jq',
      REVIEW_BODIES_JQ,
    ]);
    return output.trim();
  }

  private async gh(args: string[]): Promise<string> {
    const result = await this.runner(this.binary, args, { timeout: this.timeoutMs });
    return result.stdout;
  }
}
