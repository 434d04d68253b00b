import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Inject, Injectable, Optional } from '@nestjs/common';

import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { COMMAND_RUNNER, runCommand, type CommandResult, type CommandRunner } from './command-runner';
import type { StepResult, VersionControl } from './collaborator.types';

function toStepResult(step: string, timeoutMs: number, result: CommandResult): StepResult {
  if (result.timedOut) {
    return { ok: false, diagnostic: `git ${step} timed out after ${Math.round(timeoutMs / 1000)}s` };
  }
  if (result.status !== 0) {
    const detail = (result.stderr || result.stdout).trim();
    return { ok: false, diagnostic: `git ${step} failed (${result.status}): ${detail}` };
  }
  return { ok: true };
}

export function cloneUrl(repo: string): string {
  return `https://github.com/${repo}.git`;
}

@Injectable()
export class GitClient implements VersionControl {
  private readonly binary: string;
  private readonly runner: CommandRunner;

  constructor(
    @Inject(APP_CONFIG) config: Pick<AppConfig, 'git'>,
    @Optional() @Inject(COMMAND_RUNNER) runner?: CommandRunner,
  ) {
    this.binary = config.git.binary;
    this.runner = runner ?? runCommand;
  }

  async clone(repo: string, destination: string, timeoutMs: number): Promise<StepResult> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    return this.run('clone', ['clone', cloneUrl(repo), destination], undefined, timeoutMs);
  }

  fetch(workdir: string, branch: string, timeoutMs: number): Promise<StepResult> {
    return this.run('fetch', ['fetch', 'origin', branch], workdir, timeoutMs);
  }

  checkout(workdir: string, branch: string, timeoutMs: number): Promise<StepResult> {
    return this.run('checkout', ['checkout', branch], workdir, timeoutMs);
  }

  pull(workdir: string, branch: string, timeoutMs: number): Promise<StepResult> {
    return this.run('pull', ['pull', '--ff-only', 'origin', branch], workdir, timeoutMs);
  }

  private async run(step: string, args: string[], cwd: string | undefined, timeoutMs: number): Promise<StepResult> {
    try {
      const result = await this.runner(this.binary, args, { cwd, allowFailure: true, timeout: timeoutMs });
      return toStepResult(step, timeoutMs, result);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, diagnostic: `git ${step} could not start: ${message}` };
    }
  }
}
