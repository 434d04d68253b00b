import { Inject, Injectable, Optional } from '@nestjs/common';

import { APP_CONFIG, type AgentKind, type AppConfig } from '../config/app-config';
import { assertNever } from '../jobs/job.types';
import { COMMAND_RUNNER, runCommand, type CommandRunner } from './command-runner';
import type { Agent, AgentRequest, AgentResult } from './collaborator.types';

/**
 * Non-interactive invocation for each supported agent CLI. Only `claude`
 * takes a turn budget.
 */
export function buildAgentArgs(
  kind: AgentKind,
  request: Pick<AgentRequest, 'instruction' | 'maxTurns'>,
  model: string,
): string[] {
  switch (kind) {
    case 'claude':
      return [
        '--dangerously-skip-permissions',
        '--model',
        model,
        '--max-turns',
        String(request.maxTurns),
        '-p',
        request.instruction,
      ];
    case 'opencode':
      return ['--model', model, '-p', request.instruction, '-q'];
    default:
      return assertNever(kind);
  }
}

/**
 * Runs the coding agent CLI non-interactively inside the working copy.
 */
@Injectable()
export class AgentCliRunner implements Agent {
  private readonly kind: AgentKind;
  private readonly binary: string;
  private readonly model: string;
  private readonly runner: CommandRunner;

  constructor(
    @Inject(APP_CONFIG) config: Pick<AppConfig, 'agent'>,
    @Optional() @Inject(COMMAND_RUNNER) runner?: CommandRunner,
  ) {
    this.kind = config.agent.kind;
    this.binary = config.agent.binary;
    this.model = config.agent.model;
    this.runner = runner ?? runCommand;
  }

  async execute(request: AgentRequest): Promise<AgentResult> {
    const result = await this.runner(this.binary, buildAgentArgs(this.kind, request, this.model), {
      cwd: request.workdir,
      allowFailure: true,
      timeout: request.timeoutMs,
    });

    const output = [result.stdout, result.stderr].filter((part) => part.length > 0).join('\n');
    return {
      exitCode: result.status,
      output,
      timedOut: result.timedOut,
    };
  }
}
