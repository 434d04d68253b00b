import 'reflect-metadata';
import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type {
  Agent,
  AgentRequest,
  AgentResult,
  CodeHosting,
  PathResolver,
  StepResult,
  VersionControl,
} from '../src/collaborators/collaborator.types';
import type { AppConfig } from '../src/config/app-config';
import { JobFileStore } from '../src/jobs/storage/job-store';
import type { CreateJobInput } from '../src/jobs/job.types';

export const TEST_SECRET = 'test-secret';
export const ALLOWED_USER = 'octo-owner';

export function tempDir(prefix = 'pr-relay-test-'): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(stateRoot: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8787,
    webhookSecret: TEST_SECRET,
    allowedUser: ALLOWED_USER,
    stateRoot,
    repositories: {},
    scanRoots: [],
    worker: { pollIntervalMs: 20, shutdownGraceMs: 200 },
    agent: { kind: 'claude', binary: 'agent', model: 'opus', maxTurns: 50, timeoutMs: 60 * 60_000 },
    git: { binary: 'git', cloneTimeoutMs: 1000, syncTimeoutMs: 1000 },
    github: { binary: 'gh', timeoutMs: 1000 },
    ...overrides,
  };
}

export async function createStore(stateRoot: string): Promise<JobFileStore> {
  const store = new JobFileStore({ stateRoot });
  await store.init();
  return store;
}

export function jobInput(triggerId: string, overrides: Partial<CreateJobInput> = {}): CreateJobInput {
  return {
    repo: 'acme/widgets',
    prNumber: 7,
    branch: 'feature/widgets',
    command: 'action',
    triggerId,
    ...overrides,
  };
}

export class FakePathResolver implements PathResolver {
  constructor(private readonly locations: Record<string, string> = {}) {}

  resolve(repo: string): string | null {
    return this.locations[repo] ?? null;
  }
}

export class FakeVersionControl implements VersionControl {
  readonly calls: string[] = [];
  failures: Partial<Record<'clone' | 'fetch' | 'checkout' | 'pull', string>> = {};

  async clone(repo: string, destination: string): Promise<StepResult> {
    this.calls.push(`clone ${repo} ${destination}`);
    return this.result('clone');
  }

  async fetch(_workdir: string, branch: string): Promise<StepResult> {
    this.calls.push(`fetch ${branch}`);
    return this.result('fetch');
  }

  async checkout(_workdir: string, branch: string): Promise<StepResult> {
    this.calls.push(`checkout ${branch}`);
    return this.result('checkout');
  }

  async pull(_workdir: string, branch: string): Promise<StepResult> {
    this.calls.push(`pull ${branch}`);
    return this.result('pull');
  }

  private result(step: 'clone' | 'fetch' | 'checkout' | 'pull'): StepResult {
    const diagnostic = this.failures[step];
    return diagnostic === undefined ? { ok: true } : { ok: false, diagnostic };
  }
}

export class FakeCodeHosting implements CodeHosting {
  readonly comments: Array<{ repo: string; prNumber: number; body: string }> = [];
  branches: Record<string, string> = {};
  reviewComments: string | Error = '';
  reviewBodies: string | Error = '';
  failPostComment = false;

  async resolveHeadBranch(repo: string, prNumber: number): Promise<string> {
    const branch = this.branches[`${repo}#${prNumber}`];
    if (!branch) {
      throw new Error(`no pull request ${repo}#${prNumber}`);
    }
    return branch;
  }

  async postComment(repo: string, prNumber: number, body: string): Promise<void> {
    if (this.failPostComment) {
      throw new Error('comment rejected');
    }
    this.comments.push({ repo, prNumber, body });
  }

  async fetchReviewComments(): Promise<string> {
    if (this.reviewComments instanceof Error) throw this.reviewComments;
    return this.reviewComments;
  }

  async fetchReviewBodies(): Promise<string> {
    if (this.reviewBodies instanceof Error) throw this.reviewBodies;
    return this.reviewBodies;
  }
}

export class FakeAgent implements Agent {
  readonly requests: AgentRequest[] = [];

  constructor(public result: AgentResult = { exitCode: 0, output: 'all done', timedOut: false }) {}

  async execute(request: AgentRequest): Promise<AgentResult> {
    this.requests.push(request);
    return this.result;
  }
}
