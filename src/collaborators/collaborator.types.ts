export const VERSION_CONTROL = 'VERSION_CONTROL';
export const CODE_HOSTING = 'CODE_HOSTING';
export const AGENT = 'AGENT';
export const PATH_RESOLVER = 'PATH_RESOLVER';

export type StepResult = { ok: true } | { ok: false; diagnostic: string };

export interface VersionControl {
  clone(repo: string, destination: string, timeoutMs: number): Promise<StepResult>;
  fetch(workdir: string, branch: string, timeoutMs: number): Promise<StepResult>;
  checkout(workdir: string, branch: string, timeoutMs: number): Promise<StepResult>;
  pull(workdir: string, branch: string, timeoutMs: number): Promise<StepResult>;
}

export interface CodeHosting {
  resolveHeadBranch(repo: string, prNumber: number): Promise<string>;
  postComment(repo: string, prNumber: number, body: string): Promise<void>;
  fetchReviewComments(repo: string, prNumber: number): Promise<string>;
  fetchReviewBodies(repo: string, prNumber: number): Promise<string>;
}

export interface AgentRequest {
  instruction: string;
  workdir: string;
  maxTurns: number;
  timeoutMs: number;
}

export interface AgentResult {
  exitCode: number;
  output: string;
  timedOut: boolean;
}

export interface Agent {
  execute(request: AgentRequest): Promise<AgentResult>;
}

export interface PathResolver {
  resolve(repo: string): string | null;
}
