import { readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
  type ValidationError,
} from 'class-validator';

export const APP_CONFIG = 'APP_CONFIG';

export interface WorkerSettings {
  pollIntervalMs: number;
  shutdownGraceMs: number;
}

export const AGENT_KINDS = ['claude', 'opencode'] as const;
export type AgentKind = (typeof AGENT_KINDS)[number];

export const DEFAULT_AGENT_MODELS: Record<AgentKind, string> = {
  claude: 'opus',
  opencode: 'moonshot/kimi-k2.5',
};

export interface AgentSettings {
  kind: AgentKind;
  binary: string;
  model: string;
  maxTurns: number;
  timeoutMs: number;
}

export interface GitSettings {
  binary: string;
  cloneTimeoutMs: number;
  syncTimeoutMs: number;
}

export interface GitHubSettings {
  binary: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  webhookSecret: string;
  allowedUser: string;
  stateRoot: string;
  repositories: Record<string, string>;
  scanRoots: string[];
  worker: WorkerSettings;
  agent: AgentSettings;
  git: GitSettings;
  github: GitHubSettings;
}

const REPOSITORY_NAME = /^[^/\s]+\/[^/\s]+$/;

export class ConfigValidationError extends Error {
  constructor(readonly violations: string[]) {
    super(`invalid configuration: ${violations.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

class EnvironmentVariables {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 8787;

  @IsString()
  @IsNotEmpty()
  GITHUB_WEBHOOK_SECRET!: string;

  @IsString()
  @IsNotEmpty()
  ALLOWED_USER!: string;

  @IsOptional()
  @IsString()
  RELAY_STATE_ROOT?: string;

  @IsOptional()
  @IsString()
  RELAY_REPOS_CONFIG?: string;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  WORKER_POLL_INTERVAL_MS = 5000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  WORKER_SHUTDOWN_GRACE_MS = 10_000;

  @IsIn(AGENT_KINDS)
  AGENT_KIND: AgentKind = 'claude';

  @IsOptional()
  @IsString()
  AGENT_BIN?: string;

  @IsOptional()
  @IsString()
  AGENT_MODEL?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10_000)
  AGENT_MAX_TURNS = 500;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(24 * 60)
  AGENT_TIMEOUT_MINUTES = 60;

  @IsString()
  @IsNotEmpty()
  GIT_BIN = 'git';

  @Type(() => Number)
  @IsInt()
  @Min(1000)
  GIT_CLONE_TIMEOUT_MS = 300_000;

  @Type(() => Number)
  @IsInt()
  @Min(1000)
  GIT_SYNC_TIMEOUT_MS = 120_000;

  @IsString()
  @IsNotEmpty()
  GH_BIN = 'gh';

  @Type(() => Number)
  @IsInt()
  @Min(1000)
  GH_TIMEOUT_MS = 30_000;
}

class RepositoryConfigFile {
  @IsOptional()
  @IsObject()
  repositories?: Record<string, unknown>;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  scanRoots?: string[];
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const property = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => (prefix ? `${prefix}.${message}` : message));
    return [...own, ...flattenErrors(error.children ?? [], property)];
  });
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

export interface RepositoryFileContents {
  repositories: Record<string, string>;
  scanRoots: string[];
}

export function parseRepositoryFile(raw: string, source: string): RepositoryFileContents {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError([`${source}: ${details}`]);
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigValidationError([`${source}: expected a JSON object`]);
  }

  const file = plainToInstance(RepositoryConfigFile, parsed);
  const violations = flattenErrors(validateSync(file)).map((message) => `${source}: ${message}`);

  const repositories: Record<string, string> = {};
  for (const [repo, location] of Object.entries(file.repositories ?? {})) {
    if (!REPOSITORY_NAME.test(repo)) {
      violations.push(`${source}: repository key must look like owner/name: ${repo}`);
      continue;
    }
    if (typeof location !== 'string' || !location.trim()) {
      violations.push(`${source}: repository ${repo} must map to a directory path`);
      continue;
    }
    repositories[repo.toLowerCase()] = path.resolve(expandHome(location.trim()));
  }

  if (violations.length > 0) {
    throw new ConfigValidationError(violations);
  }

  return {
    repositories,
    scanRoots: (file.scanRoots ?? []).map((root) => path.resolve(expandHome(root))),
  };
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  readFile: (filePath: string) => string = (filePath) => readFileSync(filePath, 'utf8'),
): AppConfig {
  const vars = plainToInstance(EnvironmentVariables, env);
  const violations = flattenErrors(validateSync(vars));
  if (violations.length > 0) {
    throw new ConfigValidationError(violations);
  }

  const reposConfigPath = optionalText(vars.RELAY_REPOS_CONFIG);
  const repositoryFile = reposConfigPath
    ? parseRepositoryFile(readFile(path.resolve(expandHome(reposConfigPath))), reposConfigPath)
    : { repositories: {}, scanRoots: [] };

  const stateRoot = optionalText(vars.RELAY_STATE_ROOT);

  return {
    port: vars.PORT,
    webhookSecret: vars.GITHUB_WEBHOOK_SECRET,
    allowedUser: vars.ALLOWED_USER.trim(),
    stateRoot: stateRoot
      ? path.resolve(expandHome(stateRoot))
      : path.resolve(process.cwd(), '.pr-relay', 'state'),
    repositories: repositoryFile.repositories,
    scanRoots: repositoryFile.scanRoots,
    worker: {
      pollIntervalMs: vars.WORKER_POLL_INTERVAL_MS,
      shutdownGraceMs: vars.WORKER_SHUTDOWN_GRACE_MS,
    },
    agent: {
      kind: vars.AGENT_KIND,
      binary: optionalText(vars.AGENT_BIN) ?? vars.AGENT_KIND,
      model: optionalText(vars.AGENT_MODEL) ?? DEFAULT_AGENT_MODELS[vars.AGENT_KIND],
      maxTurns: vars.AGENT_MAX_TURNS,
      timeoutMs: vars.AGENT_TIMEOUT_MINUTES * 60_000,
    },
    git: {
      binary: vars.GIT_BIN,
      cloneTimeoutMs: vars.GIT_CLONE_TIMEOUT_MS,
      syncTimeoutMs: vars.GIT_SYNC_TIMEOUT_MS,
    },
    github: {
      binary: vars.GH_BIN,
      timeoutMs: vars.GH_TIMEOUT_MS,
    },
  };
}
