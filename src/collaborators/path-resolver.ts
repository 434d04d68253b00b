import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';

import { APP_CONFIG, type AppConfig } from '../config/app-config';
import type { PathResolver } from './collaborator.types';

const GITHUB_REMOTE = /github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/i;
const SCAN_DEPTH = 2;

/**
 * Reads the `origin` remote from a checkout's `.git/config` and returns the
 * GitHub `owner/name` it points at.
 */
export function readOriginRepository(workdir: string): string | null {
  const configPath = path.join(workdir, '.git', 'config');
  if (!existsSync(configPath)) {
    return null;
  }

  let inOrigin = false;
  for (const rawLine of readFileSync(configPath, 'utf8').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('[')) {
      inOrigin = line === '[remote "origin"]';
      continue;
    }

    const url = inOrigin ? /^url\s*=\s*(.+)$/.exec(line)?.[1] : undefined;
    if (url) {
      const match = GITHUB_REMOTE.exec(url.trim());
      return match ? `${match[1]}/${match[2]}`.toLowerCase() : null;
    }
  }

  return null;
}

function listSubdirectories(dir: string): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => path.join(dir, entry.name));
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EACCES') {
      return [];
    }
    throw error;
  }
}

/**
 * Finds working copies up to two levels below each root (`root/name` and
 * `root/owner/name`). The first checkout found for a repository wins.
 */
export function discoverRepositories(roots: readonly string[]): Record<string, string> {
  const found: Record<string, string> = {};

  const visit = (dir: string, depth: number) => {
    const repo = readOriginRepository(dir);
    if (repo) {
      found[repo] ??= dir;
      return;
    }
    if (depth >= SCAN_DEPTH) {
      return;
    }

    for (const child of listSubdirectories(dir)) {
      visit(child, depth + 1);
    }
  };

  for (const root of roots) {
    visit(root, 0);
  }
  return found;
}

@Injectable()
export class RepositoryPathResolver implements PathResolver {
  private readonly logger = new Logger(RepositoryPathResolver.name);
  private readonly locations: ReadonlyMap<string, string>;

  constructor(@Inject(APP_CONFIG) config: Pick<AppConfig, 'repositories' | 'scanRoots'>) {
    const discovered = discoverRepositories(config.scanRoots);
    this.locations = new Map(Object.entries({ ...discovered, ...config.repositories }));
    this.logger.log(
      `repository map ready configured=${Object.keys(config.repositories).length} discovered=${Object.keys(discovered).length}`,
    );
  }

  resolve(repo: string): string | null {
    return this.locations.get(repo.toLowerCase()) ?? null;
  }
}
