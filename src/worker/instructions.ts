import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { RunningJob } from '../jobs/job.types';

export const NONE_PLACEHOLDER = '(none)';

/**
 * Plan document locations, relative to the working copy, in lookup order.
 */
export const PLAN_CANDIDATES = [
  'PLAN.md',
  'plan.md',
  'docs/PLAN.md',
  'docs/plan.md',
  'docs/plans/PLAN.md',
  '.github/PLAN.md',
] as const;

export async function findPlanDocument(workdir: string): Promise<string | null> {
  for (const candidate of PLAN_CANDIDATES) {
    try {
      const stat = await fs.stat(path.join(workdir, candidate));
      if (stat.isFile()) {
        return candidate;
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
  return null;
}

function header(job: RunningJob): string[] {
  return [
    `You are working in a local checkout of ${job.repo}, on branch \`${job.branch}\`,`,
    `for pull request #${job.prNumber}.`,
  ];
}

export function buildActionInstruction(job: RunningJob, planPath: string | null): string {
  if (!planPath) {
    return [
      ...header(job),
      '',
      'No plan document was found. These locations were checked:',
      ...PLAN_CANDIDATES.map((candidate) => `- ${candidate}`),
      '',
      `Post one comment on pull request #${job.prNumber} (for example with`,
      `\`gh pr comment ${job.prNumber} --repo ${job.repo} --body "..."\`) saying that no plan`,
      'document was found, listing the locations above, and that the run is waiting for a',
      'plan to be added. Do not change, commit or push any files. Then stop.',
    ].join('\n');
  }

  return [
    ...header(job),
    '',
    `Read the plan in \`${planPath}\` and carry it out.`,
    '',
    'Rules:',
    '- Make the changes the plan describes and keep the code building and tests passing.',
    `- Commit your work with clear messages and push to \`${job.branch}\`.`,
    '- Do not open a new pull request and do not push to any other branch.',
    '- Do not post comments on the pull request. Status is reported for you.',
  ].join('\n');
}

function section(title: string, body: string): string[] {
  const text = body.trim();
  return [`## ${title}`, '', text ? text : NONE_PLACEHOLDER, ''];
}

export function buildFixInstruction(job: RunningJob, reviewComments: string, reviewBodies: string): string {
  return [
    ...header(job),
    '',
    'Address the review feedback below.',
    '',
    ...section('Inline review comments', reviewComments),
    ...section('Review summaries', reviewBodies),
    'Rules:',
    '- Fix every actionable point. Skip points that are already resolved.',
    `- Commit your work with clear messages and push to \`${job.branch}\`.`,
    '- Do not post comments on the pull request. Status is reported for you.',
  ].join('\n');
}
