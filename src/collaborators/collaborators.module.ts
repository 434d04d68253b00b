import { Module } from '@nestjs/common';

import { AgentCliRunner } from './agent-runner';
import { AGENT, CODE_HOSTING, PATH_RESOLVER, VERSION_CONTROL } from './collaborator.types';
import { GitClient } from './git-client';
import { GitHubCli } from './github-cli';
import { RepositoryPathResolver } from './path-resolver';

@Module({
  providers: [
    { provide: VERSION_CONTROL, useClass: GitClient },
    { provide: CODE_HOSTING, useClass: GitHubCli },
    { provide: AGENT, useClass: AgentCliRunner },
    { provide: PATH_RESOLVER, useClass: RepositoryPathResolver },
  ],
  exports: [VERSION_CONTROL, CODE_HOSTING, AGENT, PATH_RESOLVER],
})
export class CollaboratorsModule {}
