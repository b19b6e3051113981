import { Module } from '@nestjs/common';
import { GitClonerService } from './git-cloner.service';
import { REPOSITORY_CLONER } from './repository-cloner.interface';
import { WorkspaceService } from './workspace.service';

@Module({
  providers: [WorkspaceService, { provide: REPOSITORY_CLONER, useClass: GitClonerService }],
  exports: [WorkspaceService, REPOSITORY_CLONER],
})
export class RepositoryModule {}
