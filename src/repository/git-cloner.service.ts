import { Injectable, Logger } from '@nestjs/common';
import simpleGit from 'simple-git';
import { errorMessage } from '../common/errors';
import { RepositoryCloneError, RepositoryCloner } from './repository-cloner.interface';

@Injectable()
export class GitClonerService implements RepositoryCloner {
  private readonly logger = new Logger(GitClonerService.name);

  async clone(repoUrl: string, destination: string): Promise<void> {
    this.logger.log(`Cloning repository: ${repoUrl}`);
    try {
      const git = simpleGit();
      await git.clone(repoUrl, destination, ['--depth', '1']);
    } catch (error) {
      this.logger.error(`Clone failed: ${errorMessage(error)}`);
      throw new RepositoryCloneError(repoUrl, errorMessage(error));
    }
  }
}

/** Drops any query string, e.g. the `?tab=readme` a browser copy-paste brings along. */
export function normalizeRepoUrl(repoUrl: string): string {
  return repoUrl.trim().split('?')[0];
}
