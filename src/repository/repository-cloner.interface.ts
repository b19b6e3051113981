export interface RepositoryCloner {
  /** Clones `repoUrl` into the existing, empty `destination` directory. */
  clone(repoUrl: string, destination: string): Promise<void>;
}

export class RepositoryCloneError extends Error {
  constructor(
    readonly repoUrl: string,
    message: string,
  ) {
    super(message);
    this.name = 'RepositoryCloneError';
  }
}

export const REPOSITORY_CLONER = Symbol('REPOSITORY_CLONER');
