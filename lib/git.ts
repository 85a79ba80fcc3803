import simpleGit from 'simple-git';

export interface SourceFetcher {
  /** Shallow, single-branch clone of `repository` into `destination`. */
  clone(repository: string, destination: string, branch: string): Promise<void>;
}

export class GitSourceFetcher implements SourceFetcher {
  async clone(repository: string, destination: string, branch: string): Promise<void> {
    const git = simpleGit();
    await git.clone(repository, destination, ['--depth', '1', '--branch', branch, '--single-branch']);
  }
}
