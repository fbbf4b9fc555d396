import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { Logger } from '../logger';
import { RemoteUrlParser } from '../../utils/RemoteUrlParser';

export interface GitHubRemoteCheckerConfig {
  readonly token?: string;
  readonly baseUrl?: string;
}

export interface RemoteCheckResult {
  readonly checked: boolean;
  readonly owner?: string;
  readonly repo?: string;
  readonly defaultBranch?: string;
  readonly isPrivate?: boolean;
}

export interface RemoteVerifier {
  verify(remoteUrl: string): Promise<RemoteCheckResult>;
}

export class GitHubRemoteError extends Error {
  constructor(
    message: string,
    public readonly remoteUrl: string,
    public readonly statusCode?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'GitHubRemoteError';
  }
}

/**
 * push 전에 대상 GitHub 저장소가 존재하는지 REST API로 확인한다.
 */
export class GitHubRemoteChecker implements RemoteVerifier {
  private readonly octokit: Octokit;

  constructor(
    config: GitHubRemoteCheckerConfig,
    private readonly logger: Logger
  ) {
    this.octokit = new Octokit({
      auth: config.token,
      userAgent: 'repo-publisher',
      baseUrl: config.baseUrl || 'https://api.github.com'
    });
  }

  async verify(remoteUrl: string): Promise<RemoteCheckResult> {
    const ref = RemoteUrlParser.parseGitHubRepository(remoteUrl);
    if (!ref) {
      this.logger.warn('Remote is not a GitHub repository, skipping verification', {
        remoteUrl: RemoteUrlParser.redactCredentials(remoteUrl)
      });
      return { checked: false };
    }

    const { owner, repo } = ref;
    this.logger.debug('Verifying GitHub repository', { owner, repo });

    try {
      const { data } = await this.octokit.rest.repos.get({ owner, repo });

      this.logger.info('GitHub repository verified', {
        owner,
        repo,
        defaultBranch: data.default_branch,
        private: data.private
      });

      return {
        checked: true,
        owner,
        repo,
        defaultBranch: data.default_branch,
        isPrivate: data.private
      };
    } catch (error) {
      if (error instanceof RequestError && error.status === 404) {
        throw new GitHubRemoteError(
          `GitHub repository ${owner}/${repo} was not found or is not accessible`,
          remoteUrl,
          404,
          error
        );
      }

      this.logger.error('GitHub repository verification failed', {
        owner,
        repo,
        error: error instanceof Error ? error.message : String(error)
      });

      throw new GitHubRemoteError(
        `Failed to verify GitHub repository ${owner}/${repo}`,
        remoteUrl,
        error instanceof RequestError ? error.status : undefined,
        error instanceof Error ? error : undefined
      );
    }
  }
}
