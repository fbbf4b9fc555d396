const mockReposGet = jest.fn();
jest.mock('@octokit/rest', () => ({
  Octokit: jest.fn().mockImplementation(() => ({
    rest: {
      repos: {
        get: (...args: unknown[]) => mockReposGet(...args)
      }
    }
  }))
}));

import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { GitHubRemoteChecker, GitHubRemoteError } from '@/services/github/github-remote-checker';
import { createTestLogger, TEST_REMOTE_URL } from '../../../helpers/test-utils';

describe('GitHubRemoteChecker', () => {
  let checker: GitHubRemoteChecker;

  const requestError = (status: number, message: string): RequestError => new RequestError(message, status, {
    request: {
      method: 'GET',
      url: 'https://api.github.com/repos/test-owner/sales_dashboard',
      headers: {}
    }
  });

  const remoteError = async (promise: Promise<unknown>): Promise<GitHubRemoteError> => {
    try {
      await promise;
    } catch (error) {
      if (error instanceof GitHubRemoteError) {
        return error;
      }
      throw error;
    }
    throw new Error('Expected verification to fail');
  };

  beforeEach(() => {
    mockReposGet.mockReset();
    jest.mocked(Octokit).mockClear();
    checker = new GitHubRemoteChecker({ token: 'test-token' }, createTestLogger());
  });

  it('should create the client with the token', () => {
    expect(Octokit).toHaveBeenCalledWith({
      auth: 'test-token',
      userAgent: 'repo-publisher',
      baseUrl: 'https://api.github.com'
    });
  });

  it('should return repository details when it exists', async () => {
    // Given
    mockReposGet.mockResolvedValue({ data: { default_branch: 'main', private: true } });

    // When
    const result = await checker.verify(TEST_REMOTE_URL);

    // Then
    expect(mockReposGet).toHaveBeenCalledWith({ owner: 'test-owner', repo: 'sales_dashboard' });
    expect(result).toEqual({
      checked: true,
      owner: 'test-owner',
      repo: 'sales_dashboard',
      defaultBranch: 'main',
      isPrivate: true
    });
  });

  it('should skip remotes that are not on GitHub', async () => {
    // When
    const result = await checker.verify('git@gitlab.com:team/sales_dashboard.git');

    // Then
    expect(result).toEqual({ checked: false });
    expect(mockReposGet).not.toHaveBeenCalled();
  });

  it('should report a missing repository', async () => {
    // Given
    mockReposGet.mockRejectedValue(requestError(404, 'Not Found'));

    // When
    const error = await remoteError(checker.verify(TEST_REMOTE_URL));

    // Then
    expect(error.message).toBe('GitHub repository test-owner/sales_dashboard was not found or is not accessible');
    expect(error.statusCode).toBe(404);
    expect(error.remoteUrl).toBe(TEST_REMOTE_URL);
  });

  it('should wrap other API failures', async () => {
    // Given
    mockReposGet.mockRejectedValue(requestError(500, 'Server Error'));

    // When
    const error = await remoteError(checker.verify(TEST_REMOTE_URL));

    // Then
    expect(error.message).toBe('Failed to verify GitHub repository test-owner/sales_dashboard');
    expect(error.statusCode).toBe(500);
    expect(error.cause).toBeInstanceOf(RequestError);
  });
});
