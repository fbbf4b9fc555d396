/**
 * RemoteUrlParser - 원격 저장소 URL 검증 및 GitHub owner/repo 추출
 */

export interface GitHubRepositoryRef {
  readonly owner: string;
  readonly repo: string;
}

export class RemoteUrlParser {
  /**
   * git이 받아들이는 원격 URL 형식인지 확인
   * (https/http/ssh/git/file 스킴 또는 scp 형식 user@host:path)
   */
  static isValidRemoteUrl(remoteUrl: string): boolean {
    if (!remoteUrl || /\s/.test(remoteUrl)) {
      return false;
    }

    if (this.isScpLike(remoteUrl)) {
      return true;
    }

    try {
      const url = new URL(remoteUrl);
      if (!['https:', 'http:', 'ssh:', 'git:', 'file:'].includes(url.protocol)) {
        return false;
      }
      return url.protocol === 'file:' || (url.hostname.length > 0 && url.pathname.length > 1);
    } catch {
      return false;
    }
  }

  /**
   * GitHub 원격 URL에서 owner/repo 추출
   */
  static parseGitHubRepository(remoteUrl: string): GitHubRepositoryRef | null {
    // https://github.com/owner/repo(.git), ssh://git@github.com/owner/repo.git, git@github.com:owner/repo.git
    const match = remoteUrl.match(/^(?:https?:\/\/(?:[^@/]+@)?|ssh:\/\/git@|git@)github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/);
    if (!match || !match[1] || !match[2]) {
      return null;
    }
    return { owner: match[1], repo: match[2] };
  }

  /**
   * 출력용으로 URL에 포함된 인증 정보를 가린다.
   * URL 하나 또는 URL이 들어 있는 명령줄, git 출력 모두에 쓸 수 있다.
   */
  static redactCredentials(text: string): string {
    return text.replace(/(https?:\/\/)[^@/\s'"]+@/g, '$1***@');
  }

  private static isScpLike(remoteUrl: string): boolean {
    return /^[A-Za-z0-9._-]+@[A-Za-z0-9.-]+:[^\s]+$/.test(remoteUrl);
  }
}
