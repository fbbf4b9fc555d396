import {
  CommandResult,
  CommandRunner,
  RemoteBinding,
  RepositoryStatus
} from '../../types';
import { Logger } from '../logger';
import { ShellAdapter } from '../publisher/shell-adapter';

interface GitServiceDependencies {
  readonly logger: Logger;
  readonly runner: CommandRunner;
  readonly adapter: ShellAdapter;
  readonly gitOperationTimeoutMs?: number;
}

/**
 * 작업 디렉토리의 저장소 상태를 읽기 전용으로 조회한다.
 */
export class GitService {
  constructor(
    private readonly dependencies: GitServiceDependencies
  ) {}

  async isRepository(cwd: string): Promise<boolean> {
    const result = await this.git(cwd, 'rev-parse', '--is-inside-work-tree');
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  async getCurrentBranch(cwd: string): Promise<string | undefined> {
    const result = await this.git(cwd, 'branch', '--show-current');
    const branch = result.stdout.trim();
    return result.exitCode === 0 && branch ? branch : undefined;
  }

  async getRemotes(cwd: string): Promise<RemoteBinding[]> {
    const result = await this.git(cwd, 'remote', '-v');
    if (result.exitCode !== 0) {
      return [];
    }
    return this.parseRemotes(result.stdout);
  }

  async getUpstream(cwd: string): Promise<string | undefined> {
    const result = await this.git(cwd, 'rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{u}');
    const upstream = result.stdout.trim();
    return result.exitCode === 0 && upstream ? upstream : undefined;
  }

  async getCommitCount(cwd: string): Promise<number> {
    const result = await this.git(cwd, 'rev-list', '--count', 'HEAD');
    if (result.exitCode !== 0) {
      // 커밋이 없는 브랜치
      return 0;
    }
    const count = Number.parseInt(result.stdout.trim(), 10);
    return Number.isNaN(count) ? 0 : count;
  }

  async inspect(cwd: string): Promise<RepositoryStatus> {
    this.dependencies.logger.info('Inspecting repository', { cwd });

    if (!(await this.isRepository(cwd))) {
      return { path: cwd, isRepository: false, commitCount: 0, remotes: [] };
    }

    const status: RepositoryStatus = {
      path: cwd,
      isRepository: true,
      currentBranch: await this.getCurrentBranch(cwd),
      commitCount: await this.getCommitCount(cwd),
      remotes: await this.getRemotes(cwd),
      upstream: await this.getUpstream(cwd)
    };

    this.dependencies.logger.debug('Repository inspected', { ...status });
    return status;
  }

  private parseRemotes(output: string): RemoteBinding[] {
    const remotes = new Map<string, string>();
    for (const line of output.split(/\r?\n/)) {
      // 형식: "<name>\t<url> (fetch|push)"
      const match = line.match(/^(\S+)\s+(\S+)\s+\((fetch|push)\)$/);
      if (match && match[1] && match[2] && !remotes.has(match[1])) {
        remotes.set(match[1], match[2]);
      }
    }
    return Array.from(remotes.entries()).map(([name, url]) => ({ name, url }));
  }

  private git(cwd: string, ...args: string[]): Promise<CommandResult> {
    const invocation = this.dependencies.adapter.toInvocation(args);
    return this.dependencies.runner.run(invocation, {
      cwd,
      timeoutMs: this.dependencies.gitOperationTimeoutMs ?? 5000
    });
  }
}
