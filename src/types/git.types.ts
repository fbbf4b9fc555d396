export interface ShellInvocation {
  // 실제 실행될 셸 명령 문자열
  readonly command: string;
  readonly shell: string;
  readonly program: string;
  readonly args: ReadonlyArray<string>;
}

export interface CommandRunOptions {
  readonly cwd: string;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandRunner {
  run(invocation: ShellInvocation, options: CommandRunOptions): Promise<CommandResult>;
}

export interface RemoteBinding {
  readonly name: string;
  readonly url: string;
}

export interface RepositoryStatus {
  readonly path: string;
  readonly isRepository: boolean;
  readonly currentBranch?: string;
  readonly commitCount: number;
  readonly remotes: ReadonlyArray<RemoteBinding>;
  readonly upstream?: string;
}

// SIGINT로 종료된 프로세스의 관례적 종료 코드
export const INTERRUPTED_EXIT_CODE = 130;
