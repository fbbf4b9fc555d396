export type ShellFlavor = 'posix' | 'windows';

export const SHELL_FLAVORS: ReadonlyArray<ShellFlavor> = ['posix', 'windows'];

export type PublishStepId = 'init' | 'stage' | 'commit' | 'branch' | 'remote' | 'push';

export enum PublishState {
  UNINITIALIZED = 'uninitialized',
  INITIALIZED = 'initialized',
  STAGED = 'staged',
  COMMITTED = 'committed',
  BRANCH_SET = 'branch_set',
  REMOTE_SET = 'remote_set',
  PUSHED = 'pushed'
}

// 각 단계가 성공했을 때 도달하는 상태 (단방향)
export const STATE_AFTER_STEP: Readonly<Record<PublishStepId, PublishState>> = {
  init: PublishState.INITIALIZED,
  stage: PublishState.STAGED,
  commit: PublishState.COMMITTED,
  branch: PublishState.BRANCH_SET,
  remote: PublishState.REMOTE_SET,
  push: PublishState.PUSHED
};

export const PUBLISH_STATE_ORDER: ReadonlyArray<PublishState> = [
  PublishState.UNINITIALIZED,
  PublishState.INITIALIZED,
  PublishState.STAGED,
  PublishState.COMMITTED,
  PublishState.BRANCH_SET,
  PublishState.REMOTE_SET,
  PublishState.PUSHED
];

/**
 * 호스트 문법과 무관한 git 단계 기술.
 * 셸별 변환은 ShellAdapter가 담당한다.
 */
export interface PublishStep {
  readonly id: PublishStepId;
  readonly description: string;
  readonly args: ReadonlyArray<string>;
}

export interface PublishPlan {
  readonly remoteName: string;
  readonly remoteUrl: string;
  readonly branch: string;
  readonly commitMessage: string;
  readonly steps: ReadonlyArray<PublishStep>;
}

export interface PublishResult {
  readonly state: PublishState;
  readonly completedSteps: ReadonlyArray<PublishStepId>;
  readonly exitCode: number;
  readonly dryRun: boolean;
}

export interface PublishRunOptions {
  readonly cwd: string;
  readonly dryRun?: boolean;
  readonly stepTimeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface PublishOutput {
  log(line: string): void;
  error(line: string): void;
}

export class PublishStepError extends Error {
  constructor(
    message: string,
    public readonly step: PublishStep,
    public readonly exitCode: number,
    public readonly state: PublishState,
    public readonly completedSteps: ReadonlyArray<PublishStepId>,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'PublishStepError';
  }
}
