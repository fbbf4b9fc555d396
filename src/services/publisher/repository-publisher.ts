import {
  CommandRunner,
  INTERRUPTED_EXIT_CODE,
  PublishOutput,
  PublishPlan,
  PublishResult,
  PublishRunOptions,
  PUBLISH_STATE_ORDER,
  PublishState,
  PublishStep,
  PublishStepError,
  PublishStepId,
  STATE_AFTER_STEP
} from '../../types';
import { Logger } from '../logger';
import { ShellAdapter } from './shell-adapter';
import { RemoteUrlParser } from '../../utils/RemoteUrlParser';

interface RepositoryPublisherDependencies {
  readonly logger: Logger;
  readonly runner: CommandRunner;
  readonly adapter: ShellAdapter;
  readonly output?: PublishOutput;
}

/**
 * 게시 단계를 순서대로 실행한다.
 * 첫 번째 실패에서 중단하며 이미 적용된 변경은 되돌리지 않는다.
 */
export class RepositoryPublisher {
  private readonly output: PublishOutput;

  constructor(
    private readonly dependencies: RepositoryPublisherDependencies
  ) {
    this.output = dependencies.output ?? console;
  }

  async run(plan: PublishPlan, options: PublishRunOptions): Promise<PublishResult> {
    const { adapter, logger } = this.dependencies;
    const total = plan.steps.length;
    const completedSteps: PublishStepId[] = [];
    let state = PublishState.UNINITIALIZED;

    logger.info('Publishing repository', {
      cwd: options.cwd,
      flavor: adapter.flavor,
      remoteName: plan.remoteName,
      branch: plan.branch,
      dryRun: options.dryRun ?? false
    });

    this.output.log(adapter.formatBanner());

    for (const [index, step] of plan.steps.entries()) {
      this.output.log(adapter.formatProgress(step, index, total));
      const invocation = adapter.toInvocation(step.args);

      if (options.dryRun) {
        this.output.log(`  ${RemoteUrlParser.redactCredentials(invocation.command)}`);
        continue;
      }

      if (options.signal?.aborted) {
        throw this.stepError(step, INTERRUPTED_EXIT_CODE, state, completedSteps, '', 'interrupted');
      }

      const result = await this.dependencies.runner.run(invocation, {
        cwd: options.cwd,
        timeoutMs: options.stepTimeoutMs,
        signal: options.signal
      });

      this.echo(result.stdout, line => this.output.log(line));
      this.echo(result.stderr, line => this.output.error(line));

      if (result.exitCode !== 0) {
        logger.error('Publish step failed', {
          step: step.id,
          exitCode: result.exitCode,
          state,
          stderr: RemoteUrlParser.redactCredentials(result.stderr.trim())
        });
        const reason = result.exitCode === INTERRUPTED_EXIT_CODE ? 'interrupted' : `exit code ${result.exitCode}`;
        throw this.stepError(step, result.exitCode, state, completedSteps, result.stderr, reason);
      }

      state = this.advance(state, step.id);
      completedSteps.push(step.id);
      logger.debug('Publish step completed', { step: step.id, state });
    }

    if (options.dryRun) {
      return { state, completedSteps, exitCode: 0, dryRun: true };
    }

    this.output.log(adapter.formatCompletion(plan));
    logger.info('Repository published', { remoteName: plan.remoteName, branch: plan.branch });

    return { state, completedSteps, exitCode: 0, dryRun: false };
  }

  private advance(current: PublishState, stepId: PublishStepId): PublishState {
    const next = STATE_AFTER_STEP[stepId];
    // 상태는 한 번에 한 단계씩만 앞으로 이동한다
    if (PUBLISH_STATE_ORDER.indexOf(next) !== PUBLISH_STATE_ORDER.indexOf(current) + 1) {
      throw new Error(`Invalid publish state transition: ${current} -> ${next}`);
    }
    return next;
  }

  private stepError(
    step: PublishStep,
    exitCode: number,
    state: PublishState,
    completedSteps: ReadonlyArray<PublishStepId>,
    stderr: string,
    reason: string
  ): PublishStepError {
    return new PublishStepError(
      RemoteUrlParser.redactCredentials(`Step "${step.id}" (git ${step.args.join(' ')}) failed: ${reason}`),
      step,
      exitCode,
      state,
      [...completedSteps],
      RemoteUrlParser.redactCredentials(stderr)
    );
  }

  private echo(text: string, write: (line: string) => void): void {
    // git이 원격 URL을 그대로 출력하는 경우가 있어 인증 정보를 가린다
    const trimmed = RemoteUrlParser.redactCredentials(text.replace(/\n+$/, ''));
    if (trimmed) {
      write(trimmed);
    }
  }
}
