import { exec, ExecException } from 'child_process';
import {
  CommandResult,
  CommandRunner,
  CommandRunOptions,
  INTERRUPTED_EXIT_CODE,
  ShellInvocation
} from '../../types';
import { Logger } from '../logger';
import { RemoteUrlParser } from '../../utils/RemoteUrlParser';

interface ChildProcessCommandRunnerDependencies {
  readonly logger: Logger;
}

/**
 * 셸을 통해 명령 하나를 실행하고 종료될 때까지 기다린다.
 * 0이 아닌 종료 코드는 예외가 아니라 결과로 돌려준다.
 */
export class ChildProcessCommandRunner implements CommandRunner {
  constructor(
    private readonly dependencies: ChildProcessCommandRunnerDependencies
  ) {}

  run(invocation: ShellInvocation, options: CommandRunOptions): Promise<CommandResult> {
    this.dependencies.logger.debug('Running command', {
      command: RemoteUrlParser.redactCredentials(invocation.command),
      shell: invocation.shell,
      cwd: options.cwd
    });

    return new Promise(resolve => {
      exec(
        invocation.command,
        {
          cwd: options.cwd,
          shell: invocation.shell,
          encoding: 'utf8',
          // 0이면 제한 없음
          timeout: options.timeoutMs ?? 0,
          // 기본값 1 MiB를 넘으면 git이 도중에 종료된다
          maxBuffer: Infinity,
          signal: options.signal,
          windowsHide: true
        },
        (error, stdout, stderr) => {
          const exitCode = error ? this.toExitCode(error) : 0;

          this.dependencies.logger.debug('Command finished', {
            command: RemoteUrlParser.redactCredentials(invocation.command),
            exitCode
          });

          resolve({ exitCode, stdout, stderr });
        }
      );
    });
  }

  private toExitCode(error: ExecException): number {
    if (error.name === 'AbortError' || error.signal === 'SIGINT') {
      return INTERRUPTED_EXIT_CODE;
    }
    // spawn 실패(ENOENT 등)는 code가 문자열로 들어온다
    if (typeof error.code === 'number') {
      return error.code;
    }
    return 1;
  }
}
