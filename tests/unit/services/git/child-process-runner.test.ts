import os from 'os';
import { ChildProcessCommandRunner } from '@/services/git/command-runner';
import { ShellInvocation } from '@/types';
import { createTestLogger } from '../../../helpers/test-utils';

// 실제 /bin/sh 프로세스로 종료 코드와 출력 수집을 확인한다
const describeOnPosix = process.platform === 'win32' ? describe.skip : describe;

const shellCommand = (command: string): ShellInvocation => ({
  command,
  shell: '/bin/sh',
  program: 'sh',
  args: []
});

describeOnPosix('ChildProcessCommandRunner with a real shell', () => {
  const runner = new ChildProcessCommandRunner({ logger: createTestLogger() });
  const cwd = os.tmpdir();

  it('should keep output larger than 1 MiB and report success', async () => {
    // When
    const result = await runner.run(shellCommand("head -c 2000000 /dev/zero | tr '\\000' a"), { cwd });

    // Then
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toHaveLength(2000000);
    expect(result.stderr).toBe('');
  });

  it('should return the exit code of the command itself', async () => {
    // When
    const result = await runner.run(
      shellCommand("echo 'error: remote origin already exists.' >&2; exit 3"),
      { cwd }
    );

    // Then
    expect(result).toEqual({
      exitCode: 3,
      stdout: '',
      stderr: 'error: remote origin already exists.\n'
    });
  });

  it('should map an aborted command to the interrupt exit code', async () => {
    // Given
    const controller = new AbortController();

    // When
    const pending = runner.run(shellCommand('sleep 5'), { cwd, signal: controller.signal });
    controller.abort();
    const result = await pending;

    // Then
    expect(result.exitCode).toBe(130);
  });
});
