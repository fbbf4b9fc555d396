import {
  CommandResult,
  CommandRunner,
  CommandRunOptions,
  INTERRUPTED_EXIT_CODE,
  RemoteBinding,
  ShellInvocation
} from '../../../types';
import { Logger } from '../../logger';

interface MockGitRunnerDependencies {
  readonly logger: Logger;
  readonly files?: Readonly<Record<string, string>>;
}

export interface MockCommit {
  readonly hash: string;
  readonly message: string;
  readonly files: ReadonlyArray<string>;
}

export type MockPushBehaviour = 'accept' | 'unreachable' | 'reject' | 'hang';

const NOT_A_REPOSITORY = 'fatal: not a git repository (or any of the parent directories): .git\n';

/**
 * 프로세스 안에서 git 저장소 상태를 흉내 내는 CommandRunner.
 * 셸 문자열이 아닌 invocation.args를 해석한다.
 */
export class MockGitRunner implements CommandRunner {
  private initialized = false;
  private head = 'master';
  private readonly workingTree = new Map<string, string>();
  private readonly committedTree = new Map<string, string>();
  private readonly staged = new Map<string, string>();
  private readonly commits: MockCommit[] = [];
  // 선형 히스토리이므로 브랜치는 커밋 개수로 표현
  private readonly branches = new Map<string, number>();
  private readonly remotes = new Map<string, string>();
  private readonly upstreams = new Map<string, string>();
  private readonly remoteRefs = new Map<string, number>();
  private pushBehaviour: MockPushBehaviour = 'accept';
  private readonly invocations: ShellInvocation[] = [];

  constructor(
    private readonly dependencies: MockGitRunnerDependencies
  ) {
    for (const [filePath, content] of Object.entries(dependencies.files ?? {})) {
      this.workingTree.set(filePath, content);
    }
  }

  async run(invocation: ShellInvocation, options: CommandRunOptions): Promise<CommandResult> {
    this.invocations.push(invocation);
    this.dependencies.logger.debug('Mock: Running git command', {
      args: invocation.args,
      cwd: options.cwd
    });

    if (invocation.program !== 'git') {
      return this.fail(127, `sh: 1: ${invocation.program}: not found\n`);
    }

    const [subcommand, ...rest] = invocation.args;

    if (subcommand === 'init') {
      return this.init(options.cwd);
    }
    if (!this.initialized) {
      return this.fail(128, NOT_A_REPOSITORY);
    }

    switch (subcommand) {
      case 'add':
        return this.add();
      case 'commit':
        return this.commit(rest);
      case 'branch':
        return this.branch(rest);
      case 'remote':
        return this.remote(rest);
      case 'push':
        return this.push(rest, options.signal);
      case 'rev-parse':
        return this.revParse(rest);
      case 'rev-list':
        return this.revList();
      default:
        return this.fail(1, `git: '${subcommand}' is not a git command. See 'git --help'.\n`);
    }
  }

  // 테스트용 헬퍼 메서드들
  writeFile(filePath: string, content: string): void {
    this.workingTree.set(filePath, content);
  }

  setPushBehaviour(behaviour: MockPushBehaviour): void {
    this.pushBehaviour = behaviour;
  }

  getCommits(): ReadonlyArray<MockCommit> {
    return [...this.commits];
  }

  getBranches(): ReadonlyArray<string> {
    return Array.from(this.branches.keys());
  }

  getRemotes(): ReadonlyArray<RemoteBinding> {
    return Array.from(this.remotes.entries()).map(([name, url]) => ({ name, url }));
  }

  getRemoteRefs(): ReadonlyArray<string> {
    return Array.from(this.remoteRefs.keys());
  }

  getInvocations(): ReadonlyArray<ShellInvocation> {
    return [...this.invocations];
  }

  private init(cwd: string): CommandResult {
    if (this.initialized) {
      return this.ok(`Reinitialized existing Git repository in ${cwd}/.git/\n`);
    }
    this.initialized = true;
    return this.ok(`Initialized empty Git repository in ${cwd}/.git/\n`);
  }

  private add(): CommandResult {
    for (const [filePath, content] of this.workingTree) {
      if (this.committedTree.get(filePath) !== content) {
        this.staged.set(filePath, content);
      }
    }
    return this.ok('');
  }

  private commit(args: ReadonlyArray<string>): CommandResult {
    const messageIndex = args.indexOf('-m');
    const message = messageIndex >= 0 ? args[messageIndex + 1] : undefined;
    if (!message) {
      return this.fail(1, 'Aborting commit due to empty commit message.\n');
    }

    if (this.staged.size === 0) {
      const stdout = this.commits.length === 0
        ? `On branch ${this.head}\n\nInitial commit\n\nnothing to commit (create/copy files and use "git add" to track)\n`
        : `On branch ${this.head}\nnothing to commit, working tree clean\n`;
      return { exitCode: 1, stdout, stderr: '' };
    }

    const isRoot = !this.branches.has(this.head);
    const files = Array.from(this.staged.keys()).sort();
    const hash = (this.commits.length + 1).toString(16).padStart(7, '0');

    this.commits.push({ hash, message, files });
    for (const [filePath, content] of this.staged) {
      this.committedTree.set(filePath, content);
    }
    this.staged.clear();
    this.branches.set(this.head, this.commits.length);

    const root = isRoot ? ' (root-commit)' : '';
    return this.ok(`[${this.head}${root} ${hash}] ${message}\n ${files.length} files changed\n`);
  }

  private branch(args: ReadonlyArray<string>): CommandResult {
    if (args[0] === '--show-current') {
      return this.ok(`${this.head}\n`);
    }
    if (args[0] !== '-M' || !args[1]) {
      return this.fail(129, 'usage: git branch [<options>]\n');
    }

    const target = args[1];
    const tip = this.branches.get(this.head);
    if (tip !== undefined) {
      this.branches.delete(this.head);
      this.branches.set(target, tip);
    }
    const upstream = this.upstreams.get(this.head);
    if (upstream !== undefined) {
      this.upstreams.delete(this.head);
      this.upstreams.set(target, upstream);
    }
    this.head = target;
    return this.ok('');
  }

  private remote(args: ReadonlyArray<string>): CommandResult {
    if (args[0] === '-v') {
      const lines = Array.from(this.remotes.entries())
        .flatMap(([name, url]) => [`${name}\t${url} (fetch)`, `${name}\t${url} (push)`]);
      return this.ok(lines.length > 0 ? `${lines.join('\n')}\n` : '');
    }

    const [action, name, url] = args;
    if (action !== 'add' || !name || !url) {
      return this.fail(129, 'usage: git remote add [<options>] <name> <url>\n');
    }
    if (this.remotes.has(name)) {
      return this.fail(3, `error: remote ${name} already exists.\n`);
    }
    this.remotes.set(name, url);
    return this.ok('');
  }

  private async push(args: ReadonlyArray<string>, signal?: AbortSignal): Promise<CommandResult> {
    const setUpstream = args.includes('-u');
    const [name, branch] = args.filter(arg => arg !== '-u');
    const url = name ? this.remotes.get(name) : undefined;

    if (!name || url === undefined) {
      return this.fail(128, `fatal: '${name ?? ''}' does not appear to be a git repository\nfatal: Could not read from remote repository.\n`);
    }

    const target = branch ?? this.head;
    const tip = this.branches.get(target);
    if (tip === undefined) {
      return this.fail(1, `error: src refspec ${target} does not match any\nerror: failed to push some refs to '${url}'\n`);
    }

    switch (this.pushBehaviour) {
      case 'unreachable':
        return this.fail(128, `fatal: unable to access '${url}/': Could not resolve host\n`);
      case 'reject':
        return this.fail(1, ` ! [rejected]        ${target} -> ${target} (fetch first)\nerror: failed to push some refs to '${url}'\n`);
      case 'hang':
        await this.waitForAbort(signal);
        return this.fail(INTERRUPTED_EXIT_CODE, '');
      case 'accept':
        break;
    }

    const trackingRef = `${name}/${target}`;
    this.remoteRefs.set(trackingRef, tip);
    if (setUpstream) {
      this.upstreams.set(target, trackingRef);
    }

    const tracking = setUpstream ? `branch '${target}' set up to track '${trackingRef}'.\n` : '';
    return {
      exitCode: 0,
      stdout: tracking,
      stderr: `To ${url}\n * [new branch]      ${target} -> ${target}\n`
    };
  }

  private revParse(args: ReadonlyArray<string>): CommandResult {
    if (args.includes('--is-inside-work-tree')) {
      return this.ok('true\n');
    }
    if (args.includes('@{u}')) {
      const upstream = this.upstreams.get(this.head);
      return upstream
        ? this.ok(`${upstream}\n`)
        : this.fail(128, `fatal: no upstream configured for branch '${this.head}'\n`);
    }
    return this.fail(128, `fatal: unsupported rev-parse arguments: ${args.join(' ')}\n`);
  }

  private revList(): CommandResult {
    const tip = this.branches.get(this.head);
    if (tip === undefined) {
      return this.fail(128, "fatal: ambiguous argument 'HEAD': unknown revision or path not in the working tree.\n");
    }
    return this.ok(`${tip}\n`);
  }

  private waitForAbort(signal?: AbortSignal): Promise<void> {
    if (!signal || signal.aborted) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  private ok(stdout: string): CommandResult {
    return { exitCode: 0, stdout, stderr: '' };
  }

  private fail(exitCode: number, stderr: string): CommandResult {
    return { exitCode, stdout: '', stderr };
  }
}
