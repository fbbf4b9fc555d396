import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import path from 'path';
import { EventEmitter } from 'events';
import { AppConfig, AppConfigLoader } from '../config/app-config';
import {
  CommandRunner,
  ConfigurationError,
  GitHubConfig,
  PublishOutput,
  PublishOverrides,
  PublishStepError,
  RepositoryStatus,
  ShellFlavor
} from '../types';
import { Logger, LogLevel } from '../services/logger';
import { ChildProcessCommandRunner } from '../services/git/command-runner';
import { GitService } from '../services/git/git.service';
import { GitHubRemoteChecker, RemoteVerifier } from '../services/github/github-remote-checker';
import { PublishPlanBuilder } from '../services/publisher/publish-plan';
import { RepositoryPublisher } from '../services/publisher/repository-publisher';
import { createShellAdapter, defaultShellFlavor } from '../services/publisher/shell-adapter';
import { RemoteUrlParser } from '../utils/RemoteUrlParser';

export interface CliDependencies {
  readonly env?: NodeJS.ProcessEnv;
  readonly output?: PublishOutput;
  readonly signals?: EventEmitter;
  readonly createRunner?: (logger: Logger) => CommandRunner;
  readonly createRemoteChecker?: (config: GitHubConfig, logger: Logger) => RemoteVerifier;
  readonly setExitCode?: (code: number) => void;
}

interface CommonOptions {
  readonly config?: string;
  readonly cwd?: string;
  readonly flavor?: string;
  readonly verbose?: boolean;
}

interface PublishCommandOptions extends CommonOptions {
  readonly remoteUrl?: string;
  readonly remoteName?: string;
  readonly branch?: string;
  readonly message?: string;
  readonly stepTimeout?: number;
  readonly verifyRemote?: boolean;
  readonly dryRun?: boolean;
}

interface ScriptCommandOptions extends PublishCommandOptions {
  readonly out?: string;
}

interface ConfigCommandOptions extends PublishCommandOptions {
  readonly validate?: boolean;
}

export function createCLI(dependencies: CliDependencies = {}): Command {
  const env = dependencies.env ?? process.env;
  const output = dependencies.output ?? console;
  const signals = dependencies.signals ?? process;
  const createRunner = dependencies.createRunner
    ?? ((logger: Logger) => new ChildProcessCommandRunner({ logger }));
  const createRemoteChecker = dependencies.createRemoteChecker
    ?? ((config: GitHubConfig, logger: Logger) => new GitHubRemoteChecker({ token: config.token }, logger));
  const setExitCode = dependencies.setExitCode
    ?? ((code: number) => { process.exitCode = code; });

  const resolveConfig = (options: PublishCommandOptions): AppConfig => {
    const layers: PublishOverrides[] = [AppConfigLoader.overridesFromEnvironment(env)];
    if (options.config) {
      layers.push(AppConfigLoader.loadFromFile(options.config));
    }
    layers.push({
      remoteUrl: options.remoteUrl,
      remoteName: options.remoteName,
      branch: options.branch,
      commitMessage: options.message,
      flavor: options.flavor,
      stepTimeoutMs: options.stepTimeout,
      verifyRemote: options.verifyRemote
    });
    return AppConfigLoader.resolve(layers, env);
  };

  const createLogger = (config: AppConfig, verbose?: boolean): Logger => Logger.fromSettings({
    ...config.logger,
    level: verbose ? 'debug' : config.logger.level,
    enableConsole: verbose || config.logger.enableConsole
  });

  const resolveCwd = (options: CommonOptions): string => path.resolve(options.cwd ?? process.cwd());

  // 명령 실패는 예외 대신 종료 코드로 전달한다
  const runAction = async (action: () => Promise<void>): Promise<void> => {
    try {
      await action();
    } catch (error) {
      if (error instanceof PublishStepError) {
        output.error(`❌ ${error.message}`);
        setExitCode(error.exitCode);
        return;
      }
      output.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
      setExitCode(1);
    }
  };

  const program = new Command();

  program
    .name('repo-publish')
    .description('Initialize a git repository in a directory and publish it to a remote')
    .version('1.0.0');

  const withPublishOptions = (command: Command): Command => command
    .option('-c, --config <path>', 'JSON config file')
    .option('--cwd <dir>', 'Directory to publish (default: current directory)')
    .option('--remote-url <url>', 'Remote repository URL (PUBLISH_REMOTE_URL)')
    .option('--remote-name <name>', 'Remote name (default: origin)')
    .option('--branch <name>', 'Branch to publish (default: main)')
    .option('-m, --message <text>', 'Initial commit message')
    .option('--flavor <flavor>', 'Shell flavor: posix or windows (default: host platform)')
    .option('--step-timeout <ms>', 'Per-step timeout in milliseconds, 0 for none', (value: string) => Number(value))
    .option('--verify-remote', 'Check that the GitHub repository exists before publishing')
    .option('-v, --verbose', 'Print debug logs to stderr');

  // publish 명령어 (기본)
  withPublishOptions(
    program
      .command('publish', { isDefault: true })
      .description('Run init, add, commit, branch, remote add and push in order')
      .option('--dry-run', 'Print the commands without running them')
  ).action(async (options: PublishCommandOptions) => {
    await runAction(async () => {
      const config = resolveConfig(options);
      const logger = createLogger(config, options.verbose);
      const cwd = resolveCwd(options);

      try {
        if (config.github.verifyRemote && !options.dryRun) {
          await createRemoteChecker(config.github, logger).verify(config.publish.remoteUrl);
        }

        const publisher = new RepositoryPublisher({
          logger,
          runner: createRunner(logger),
          adapter: createShellAdapter(config.publish.flavor),
          output
        });

        const controller = new AbortController();
        const onInterrupt = (): void => {
          logger.warn('Interrupt received, stopping publish', { cwd });
          controller.abort();
        };
        signals.once('SIGINT', onInterrupt);

        try {
          await publisher.run(PublishPlanBuilder.build(config.publish), {
            cwd,
            dryRun: options.dryRun,
            stepTimeoutMs: config.publish.stepTimeoutMs,
            signal: controller.signal
          });
        } finally {
          signals.removeListener('SIGINT', onInterrupt);
        }
      } finally {
        await logger.flush();
      }
    });
  });

  // plan 명령어
  withPublishOptions(
    program
      .command('plan')
      .description('Print the commands a publish would run')
  ).action(async (options: PublishCommandOptions) => {
    await runAction(async () => {
      const config = resolveConfig(options);
      const adapter = createShellAdapter(config.publish.flavor);
      const plan = PublishPlanBuilder.build(config.publish);

      plan.steps.forEach((step, index) => {
        output.log(`${index + 1}. ${RemoteUrlParser.redactCredentials(adapter.toInvocation(step.args).command)}`);
      });
    });
  });

  // script 명령어
  withPublishOptions(
    program
      .command('script')
      .description('Print a standalone shell script that performs the publish')
      .option('-o, --out <file>', 'Write the script to a file instead of stdout')
  ).action(async (options: ScriptCommandOptions) => {
    await runAction(async () => {
      const config = resolveConfig(options);
      const adapter = createShellAdapter(config.publish.flavor);
      const script = adapter.renderScript(PublishPlanBuilder.build(config.publish));

      if (!options.out) {
        output.log(script);
        return;
      }

      const outPath = path.resolve(options.out);
      await writeFile(outPath, script, { mode: adapter.flavor === 'posix' ? 0o755 : 0o644 });
      output.log(`📝 Script written to ${outPath}`);
    });
  });

  // status 명령어
  program
    .command('status')
    .description('Show repository, branch, remote and upstream state of a directory')
    .option('--cwd <dir>', 'Directory to inspect (default: current directory)')
    .option('--flavor <flavor>', 'Shell flavor: posix or windows (default: host platform)')
    .option('-v, --verbose', 'Print debug logs to stderr')
    .action(async (options: CommonOptions) => {
      await runAction(async () => {
        const flavorName = options.flavor ?? env.PUBLISH_FLAVOR ?? defaultShellFlavor();
        if (!AppConfigLoader.isShellFlavor(flavorName)) {
          throw new ConfigurationError([`publish.flavor must be one of posix, windows: "${flavorName}"`]);
        }

        const logger = options.verbose
          ? Logger.createConsoleLogger(LogLevel.DEBUG)
          : Logger.createSilentLogger();
        const gitService = new GitService({
          logger,
          runner: createRunner(logger),
          adapter: createShellAdapter(flavorName)
        });

        printStatus(output, await gitService.inspect(resolveCwd(options)), flavorName);
      });
    });

  // config 명령어
  withPublishOptions(
    program
      .command('config')
      .description('Show the resolved configuration')
      .option('--validate', 'Only validate the configuration')
  ).action(async (options: ConfigCommandOptions) => {
    await runAction(async () => {
      const config = resolveConfig(options);

      if (options.validate) {
        output.log('✅ Configuration is valid.');
        return;
      }

      output.log('⚙️  Publish configuration:');
      output.log('─'.repeat(50));
      output.log(JSON.stringify(AppConfigLoader.redact(config), null, 2));
    });
  });

  return program;
}

function printStatus(output: PublishOutput, status: RepositoryStatus, flavor: ShellFlavor): void {
  output.log(`📊 Repository status (${flavor}):`);
  output.log('─'.repeat(50));
  output.log(`📁 Path: ${status.path}`);

  if (!status.isRepository) {
    output.log('❌ Not a git repository');
    return;
  }

  output.log(`🌿 Branch: ${status.currentBranch ?? '(detached)'}`);
  output.log(`💾 Commits: ${status.commitCount}`);

  if (status.remotes.length === 0) {
    output.log('🔗 Remotes: (none)');
  } else {
    output.log('🔗 Remotes:');
    for (const remote of status.remotes) {
      output.log(`   ${remote.name} → ${remote.url}`);
    }
  }

  output.log(`⬆️  Upstream: ${status.upstream ?? '(none)'}`);
}
