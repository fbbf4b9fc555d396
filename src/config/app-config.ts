import fs from 'fs';
import {
  ConfigurationError,
  GitHubConfig,
  LoggerSettings,
  LogLevelName,
  NodeEnv,
  PublishConfig,
  PublishOverrides,
  SHELL_FLAVORS,
  ShellFlavor
} from '../types';
import { Logger } from '../services/logger';
import {
  DEFAULT_BRANCH,
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_REMOTE_NAME
} from '../services/publisher/publish-plan';
import { defaultShellFlavor } from '../services/publisher/shell-adapter';
import { RemoteUrlParser } from '../utils/RemoteUrlParser';

export interface AppConfig {
  readonly publish: PublishConfig;
  readonly github: GitHubConfig;
  readonly logger: LoggerSettings;
  readonly nodeEnv: NodeEnv;
}

export type AppEnvironment = NodeJS.ProcessEnv;

const NODE_ENVS: ReadonlyArray<NodeEnv> = ['development', 'production', 'test'];
const TRUE_FLAGS: ReadonlyArray<string> = ['true', '1', 'yes', 'on'];
const FALSE_FLAGS: ReadonlyArray<string> = ['false', '0', 'no', 'off'];

export class AppConfigLoader {
  static loadFromEnvironment(env: AppEnvironment = process.env): AppConfig {
    return this.resolve([this.overridesFromEnvironment(env)], env);
  }

  /**
   * 기본값 → 나열된 소스 순서로 덮어쓴 뒤 검증한다. 뒤의 소스가 우선.
   */
  static resolve(layers: ReadonlyArray<PublishOverrides>, env: AppEnvironment = process.env): AppConfig {
    const merged = layers.reduce<PublishOverrides>((acc, layer) => this.merge(acc, layer), {});
    const errors: string[] = [];

    const remoteUrl = merged.remoteUrl ?? '';
    if (!remoteUrl) {
      errors.push('publish.remoteUrl is required (PUBLISH_REMOTE_URL or --remote-url)');
    } else if (!RemoteUrlParser.isValidRemoteUrl(remoteUrl)) {
      errors.push(`publish.remoteUrl is not a valid git remote URL: ${RemoteUrlParser.redactCredentials(remoteUrl)}`);
    }

    const remoteName = merged.remoteName ?? DEFAULT_REMOTE_NAME;
    if (!this.isValidRemoteName(remoteName)) {
      errors.push(`publish.remoteName is invalid: "${remoteName}"`);
    }

    const branch = merged.branch ?? DEFAULT_BRANCH;
    if (!this.isValidBranchName(branch)) {
      errors.push(`publish.branch is not a valid branch name: "${branch}"`);
    }

    const commitMessage = merged.commitMessage ?? DEFAULT_COMMIT_MESSAGE;
    if (!commitMessage.trim()) {
      errors.push('publish.commitMessage must not be empty');
    }

    const flavorName = merged.flavor ?? defaultShellFlavor();
    const flavor = this.isShellFlavor(flavorName) ? flavorName : undefined;
    if (!flavor) {
      errors.push(`publish.flavor must be one of ${SHELL_FLAVORS.join(', ')}: "${flavorName}"`);
    }

    const stepTimeoutMs = merged.stepTimeoutMs ?? 0;
    if (!Number.isInteger(stepTimeoutMs) || stepTimeoutMs < 0) {
      errors.push('publish.stepTimeoutMs must be a non-negative integer');
    }

    const verifyRemote = this.parseFlag(merged.verifyRemote ?? false);
    if (verifyRemote === undefined) {
      errors.push(`publish.verifyRemote must be one of ${[...TRUE_FLAGS, ...FALSE_FLAGS].join(', ')}: "${String(merged.verifyRemote)}"`);
    }

    const levelName = (env.LOG_LEVEL || 'info').toLowerCase();
    const level = Logger.isLevelName(levelName) ? levelName : undefined;
    if (!level) {
      errors.push(`logger.level must be one of error, warn, info, debug: "${levelName}"`);
    }

    const nodeEnvName = env.NODE_ENV || 'development';
    const nodeEnv = NODE_ENVS.find(name => name === nodeEnvName);
    if (!nodeEnv) {
      errors.push(`NODE_ENV must be one of ${NODE_ENVS.join(', ')}: "${nodeEnvName}"`);
    }

    if (errors.length > 0 || !flavor || verifyRemote === undefined || !level || !nodeEnv) {
      throw new ConfigurationError(errors);
    }

    return {
      nodeEnv,
      publish: {
        remoteUrl,
        remoteName,
        branch,
        commitMessage,
        flavor,
        stepTimeoutMs
      },
      github: {
        token: env.GITHUB_TOKEN || undefined,
        verifyRemote
      },
      logger: this.buildLoggerSettings(level, env)
    };
  }

  static overridesFromEnvironment(env: AppEnvironment): PublishOverrides {
    return {
      remoteUrl: env.PUBLISH_REMOTE_URL || undefined,
      remoteName: env.PUBLISH_REMOTE_NAME || undefined,
      branch: env.PUBLISH_BRANCH || undefined,
      commitMessage: env.PUBLISH_COMMIT_MESSAGE || undefined,
      flavor: env.PUBLISH_FLAVOR || undefined,
      stepTimeoutMs: env.PUBLISH_STEP_TIMEOUT_MS !== undefined && env.PUBLISH_STEP_TIMEOUT_MS !== ''
        ? Number(env.PUBLISH_STEP_TIMEOUT_MS)
        : undefined,
      verifyRemote: env.PUBLISH_VERIFY_REMOTE || undefined
    };
  }

  static loadFromFile(configPath: string): PublishOverrides {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError([
        `Could not read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      ]);
    }
    return this.parseFileOverrides(raw, configPath);
  }

  static parseFileOverrides(raw: unknown, source: string = 'config'): PublishOverrides {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigurationError([`${source} must contain a JSON object`]);
    }

    const errors: string[] = [];
    const record = new Map<string, unknown>(Object.entries(raw));

    const readString = (key: keyof PublishOverrides): string | undefined => {
      const value = record.get(key);
      if (value === undefined) return undefined;
      if (typeof value !== 'string') {
        errors.push(`${source}: "${key}" must be a string`);
        return undefined;
      }
      return value;
    };

    const stepTimeoutValue = record.get('stepTimeoutMs');
    if (stepTimeoutValue !== undefined && typeof stepTimeoutValue !== 'number') {
      errors.push(`${source}: "stepTimeoutMs" must be a number`);
    }
    const verifyRemoteValue = record.get('verifyRemote');
    if (verifyRemoteValue !== undefined && typeof verifyRemoteValue !== 'boolean') {
      errors.push(`${source}: "verifyRemote" must be a boolean`);
    }

    const overrides: PublishOverrides = {
      remoteUrl: readString('remoteUrl'),
      remoteName: readString('remoteName'),
      branch: readString('branch'),
      commitMessage: readString('commitMessage'),
      flavor: readString('flavor'),
      stepTimeoutMs: typeof stepTimeoutValue === 'number' ? stepTimeoutValue : undefined,
      verifyRemote: typeof verifyRemoteValue === 'boolean' ? verifyRemoteValue : undefined
    };

    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }
    return overrides;
  }

  static parseFlag(value: boolean | string): boolean | undefined {
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    if (TRUE_FLAGS.includes(normalized)) return true;
    if (FALSE_FLAGS.includes(normalized)) return false;
    return undefined;
  }

  static isShellFlavor(value: string): value is ShellFlavor {
    return SHELL_FLAVORS.some(flavor => flavor === value);
  }

  /**
   * git check-ref-format 규칙 중 흔히 걸리는 부분만 확인
   */
  static isValidBranchName(branch: string): boolean {
    if (!branch || branch === '@') return false;
    if (/[\s~^:?*[\\\x00-\x1f\x7f]/.test(branch)) return false;
    if (branch.startsWith('-') || branch.startsWith('/') || branch.endsWith('/')) return false;
    if (branch.endsWith('.') || branch.endsWith('.lock')) return false;
    if (branch.includes('..') || branch.includes('//') || branch.includes('@{')) return false;
    return branch.split('/').every(part => !part.startsWith('.'));
  }

  static isValidRemoteName(name: string): boolean {
    return /^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(name);
  }

  /**
   * 민감 정보를 가린 출력용 사본
   */
  static redact(config: AppConfig): AppConfig {
    return {
      ...config,
      publish: {
        ...config.publish,
        remoteUrl: RemoteUrlParser.redactCredentials(config.publish.remoteUrl)
      },
      github: {
        ...config.github,
        token: config.github.token ? '***' : undefined
      }
    };
  }

  private static merge(base: PublishOverrides, layer: PublishOverrides): PublishOverrides {
    return {
      remoteUrl: layer.remoteUrl ?? base.remoteUrl,
      remoteName: layer.remoteName ?? base.remoteName,
      branch: layer.branch ?? base.branch,
      commitMessage: layer.commitMessage ?? base.commitMessage,
      flavor: layer.flavor ?? base.flavor,
      stepTimeoutMs: layer.stepTimeoutMs ?? base.stepTimeoutMs,
      verifyRemote: layer.verifyRemote ?? base.verifyRemote
    };
  }

  private static buildLoggerSettings(level: LogLevelName, env: AppEnvironment): LoggerSettings {
    return {
      level,
      filePath: env.LOG_FILE || undefined,
      enableConsole: env.LOG_CONSOLE === 'true'
    };
  }
}
