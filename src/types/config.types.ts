import { ShellFlavor } from './publish.types';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

export type NodeEnv = 'development' | 'production' | 'test';

export interface PublishConfig {
  readonly remoteUrl: string;
  readonly remoteName: string;
  readonly branch: string;
  readonly commitMessage: string;
  readonly flavor: ShellFlavor;
  readonly stepTimeoutMs: number;
}

export interface GitHubConfig {
  readonly token?: string;
  readonly verifyRemote: boolean;
}

export interface LoggerSettings {
  readonly level: LogLevelName;
  readonly filePath?: string;
  readonly enableConsole: boolean;
}

/**
 * 설정 소스(환경변수, 파일, CLI 옵션) 하나가 제공하는 값.
 * 정의되지 않은 필드는 하위 소스의 값을 유지한다.
 */
export interface PublishOverrides {
  readonly remoteUrl?: string;
  readonly remoteName?: string;
  readonly branch?: string;
  readonly commitMessage?: string;
  readonly flavor?: string;
  readonly stepTimeoutMs?: number;
  // 환경변수에서는 문자열 그대로 들어오고 resolve에서 검증한다
  readonly verifyRemote?: boolean | string;
}

export class ConfigurationError extends Error {
  constructor(public readonly errors: ReadonlyArray<string>) {
    super(`Configuration validation failed:\n${errors.join('\n')}`);
    this.name = 'ConfigurationError';
  }
}
