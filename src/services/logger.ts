import fs from 'fs/promises';
import path from 'path';
import { LoggerSettings, LogLevelName } from '../types';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export interface LoggerConfig {
  level: LogLevel;
  filePath?: string;
  enableConsole?: boolean;
}

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_BY_NAME: Readonly<Record<LogLevelName, LogLevel>> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

export class Logger {
  private readonly config: Required<LoggerConfig>;
  private readonly logLevelNames = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(config: LoggerConfig) {
    this.config = {
      level: config.level,
      filePath: config.filePath || '',
      enableConsole: config.enableConsole ?? true
    };
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * 대기 중인 파일 쓰기가 모두 끝날 때까지 기다린다.
   */
  flush(): Promise<void> {
    return this.pendingWrite;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    // 설정된 로그 레벨보다 낮은 레벨은 무시
    if (level < this.config.level) {
      return;
    }

    const timestamp = new Date().toISOString();
    const levelName = this.logLevelNames[level] || 'UNKNOWN';
    const contextStr = context ? this.formatContext(context) : '';
    const logMessage = `${timestamp} [${levelName}] ${message}${contextStr}`;

    // 진행 메시지는 stdout을 쓰므로 로그는 stderr로 보낸다
    if (this.config.enableConsole) {
      console.error(logMessage);
    }

    if (this.config.filePath) {
      // 쓰기 순서를 보장하기 위해 직렬화
      this.pendingWrite = this.pendingWrite.then(() => this.writeToFile(logMessage));
    }
  }

  private formatContext(context: LogContext): string {
    try {
      const formatted = JSON.stringify(context, this.errorReplacer);
      return ` ${formatted}`;
    } catch (error) {
      // 순환 참조 등
      return ` [Context serialization failed: ${error instanceof Error ? error.message : 'Unknown error'}]`;
    }
  }

  private errorReplacer(_key: string, value: unknown): unknown {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message
      };
    }
    return value;
  }

  private async writeToFile(message: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.config.filePath), { recursive: true });
      await fs.appendFile(this.config.filePath, `${message}\n`);
    } catch (error) {
      // 파일 쓰기 실패는 콘솔 경고로만 남긴다 (재귀 로깅 방지)
      if (this.config.enableConsole) {
        console.warn(`Failed to write to log file: ${error instanceof Error ? error.message : 'Unknown error'}`);
      }
    }
  }

  static isLevelName(name: string): name is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, name);
  }

  static fromSettings(settings: LoggerSettings): Logger {
    return new Logger({
      level: LEVEL_BY_NAME[settings.level],
      filePath: settings.filePath,
      enableConsole: settings.enableConsole
    });
  }

  static createConsoleLogger(level: LogLevel = LogLevel.INFO): Logger {
    return new Logger({
      level,
      enableConsole: true
    });
  }

  static createSilentLogger(): Logger {
    return new Logger({
      level: LogLevel.ERROR,
      enableConsole: false
    });
  }
}
