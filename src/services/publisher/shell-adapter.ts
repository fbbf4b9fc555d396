import {
  PublishPlan,
  PublishStep,
  PublishStepId,
  ShellFlavor,
  ShellInvocation
} from '../../types';
import { RemoteUrlParser } from '../../utils/RemoteUrlParser';

export interface ShellAdapter {
  readonly flavor: ShellFlavor;
  readonly shell: string;
  toInvocation(args: ReadonlyArray<string>, program?: string): ShellInvocation;
  formatBanner(): string;
  formatProgress(step: PublishStep, index: number, total: number): string;
  formatCompletion(plan: PublishPlan): string;
  renderScript(plan: PublishPlan): string;
}

const BANNER_TEXT = 'Starting Git repository initialization';

/**
 * 단계 목록은 공통으로 두고 인용 규칙과 장식 문구만 셸별로 구현한다.
 */
abstract class BaseShellAdapter implements ShellAdapter {
  abstract readonly flavor: ShellFlavor;
  abstract readonly shell: string;

  protected abstract readonly safeArgPattern: RegExp;

  abstract formatBanner(): string;
  abstract formatProgress(step: PublishStep, index: number, total: number): string;
  abstract formatCompletion(plan: PublishPlan): string;
  abstract renderScript(plan: PublishPlan): string;

  // 항상 따옴표로 감싼 리터럴
  abstract quoteLiteral(value: string): string;

  quoteArg(value: string): string {
    if (value.length > 0 && this.safeArgPattern.test(value)) {
      return value;
    }
    return this.quoteLiteral(value);
  }

  toInvocation(args: ReadonlyArray<string>, program: string = 'git'): ShellInvocation {
    const command = [program, ...args.map(arg => this.quoteArg(arg))].join(' ');
    return {
      command,
      shell: this.shell,
      program,
      args: [...args]
    };
  }
}

const POSIX_STEP_ICONS: Readonly<Record<PublishStepId, string>> = {
  init: '📦',
  stage: '📄',
  commit: '💾',
  branch: '🌿',
  remote: '🔗',
  push: '⬆️'
};

export class PosixShellAdapter extends BaseShellAdapter {
  readonly flavor: ShellFlavor = 'posix';
  readonly shell = '/bin/sh';

  protected readonly safeArgPattern = /^[A-Za-z0-9_@%+=:,./-]+$/;

  quoteLiteral(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
  }

  formatBanner(): string {
    return `🚀 ${BANNER_TEXT}...`;
  }

  formatProgress(step: PublishStep): string {
    return `${POSIX_STEP_ICONS[step.id]} ${step.description}...`;
  }

  formatCompletion(plan: PublishPlan): string {
    return `✅ Done! Repository initialized and pushed to ${RemoteUrlParser.redactCredentials(plan.remoteUrl)}`;
  }

  renderScript(plan: PublishPlan): string {
    const lines: string[] = ['#!/bin/sh', 'set -e', ''];
    lines.push(`echo ${this.quoteLiteral(this.formatBanner())}`, '');

    plan.steps.forEach((step, index) => {
      lines.push(`echo ${this.quoteLiteral(this.formatProgress(step))}`);
      lines.push(this.toInvocation(step.args).command);
      if (index < plan.steps.length - 1) {
        lines.push('');
      }
    });

    lines.push('', `echo ${this.quoteLiteral(this.formatCompletion(plan))}`, '');
    return lines.join('\n');
  }
}

export class WindowsShellAdapter extends BaseShellAdapter {
  readonly flavor: ShellFlavor = 'windows';
  readonly shell = 'powershell.exe';

  // PowerShell은 쉼표, @ 등을 연산자로 해석하므로 허용 문자가 더 좁다
  protected readonly safeArgPattern = /^[A-Za-z0-9_:./-]+$/;

  quoteLiteral(value: string): string {
    return `'${value.replace(/'/g, `''`)}'`;
  }

  formatBanner(): string {
    return `=== ${BANNER_TEXT} ===`;
  }

  formatProgress(step: PublishStep, index: number, total: number): string {
    return `[${index + 1}/${total}] ${step.description}...`;
  }

  formatCompletion(plan: PublishPlan): string {
    return `Done! Repository initialized and pushed to ${RemoteUrlParser.redactCredentials(plan.remoteUrl)}`;
  }

  renderScript(plan: PublishPlan): string {
    const total = plan.steps.length;
    const lines: string[] = ["$ErrorActionPreference = 'Stop'", ''];
    lines.push(`Write-Host ${this.quoteLiteral(this.formatBanner())}`, '');

    plan.steps.forEach((step, index) => {
      lines.push(`Write-Host ${this.quoteLiteral(this.formatProgress(step, index, total))}`);
      lines.push(this.toInvocation(step.args).command);
      // 네이티브 명령 실패는 $ErrorActionPreference로 잡히지 않는다
      lines.push('if ($LASTEXITCODE -ne 0) { exit $LASTEXITCODE }');
      if (index < total - 1) {
        lines.push('');
      }
    });

    lines.push('', `Write-Host ${this.quoteLiteral(this.formatCompletion(plan))}`, '');
    return lines.join('\r\n');
  }
}

export function defaultShellFlavor(platform: NodeJS.Platform = process.platform): ShellFlavor {
  return platform === 'win32' ? 'windows' : 'posix';
}

export function createShellAdapter(flavor: ShellFlavor): ShellAdapter {
  switch (flavor) {
    case 'posix':
      return new PosixShellAdapter();
    case 'windows':
      return new WindowsShellAdapter();
  }
}
