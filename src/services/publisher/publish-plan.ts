import { PublishConfig, PublishPlan, PublishStep } from '../../types';

export const DEFAULT_COMMIT_MESSAGE = 'Initial commit: Upload sales dashboard project';
export const DEFAULT_BRANCH = 'main';
export const DEFAULT_REMOTE_NAME = 'origin';

type PlanInput = Pick<PublishConfig, 'remoteUrl' | 'remoteName' | 'branch' | 'commitMessage'>;

export class PublishPlanBuilder {
  /**
   * init → add → commit → branch -M → remote add → push -u 순서의 고정 단계 목록
   */
  static build(input: PlanInput): PublishPlan {
    const { remoteUrl, remoteName, branch, commitMessage } = input;

    const steps: PublishStep[] = [
      {
        id: 'init',
        description: 'Initializing Git repository',
        args: ['init']
      },
      {
        id: 'stage',
        description: 'Adding all files to staging area',
        args: ['add', '.']
      },
      {
        id: 'commit',
        description: 'Creating initial commit',
        args: ['commit', '-m', commitMessage]
      },
      {
        id: 'branch',
        description: `Setting ${branch} branch as default`,
        args: ['branch', '-M', branch]
      },
      {
        id: 'remote',
        description: `Adding remote ${remoteName}`,
        args: ['remote', 'add', remoteName, remoteUrl]
      },
      {
        id: 'push',
        description: `Pushing code to ${remoteName}`,
        args: ['push', '-u', remoteName, branch]
      }
    ];

    return {
      remoteName,
      remoteUrl,
      branch,
      commitMessage,
      steps
    };
  }
}
