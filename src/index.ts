#!/usr/bin/env node
import { config } from 'dotenv';
import { createCLI } from './cli/commands';

// Load environment variables (quiet to suppress logs)
config({ quiet: true });

/**
 * repo-publish entry point. 명령어 없이 실행하면 publish가 실행된다.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}

// Export classes for programmatic usage
export { createCLI } from './cli/commands';
export { AppConfigLoader } from './config/app-config';
export type { AppConfig } from './config/app-config';
export { RepositoryPublisher } from './services/publisher/repository-publisher';
export { PublishPlanBuilder } from './services/publisher/publish-plan';
export { createShellAdapter, PosixShellAdapter, WindowsShellAdapter } from './services/publisher/shell-adapter';
export { ChildProcessCommandRunner } from './services/git/command-runner';
export { GitService } from './services/git/git.service';
export * from './types';

// Run the application if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    console.error('❌ Unhandled error:', error);
    process.exit(1);
  });
}
