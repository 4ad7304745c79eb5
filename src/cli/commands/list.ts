/**
 * List command
 * Shows the projects a run would test without spawning anything
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/index.js';
import { resolveWorkspaceRoot } from '../../config/workspace-root.js';
import { planProjects, printDiscovery, printWarnings, printNoProjects } from '../../orchestrator/index.js';
import { PLATFORM_LABELS } from '../../types/platform.js';
import { printSection, printTable, setVerbose } from '../output.js';

export interface ListCommandOptions {
  cwd?: string;
  root?: string[];
  verbose?: boolean;
  json?: boolean;
}

/**
 * Create the list command
 */
export function createListCommand(): Command {
  return new Command('list')
    .alias('ls')
    .description('List discovered projects, their platforms and runners')
    .option('-C, --cwd <dir>', 'Workspace root (default: nearest config file or git root)')
    .option('--root <dir...>', 'Root directories to scan, in order')
    .option('-v, --verbose', 'Show skipped directories')
    .option('--json', 'Output as JSON')
    .action(async (options: ListCommandOptions) => {
      const workspaceRoot = options.cwd
        ? path.resolve(options.cwd)
        : await resolveWorkspaceRoot(process.cwd());

      const overrides: Record<string, unknown> = {};
      if (options.root && options.root.length > 0) {
        overrides.discovery = { roots: options.root };
      }
      const config = await loadConfig({ cwd: workspaceRoot, overrides });
      setVerbose(options.verbose === true || config.output.verbose);

      const plan = await planProjects(workspaceRoot, config);

      if (options.json) {
        console.log(JSON.stringify(plan, null, 2));
        return;
      }

      printDiscovery(plan.projects);
      printWarnings(plan.warnings);

      if (plan.targets.length === 0) {
        printNoProjects();
        return;
      }

      printSection('Runners');
      printTable(
        ['Project', 'Platform', 'Runner'],
        plan.targets.map(({ project, adapter }) => [
          project.name,
          PLATFORM_LABELS[project.platform],
          path.relative(workspaceRoot, adapter),
        ])
      );
    });
}
