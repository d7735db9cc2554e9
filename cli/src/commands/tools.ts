import chalk from 'chalk';
import { Command } from 'commander';
import { getAllTools, getToolsByGroup, TOOL_GROUPS } from '../core/registry/index.js';
import type { ToolGroup } from '../core/registry/index.js';

function isToolGroup(value: string): value is ToolGroup {
  return TOOL_GROUPS.some((g) => g === value);
}

export function registerToolsCommand(program: Command): void {
  program
    .command('tools')
    .description('List the accounting tools the router can suggest')
    .option('-g, --group <group>', `Filter by group: ${TOOL_GROUPS.join(', ')}`)
    .option('--json', 'Output as JSON')
    .action((opts: { group?: string; json?: boolean }) => {
      const { group, json } = opts;
      if (group !== undefined && !isToolGroup(group)) {
        console.error(chalk.red(`Unknown group: ${group}. Valid: ${TOOL_GROUPS.join(', ')}`));
        process.exit(1);
      }

      const tools = group !== undefined && isToolGroup(group) ? getToolsByGroup(group) : getAllTools();

      if (json) {
        console.log(JSON.stringify({ count: tools.length, tools }, null, 2));
        return;
      }

      let current: ToolGroup | undefined;
      for (const tool of tools) {
        if (tool.group !== current) {
          current = tool.group;
          console.log(chalk.bold.cyan(`\n── ${current} ──`));
        }
        const flag = tool.readOnly ? '' : chalk.yellow(' [writes]');
        console.log(`  ${chalk.bold(tool.name)}${flag}  ${chalk.dim(tool.purpose)}`);
      }
      console.log(chalk.dim(`\n${tools.length} tools`));
    });
}
