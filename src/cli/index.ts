#!/usr/bin/env node
import process from 'process';
import path from 'path';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { OntologyExplorer } from '../explorer';
import { TraversalResult } from '../graph/navigator/traversal-result';
import { listPatterns } from '../graph/query-patterns';
import { loadOntologySnapshot } from '../ontology/snapshot-loader';
import { EntityType, OntologySnapshot } from '../ontology/types';
import { config } from '../utils/config';
import { logger } from '../utils/logger';
import { PolicyFlags, parseEntityType, policyFromFlags } from './policy-flags';

interface DataFlags {
  data?: string[];
  verbose?: boolean;
}

interface NavigateFlags extends PolicyFlags, DataFlags {
  type: string;
  json?: boolean;
}

interface TraceFlags extends DataFlags {
  json?: boolean;
}

// Check for Unicode support and provide fallbacks
const getEmoji = (emoji: string, fallback: string): string => {
  const supportsUnicode =
    process.env.TERM !== 'dumb' &&
    (!process.env.CI || process.env.CI === 'false') &&
    process.platform !== 'win32';

  return supportsUnicode ? emoji : fallback;
};

function fail(message: string, error: unknown): never {
  console.error(chalk.red(`\n${getEmoji('❌', '[ERROR]')} ${message}`));
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
}

async function loadSnapshot(flags: DataFlags): Promise<OntologySnapshot> {
  if (flags.verbose) {
    logger.level = 'debug';
  }

  const directories = flags.data ?? (config.ontology.dataDir ? [config.ontology.dataDir] : []);
  if (directories.length === 0) {
    throw new Error('No ontology data directory given. Pass --data <dir> or set ONTOLOGY_DATA_DIR.');
  }

  const spinner = ora('Loading ontology...').start();
  try {
    const snapshot = await loadOntologySnapshot(directories.map(dir => path.resolve(dir)));
    spinner.succeed('Ontology loaded');
    return snapshot;
  } catch (error) {
    spinner.fail('Failed to load ontology');
    throw error;
  }
}

function printResult(result: TraversalResult): void {
  if (result.isEmpty()) {
    console.log(chalk.yellow('\nNo entities matched.'));
    return;
  }

  const depths = Array.from(result.depthMap.keys()).sort((a, b) => a - b);
  for (const depth of depths) {
    console.log(chalk.blue(`\nDepth ${depth}`));
    for (const node of result.getNodesAtDepth(depth)) {
      const name = typeof node.entity.name === 'string' ? ` ${chalk.white(node.entity.name)}` : '';
      const via = node.path.length > 0 ? chalk.gray(` via ${node.path.join(' → ')}`) : '';
      console.log(`  ${chalk.cyan(node.entityType)} ${node.entityId}${name}${via}`);
    }
  }

  const stats = result.statistics;
  console.log(
    chalk.gray(
      `\n${stats.nodesReturned} returned, ${stats.nodesVisited} visited, ` +
        `${stats.relationshipsTraversed} edges, max depth ${stats.maxDepthReached}`
    )
  );
}

const collectDirs = (value: string, previous: string[] | undefined): string[] => [
  ...(previous ?? []),
  value,
];

const program = new Command();

program
  .name('ontology-nav')
  .description('Explore an AI risk and capability knowledge graph by policy-driven traversal')
  .version('0.1.0');

// Navigate command
program
  .command('navigate')
  .description('Breadth-first traversal from a start entity')
  .argument('<startId>', 'Id of the start entity')
  .requiredOption('--type <entityType>', `Type of the start entity (e.g. ${EntityType.AI_TASK})`)
  .option('--data <dir>', 'Ontology data directory (repeatable)', collectDirs)
  .option('--pattern <name>', 'Named query pattern to use as the base policy')
  .option('--max-depth <depth>', 'Maximum traversal depth')
  .option('--include-rel <relations>', 'Only follow these relationships (comma-separated)')
  .option('--exclude-rel <relations>', 'Never follow these relationships (comma-separated)')
  .option('--include-type <types>', 'Only return these entity types (comma-separated)')
  .option('--exclude-type <types>', 'Never return these entity types (comma-separated)')
  .option('--max-results <count>', 'Stop after this many returned entities')
  .option('--json', 'Print the result as JSON')
  .option('--verbose', 'Enable verbose logging')
  .action(async (startId: string, options: NavigateFlags) => {
    try {
      const startType = parseEntityType(options.type);
      const policy = policyFromFlags(options);
      const explorer = new OntologyExplorer(await loadSnapshot(options));

      const result = explorer.navigate(startId, startType, { policy });

      if (options.json) {
        console.log(JSON.stringify(result.toJSON(), null, 2));
      } else {
        printResult(result);
      }
    } catch (error) {
      fail('Navigation failed:', error);
    }
  });

// Trace command
program
  .command('trace')
  .description('Show task → capabilities → intrinsics and adapters')
  .argument('<taskId>', 'Id of the AI task')
  .option('--data <dir>', 'Ontology data directory (repeatable)', collectDirs)
  .option('--json', 'Print the trace as JSON')
  .option('--verbose', 'Enable verbose logging')
  .action(async (taskId: string, options: TraceFlags) => {
    try {
      const explorer = new OntologyExplorer(await loadSnapshot(options));
      const trace = explorer.traceTaskToIntrinsics({ id: taskId });

      if (!trace) {
        console.log(chalk.yellow(`\nNo AI task found with id '${taskId}'`));
        return;
      }

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              task: trace.task.id,
              capabilities: trace.capabilities.map(capability => capability.id),
              intrinsics_by_capability: Object.fromEntries(
                Array.from(trace.intrinsicsByCapability, ([capabilityId, intrinsics]) => [
                  capabilityId,
                  intrinsics.map(intrinsic => intrinsic.id),
                ])
              ),
              all_intrinsics: trace.allIntrinsics.map(intrinsic => intrinsic.id),
            },
            null,
            2
          )
        );
        return;
      }

      console.log(chalk.green(`\n${getEmoji('🎯', '>')} ${trace.task.id}`));
      for (const capability of trace.capabilities) {
        console.log(chalk.cyan(`  ├─ ${capability.id}`));
        for (const intrinsic of trace.intrinsicsByCapability.get(capability.id) ?? []) {
          console.log(chalk.gray(`  │   └─ ${intrinsic.id}`));
        }
      }
      console.log(
        chalk.blue(
          `\n${trace.capabilities.length} capabilities, ${trace.allIntrinsics.length} intrinsics and adapters`
        )
      );
    } catch (error) {
      fail('Trace failed:', error);
    }
  });

// Patterns command
program
  .command('patterns')
  .description('List the named query patterns')
  .action(() => {
    for (const [name, description] of Object.entries(listPatterns())) {
      console.log(`${chalk.cyan(name.padEnd(32))} ${chalk.gray(description)}`);
    }
  });

// Help and error handling
program.configureHelp({
  sortSubcommands: true,
});

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.blue('See --help for a list of available commands.'));
  process.exit(1);
});

process.on('uncaughtException', error => {
  logger.error('Uncaught exception:', error);
  console.error(chalk.red(`\n${getEmoji('💥', '[FATAL]')} Uncaught exception:`), error.message);
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason });
  console.error(chalk.red(`\n${getEmoji('💥', '[FATAL]')} Unhandled promise rejection:`), reason);
  process.exit(1);
});

program.parseAsync().catch(error => fail('Command failed:', error));
