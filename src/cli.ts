import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { StringDecoder } from 'string_decoder';
import type { ModuleOutcome, OrchestratorConfig, StreamChunk } from './types.js';
import {
  ArtifactError,
  INFRASTRUCTURE_EXIT_CODE,
  errorMessage,
} from './errors.js';
import {
  DEFAULT_CONFIG_FILE,
  loadConfig,
  parseNonNegativeInt,
  parsePositiveInt,
} from './utils/config.js';
import { planArtifacts } from './utils/artifact-name.js';
import { readLogTail } from './utils/log-tail.js';
import { ModuleRunner } from './runner/module-runner.js';
import { executeCatalogue } from './runner/run-aggregator.js';
import type { CommandExecutor } from './runner/executor.js';
import { LocalExecutor } from './runner/local-executor.js';
import { ContainerExecutor } from './docker/container.js';
import { render, toJsonReport } from './report/report-formatter.js';

export const VERSION = '1.0.0';

const SEPARATOR = '━'.repeat(46);
const DEFAULT_TAIL_LINES = 3;

interface CliOptions {
  config?: string;
  logDir?: string;
  threads?: string;
  maxConcurrent?: string;
  output?: string;
  tail?: string;
  stream?: boolean;
  dryRun?: boolean;
  keepContainers?: boolean;
}

/**
 * Parse `argv` (without the node and script entries), run the catalogue and
 * return the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  let exitCode = 0;

  const program = new Command();
  program
    .name('modular-tests')
    .description(
      'Run a test suite module by module, each in its own process, and report the failures',
    )
    .version(VERSION)
    .option(
      '-c, --config <file>',
      'Module catalogue and collaborator configuration',
      DEFAULT_CONFIG_FILE,
    )
    .option('-l, --log-dir <dir>', 'Directory for per-module log files')
    .option('-t, --threads <n>', 'Parallelism hint passed to the collaborator')
    .option(
      '-j, --max-concurrent <n>',
      'Maximum number of modules running at once',
    )
    .option('-o, --output <file>', 'Output JSON report to file')
    .option(
      '--tail <n>',
      'Lines of each module log to print after it finishes',
      String(DEFAULT_TAIL_LINES),
    )
    .option('--stream', 'Stream collaborator output to the terminal')
    .option('--dry-run', 'List the modules without running them')
    .option('--keep-containers', 'Keep containers after each module')
    .exitOverride()
    .action(async (options: CliOptions) => {
      exitCode = await orchestrate(options);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end here with exit code 0
      return error.exitCode === 0 ? 0 : INFRASTRUCTURE_EXIT_CODE;
    }
    console.error('Error:', errorMessage(error));
    return INFRASTRUCTURE_EXIT_CODE;
  }

  return exitCode;
}

function resolveConfig(options: CliOptions): OrchestratorConfig {
  const config = loadConfig(options.config ?? DEFAULT_CONFIG_FILE);

  if (options.logDir) {
    config.logDir = path.resolve(options.logDir);
  }
  if (options.threads !== undefined) {
    config.threads = parsePositiveInt(options.threads, '--threads');
  }
  if (options.maxConcurrent !== undefined) {
    config.maxConcurrent = parsePositiveInt(
      options.maxConcurrent,
      '--max-concurrent',
    );
  }

  return config;
}

async function orchestrate(options: CliOptions): Promise<number> {
  const config = resolveConfig(options);
  const tailLines = parseNonNegativeInt(
    options.tail ?? String(DEFAULT_TAIL_LINES),
    '--tail',
  );

  console.log('');
  console.log(chalk.bold('🧪 Running test suite (modular)'));
  console.log('='.repeat(50));
  console.log(`Collaborator: ${[config.command, ...config.args].join(' ')}`);
  if (config.container) {
    console.log(`Container:    ${config.container.image}`);
  }
  console.log(`Modules:      ${config.modules.length}`);
  console.log(`Log dir:      ${config.logDir}`);
  console.log('');

  if (options.dryRun) {
    const plan = planArtifacts(config.modules, config.logDir, config.logPrefix);
    console.log('[DRY RUN] Would run the following modules:');
    config.modules.forEach((moduleId, i) => {
      console.log(`  ${i + 1}. ${moduleId} -> ${plan.get(moduleId) ?? ''}`);
    });
    return 0;
  }

  try {
    fs.mkdirSync(config.logDir, { recursive: true });
  } catch (error) {
    throw new ArtifactError(
      `Cannot create log directory ${config.logDir}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const executor: CommandExecutor = config.container
    ? new ContainerExecutor(config.container, {
        keepContainers: options.keepContainers,
      })
    : new LocalExecutor();

  const runner = new ModuleRunner({
    executor,
    command: config.command,
    args: config.args,
    threads: config.threads,
    cwd: config.cwd,
    env: config.env,
    logDir: config.logDir,
    logPrefix: config.logPrefix,
    onOutput: options.stream ? createChunkPrinter() : undefined,
  });

  const summary = await executeCatalogue(config.modules, runner, {
    logDir: config.logDir,
    maxConcurrent: config.maxConcurrent,
    onModuleStart: (moduleId, index, total) => {
      console.log(SEPARATOR);
      console.log(`[${index + 1}/${total}] Testing: ${moduleId}`);
      console.log(SEPARATOR);
    },
    onModuleComplete: (outcome) => {
      if (!options.stream) {
        for (const line of readLogTail(outcome.logPath, tailLines)) {
          console.log(chalk.dim(line));
        }
      }
      printOutcome(outcome);
    },
  });

  const report = render(summary);
  console.log('');
  console.log(report.text);

  if (options.output) {
    const outputPath = path.resolve(options.output);
    try {
      fs.writeFileSync(
        outputPath,
        JSON.stringify(toJsonReport(summary), null, 2),
      );
    } catch (error) {
      throw new ArtifactError(
        `Cannot write report ${outputPath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    console.log(`\nReport written to: ${outputPath}`);
  }

  return report.exitCode;
}

// One decoder per module so a character split across chunks prints whole.
function createChunkPrinter(): (moduleId: string, chunk: StreamChunk) => void {
  const decoders = new Map<string, StringDecoder>();

  return (moduleId, chunk) => {
    if (chunk.type === 'stdout') {
      process.stdout.write(chunk.data);
      return;
    }
    let decoder = decoders.get(moduleId);
    if (!decoder) {
      decoder = new StringDecoder('utf8');
      decoders.set(moduleId, decoder);
    }
    const text = decoder.write(chunk.data);
    if (text) process.stderr.write(chalk.red(text));
  };
}

function printOutcome(outcome: ModuleOutcome): void {
  if (outcome.status === 'passed') {
    console.log(chalk.green(`✅ ${outcome.moduleId} passed`));
  } else {
    const reason = outcome.error
      ? outcome.error
      : outcome.signal
        ? `terminated by ${outcome.signal}`
        : `exit code ${outcome.exitCode}`;
    console.log(chalk.red(`❌ ${outcome.moduleId} FAILED (${reason})`));
    console.log(`   Log saved: ${outcome.logPath}`);
  }
  console.log('');
}
