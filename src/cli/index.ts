/**
 * CLI - deploy, run and clean up patterns on an OGC API - Processes server
 *
 * Usage:
 *   ogc-patterns-tester run pattern-1 --timeout 600
 *   ogc-patterns-tester run-multiple pattern-1 pattern-2 --continue-on-error
 *   ogc-patterns-tester --json status
 *
 * Exit codes: 0 success, 1 failure, 130 interrupted.
 */

import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { config } from '../config/index.js';
import { logger, setLogLevel, setStderrOnly } from '../config/logger.js';
import { isAuthConfigured } from '../config/server-config.js';
import { errorMessage, isCancellation } from '../errors.js';
import { NotebookParser } from '../notebooks/notebook-parser.js';
import { runAll, runMultiple } from '../orchestrator/batch-runner.js';
import { RunContext } from '../orchestrator/run-context.js';
import { isValidPatternId } from '../patterns/definition-loader.js';
import { patternTypeOf, type ExecutionResult, type PatternId, type TestSummary } from '../types/index.js';
import {
  formatCleanup,
  formatJob,
  formatOutcomes,
  formatPatternList,
  formatResult,
  formatStatus,
  formatSummary,
} from './display.js';
import { GlobalOptionsSchema, createServices, type GlobalOptions, type Services } from './services.js';

const VERSION = '0.1.0';

/** Patterns published upstream, used when no IDs are given */
export const ALL_PATTERN_IDS: readonly PatternId[] = Array.from({ length: 12 }, (_, i) => `pattern-${i + 1}`);

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

// ============================================
// Option parsing
// ============================================

export function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Timeout must be a whole number of seconds (0 for unlimited).');
  }
  return parsed;
}

const RunCommandSchema = z.object({
  cleanup: z.boolean().default(true),
  timeout: z.number().int().nonnegative().default(config.run.defaultTimeoutSeconds),
});

const BatchCommandSchema = RunCommandSchema.extend({
  continueOnError: z.boolean().default(false),
  parallel: z.boolean().default(false),
});

const SyncCommandSchema = z.object({
  all: z.boolean().default(false),
  outputDir: z.string().default(config.patterns.dir),
  continueOnError: z.boolean().default(false),
});

// ============================================
// Interrupt handling
// ============================================

/**
 * First Ctrl+C reports the work in flight and cancels the run context;
 * pending requests and waits abort and the command exits with 130.
 * A second Ctrl+C exits immediately. Returns the uninstaller.
 */
function installInterruptHandler(
  context: RunContext,
  currentServices: () => Services | null,
  io: CliIo,
): () => void {
  let interrupts = 0;

  const onInterrupt = (): void => {
    interrupts += 1;
    if (interrupts > 1) {
      io.stderr('Interrupted again, exiting without cleanup\n');
      process.exit(130);
    }

    const services = currentServices();
    const jobUrl = services ? (jobId: string) => services.gateway.jobUrl(jobId) : undefined;
    const lines = [
      '',
      chalk.yellow('Interrupted (Ctrl+C), cancelling. Press Ctrl+C again to exit immediately.'),
      ...context.describeInFlight(jobUrl).map(line => `  ${line}`),
    ];
    io.stderr(`${lines.join('\n')}\n`);
    context.cancel();
  };

  process.on('SIGINT', onInterrupt);
  return () => {
    process.off('SIGINT', onInterrupt);
  };
}

// ============================================
// CLI
// ============================================

/**
 * Parse `argv` (as in process.argv) and run one command.
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const context = new RunContext();
  let globals: GlobalOptions = GlobalOptionsSchema.parse({});
  let services: Services | null = null;
  let exitCode = 0;

  const getServices = (): Services => {
    if (!services) services = createServices(globals, context);
    return services;
  };

  const print = (lines: readonly string[]): void => {
    if (globals.json || lines.length === 0) return;
    io.stdout(`${lines.join('\n')}\n`);
  };

  const printJson = (value: unknown): void => {
    if (globals.json) io.stdout(`${JSON.stringify(value, null, 2)}\n`);
  };

  const printError = (message: string): void => {
    io.stderr(`${chalk.red(message)}\n`);
  };

  const printSummary = (summary: TestSummary, continueOnError: boolean): void => {
    print(formatSummary(summary, globals.verbose));
    printJson(summary);
    exitCode = summary.failedPatterns > 0 && !continueOnError ? 1 : 0;
  };

  const printProgress = (result: ExecutionResult, index: number, total: number): void => {
    print([`[${index + 1}/${total}] ${result.patternId}`, ...formatResult(result, globals.verbose)]);
  };

  const program = new Command('ogc-patterns-tester')
    .description('Test CWL application package patterns on an OGC API - Processes server')
    .version(VERSION)
    .option('-c, --config <path>', 'Server JSON configuration file')
    .option('-s, --server-url <url>', 'Base URL of the OGC API - Processes server')
    .option('-t, --auth-token <token>', 'Authentication token')
    .option('-p, --patterns-dir <dir>', 'Directory containing pattern parameter files', config.patterns.dir)
    .option('-d, --download-dir <dir>', 'Directory for downloaded CWL files', config.patterns.downloadDir)
    .option('-f, --force-download', 'Re-download CWL files even if they exist locally', false)
    .option('-v, --verbose', 'Verbose output', false)
    .option('--json', 'Print machine-readable JSON to stdout', false)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program.hook('preAction', () => {
    globals = GlobalOptionsSchema.parse(program.opts());
    if (globals.verbose) setLogLevel('debug');
    if (globals.json) setStderrOnly(true);
  });

  program
    .command('run')
    .description('Deploy, execute, monitor and clean up one pattern')
    .argument('<pattern-id>', 'Pattern identifier, e.g. pattern-1')
    .option('--no-cleanup', 'Keep the process deployed after execution')
    .option('-T, --timeout <seconds>', 'Monitoring timeout, 0 for unlimited', parseTimeout, config.run.defaultTimeoutSeconds)
    .action(async (patternId: string, raw: unknown) => {
      const options = RunCommandSchema.parse(raw);
      const { loader, orchestrator } = getServices();

      if (!loader.exists(patternId)) {
        printError(`Error: Configuration file not found: ${loader.paramsPath(patternId)}`);
        exitCode = 1;
        return;
      }

      print([`Executing pattern: ${patternId}`]);
      const result = await orchestrator.runSingle(patternId, {
        cleanup: options.cleanup,
        timeoutSeconds: options.timeout,
      });
      print(formatResult(result, globals.verbose));
      printJson(result);
      exitCode = result.success ? 0 : 1;
    });

  program
    .command('run-multiple')
    .description('Run several patterns one after another')
    .argument('<pattern-ids...>', 'Pattern identifiers')
    .option('--no-cleanup', 'Keep the processes deployed after execution')
    .option('-T, --timeout <seconds>', 'Monitoring timeout per pattern, 0 for unlimited', parseTimeout, config.run.defaultTimeoutSeconds)
    .option('--continue-on-error', 'Exit 0 even when some patterns fail', false)
    .option('--parallel', 'Accepted for compatibility; patterns always run sequentially', false)
    .action(async (patternIds: string[], raw: unknown) => {
      const options = BatchCommandSchema.parse(raw);
      const { orchestrator } = getServices();

      const summary = await runMultiple(orchestrator, patternIds, {
        cleanup: options.cleanup,
        timeoutSeconds: options.timeout,
        parallel: options.parallel,
        onResult: printProgress,
      });
      printSummary(summary, options.continueOnError);
    });

  program
    .command('run-all')
    .description('Run every pattern found in the patterns directory')
    .option('--no-cleanup', 'Keep the processes deployed after execution')
    .option('-T, --timeout <seconds>', 'Monitoring timeout per pattern, 0 for unlimited', parseTimeout, config.run.defaultTimeoutSeconds)
    .option('--continue-on-error', 'Exit 0 even when some patterns fail', false)
    .action(async (raw: unknown) => {
      const options = BatchCommandSchema.parse(raw);
      const { loader, orchestrator } = getServices();

      const summary = await runAll(orchestrator, loader, {
        cleanup: options.cleanup,
        timeoutSeconds: options.timeout,
        onResult: printProgress,
      });
      printSummary(summary, options.continueOnError);
    });

  program
    .command('deploy')
    .description('Deploy a pattern without executing it')
    .argument('<pattern-id>', 'Pattern identifier')
    .action(async (patternId: string) => {
      const { orchestrator } = getServices();

      print([`Deploying pattern: ${patternId}`]);
      const deployed = await orchestrator.deploy(patternId);
      print([deployed ? chalk.green.bold('✓ Pattern deployed') : chalk.red.bold('✗ Deployment failed')]);
      printJson({ patternId, deployed });
      exitCode = deployed ? 0 : 1;
    });

  program
    .command('cleanup')
    .description('Remove a deployed pattern and its jobs from the server')
    .argument('<pattern-id>', 'Pattern identifier')
    .action(async (patternId: string) => {
      const { orchestrator } = getServices();

      print([`Cleaning up pattern: ${patternId}`]);
      orchestrator.adopt(patternId);
      const report = await orchestrator.cleanupWithReport(patternId);
      print(formatCleanup(report));
      printJson(report);
      exitCode = report.ok ? 0 : 1;
    });

  program
    .command('cleanup-all')
    .description('Clean up every pattern deployed by this invocation')
    .action(async () => {
      const { orchestrator } = getServices();

      print(['Cleaning up all deployed patterns...']);
      const ok = await orchestrator.cleanupAll();
      print([ok ? chalk.green.bold('✓ All patterns cleaned up') : chalk.yellow.bold('✗ Some cleanups failed')]);
      printJson({ ok });
      exitCode = ok ? 0 : 1;
    });

  program
    .command('status')
    .description('Show the server and orchestrator state')
    .action(() => {
      const { orchestrator, serverConfig } = getServices();
      const server = { baseUrl: serverConfig.baseUrl, authenticated: isAuthConfigured(serverConfig) };
      const status = orchestrator.getStatus();

      print(formatStatus(status, server));
      printJson({ server, ...status });
    });

  program
    .command('list-patterns')
    .description('List the patterns in the patterns directory')
    .action(() => {
      const { loader } = getServices();
      const patterns = loader.listPatternIds().map(patternId => ({
        patternId,
        patternType: patternTypeOf(patternId),
        parameters: globals.verbose || globals.json ? (loader.load(patternId)?.parameters ?? null) : null,
      }));

      print(formatPatternList(patterns, globals.verbose));
      printJson(patterns);
    });

  program
    .command('check-job')
    .description('Show the status of a job on the server')
    .argument('<job-id>', 'Job identifier')
    .action(async (jobId: string) => {
      const { gateway } = getServices();

      print([`Checking job status: ${jobId}`]);
      try {
        const snapshot = await gateway.pollStatus(jobId, { signal: context.signal });
        print(formatJob(snapshot, gateway.jobUrl(jobId)));
        printJson({ ...snapshot, jobUrl: gateway.jobUrl(jobId) });
      } catch (error) {
        if (isCancellation(error)) throw error;
        printError(`Error checking job: ${errorMessage(error)}`);
        exitCode = 1;
      }
    });

  program
    .command('download')
    .description('Download CWL workflows, replacing cached copies')
    .argument('[pattern-ids...]', 'Pattern identifiers (default: pattern-1 to pattern-12)')
    .action(async (patternIds: string[]) => {
      const { loader, cache } = getServices();
      const ids = patternIds.length > 0 ? patternIds : ALL_PATTERN_IDS;
      const results: Record<PatternId, boolean> = {};

      print([`Downloading CWL workflows for ${ids.length} pattern(s)...`]);
      for (const patternId of ids) {
        if (!isValidPatternId(patternId)) {
          print([chalk.red(`✗ ${patternId} - Invalid pattern ID`)]);
          results[patternId] = false;
          continue;
        }
        const ok = await cache.ensure(patternId, loader.workflowUrl(patternId), true, context.signal);
        print([ok ? chalk.green(`✓ ${patternId}`) : chalk.red(`✗ ${patternId} - Failed`)]);
        results[patternId] = ok;
      }

      const succeeded = Object.values(results).filter(Boolean).length;
      const failed = ids.length - succeeded;
      print(['', `Download complete: ${succeeded} succeeded, ${failed} failed`]);
      printJson(results);
      exitCode = failed > 0 ? 1 : 0;
    });

  program
    .command('sync-params')
    .description('Extract pattern parameters from the published notebooks')
    .argument('[pattern-ids...]', 'Pattern identifiers')
    .option('--all', 'Sync pattern-1 to pattern-12', false)
    .option('-o, --output-dir <dir>', 'Directory the parameter files are written to', config.patterns.dir)
    .option('--continue-on-error', 'Keep syncing after a pattern fails', false)
    .action(async (patternIds: string[], raw: unknown) => {
      const options = SyncCommandSchema.parse(raw);

      let ids: readonly PatternId[];
      if (options.all) {
        ids = ALL_PATTERN_IDS;
        print(['Syncing all patterns (1-12)...']);
      } else if (patternIds.length > 0) {
        // IDs become file names under the output directory
        const invalid = patternIds.filter(id => !isValidPatternId(id));
        if (invalid.length > 0) {
          for (const id of invalid) printError(`✗ ${id} - Invalid pattern ID`);
          exitCode = 1;
          return;
        }
        ids = patternIds;
      } else {
        printError('Error: Specify pattern IDs or use --all');
        exitCode = 1;
        return;
      }

      print([`Output directory: ${options.outputDir}`, '']);
      const results = await new NotebookParser().syncAll(ids, options.outputDir, {
        continueOnError: options.continueOnError,
        signal: context.signal,
      });

      print(formatOutcomes('Sync Results:', results, 'synced successfully'));
      printJson(results);
      const succeeded = Object.values(results).filter(Boolean).length;
      exitCode = succeeded < Object.keys(results).length ? 1 : 0;
    });

  const uninstall = installInterruptHandler(context, () => services, io);
  try {
    await program.parseAsync([...argv]);
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    if (isCancellation(error)) {
      io.stderr('\nExecution interrupted by user (Ctrl+C)\n');
      return 130;
    }
    logger.error('Command failed', { error: errorMessage(error) });
    printError(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    uninstall();
  }
}
