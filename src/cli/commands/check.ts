import { Command } from 'commander';
import pc from 'picocolors';
import { registerCaseFile } from '../../cases/register.js';
import { loadCaseFile } from '../../config/case-loader.js';
import { loadConfig } from '../../config/loader.js';
import { ExecutionContext } from '../../context/execution-context.js';
import type { TestListener } from '../../context/listener.js';
import { createLogger, type LogSink, type Logger } from '../../logging/logger.js';
import { TestRegistry } from '../../runner/registry.js';
import type { TestResult } from '../../types/index.js';

export interface CheckOptions {
  config?: string;
  verbose?: boolean;
  json?: boolean;
}

export interface CheckIO {
  cwd?: string;
  /** Receives each line of human or JSON output. */
  out?: (line: string) => void;
  /** Sink for log lines. */
  err?: LogSink;
  color?: boolean;
}

export interface CheckSummary {
  exitCode: number;
  results: TestResult[];
}

type Colors = ReturnType<typeof pc.createColors>;

const statusColor = (c: Colors): Record<TestResult['status'], (text: string) => string> => ({
  passed: c.green,
  warning: c.yellow,
  skipped: c.dim,
  inconclusive: c.yellow,
  failed: c.red,
  error: c.red,
});

const STATUS_TEXT: Record<TestResult['status'], string> = {
  passed: '  ✓ PASS',
  warning: '  ! WARN',
  skipped: '  - SKIP',
  inconclusive: '  ? INCONCLUSIVE',
  failed: '  ✗ FAIL',
  error: '  ✗ ERROR',
};

function isFailure(result: TestResult): boolean {
  return result.status === 'failed' || result.status === 'error';
}

function consoleListener(log: (line: string) => void, verbose: boolean, c: Colors): TestListener {
  const label = statusColor(c);
  return {
    testStarted: (test) => {
      if (verbose) log(c.dim(`Running: ${test.id}`));
    },
    testFinished: (result) => {
      log(`${label[result.status](STATUS_TEXT[result.status])} ${result.test.id} ${c.dim(`(${result.durationMs}ms)`)}`);
      if (result.message && result.status !== 'passed') {
        for (const line of result.message.split('\n')) {
          log(c.dim(`    ${line}`));
        }
      }
    },
  };
}

function prepare(
  files: string[],
  options: CheckOptions,
  cwd: string,
  io: CheckIO
): { logger: Logger; registry: TestRegistry } {
  const { config, configPath } = loadConfig({ configPath: options.config, cwd });
  const logger = createLogger({
    name: 'tenet',
    level: options.verbose ? 'debug' : (config.log?.level ?? 'info'),
    write: io.err ?? process.stderr,
    color: io.color ?? false,
  });
  logger.debug(configPath ? `Config loaded from: ${configPath}` : 'No config file found, using defaults');

  const registry = new TestRegistry();
  for (const file of files) {
    const { caseFile, filePath } = loadCaseFile(file, cwd);
    const ids = registerCaseFile(registry, caseFile, config);
    logger.debug(`Registered ${ids.length} case(s) from ${filePath}`);
  }
  return { logger, registry };
}

/**
 * Load config and case files, run every case and report. Never exits the
 * process; the caller decides what to do with the exit code.
 */
export async function executeCheck(
  files: string[],
  options: CheckOptions,
  io: CheckIO = {}
): Promise<CheckSummary> {
  const cwd = io.cwd ?? process.cwd();
  const out = io.out ?? ((line: string) => console.log(line));
  const jsonOutput = options.json ?? false;
  const verbose = options.verbose ?? false;
  const c = pc.createColors(io.color ?? false);

  // Human-readable lines are suppressed in JSON mode
  const log: (line: string) => void = jsonOutput ? () => {} : out;

  let prepared: { logger: Logger; registry: TestRegistry };
  try {
    prepared = prepare(files, options, cwd, io);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (jsonOutput) {
      out(JSON.stringify({ error: message }, null, 2));
    } else {
      out(c.red(`Error: ${message}`));
    }
    return { exitCode: 1, results: [] };
  }
  const { logger, registry } = prepared;

  const root = new ExecutionContext();
  root.logger = logger;
  const results = await root.establishExecutionEnvironment(() =>
    registry.runAll({ listener: consoleListener(log, verbose, c) })
  );

  const failed = results.filter(isFailure).length;
  const passed = results.length - failed;

  if (jsonOutput) {
    out(
      JSON.stringify(
        {
          tests: results.map((r) => ({
            id: r.test.id,
            status: r.status,
            assertions: r.assertCount,
            duration: r.durationMs,
            message: r.message,
          })),
          passed,
          failed,
          total: results.length,
        },
        null,
        2
      )
    );
  } else {
    log(c.bold('─'.repeat(40)));
    log(
      `${c.bold('Results:')} ${c.green(`${passed} passed`)} ${failed > 0 ? c.red(`${failed} failed`) : c.dim('0 failed')}`
    );
  }

  return { exitCode: failed > 0 ? 1 : 0, results };
}

export const checkCommand = new Command('check')
  .description('Check declarative case files')
  .argument('<files...>', 'Case files to check')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Verbose output')
  .option('--json', 'Output results as JSON')
  .action(async (files: string[], options: CheckOptions) => {
    const { exitCode } = await executeCheck(files, options, { color: pc.isColorSupported });
    process.exit(exitCode);
  });
