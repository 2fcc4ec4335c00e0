import { Command, InvalidArgumentError } from 'commander';
import { decipher, type DecipherReport } from '../modules/pipeline/decipher.js';
import { formatCandidates } from '../modules/pipeline/format.js';
import { loadRunConfig } from '../modules/pipeline/runConfig.js';
import { HINT_MODES, isHintMode, type HintMode } from '../modules/scoring/hint.js';
import type { Clock } from '../modules/strategies/deadline.js';
import { getConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';

export interface CliOptions {
  config?: string;
  top?: number;
  hint?: HintMode;
  budget?: number;
  strategy?: string[];
}

export interface CliIO {
  stdout: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('expected a non-negative number of seconds');
  }
  return parsed;
}

function parseHintMode(value: string): HintMode {
  if (!isHintMode(value)) {
    throw new InvalidArgumentError(`expected one of ${HINT_MODES.join(', ')}`);
  }
  return value;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export async function runDecipherCommand(
  ciphertext: string,
  options: CliOptions,
  io: CliIO
): Promise<DecipherReport> {
  const config = getConfig(io.env);
  const runConfig = await loadRunConfig(options.config ?? config.decipher.configPath, {
    activeStrategies: options.strategy,
    global: {
      totalBudgetS: options.budget ?? config.decipher.totalBudgetS,
      topK: options.top ?? config.decipher.topK,
      showHint: options.hint,
    },
  });

  const report = decipher(ciphertext, runConfig, io.clock);
  if (report.budgetExceeded) {
    logger.warn('Global time budget exhausted; results may be incomplete');
  }
  io.stdout(`${formatCandidates(report.ranked, runConfig.global.showHint)}\n`);
  return report;
}

export function createProgram(io: CliIO = { stdout: (text) => process.stdout.write(text) }): Command {
  const program = new Command();
  program
    .name('brute-decipher')
    .description('Recover plaintext from layered encodings and shift ciphers')
    .argument('<ciphertext>', 'text to decipher (quote it)')
    .option('-c, --config <path>', 'run configuration JSON')
    .option('--top <n>', 'number of candidates to print', parsePositiveInt)
    .option('--hint <mode>', `naming hint display (${HINT_MODES.join('|')})`, parseHintMode)
    .option('--budget <seconds>', 'total wall-clock budget', parseSeconds)
    .option('-s, --strategy <name>', 'run only this strategy (repeatable)', collect)
    .action(async (ciphertext: string, options: CliOptions) => {
      await runDecipherCommand(ciphertext, options, io);
    });
  return program;
}
