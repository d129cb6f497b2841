import fs from 'fs/promises';

import {
  loadConfig,
  loadInlineConfig,
  getGlobalConfigPath,
  isPlainObject,
  DatesortConfig,
  DatesortConfigInput,
  LoadConfigOptions,
} from './config';
import { startSourceWatcher, WatchSession } from './watcher';
import { logger, setLogLevel } from './logger';
import { WorkCoordinator } from './workflow/coordinator';
import { ProcessingResult, RunSummary, TransferMode } from './types/Processing';
import { RunAbortedError, DatesortError, errorMessage } from './errors';
import { formatCaptureDate } from './utils/captureDate';

const VERSION = '0.1.0';

export class DatesortCliError extends DatesortError {
  constructor(message: string) {
    super(message);
    this.name = 'DatesortCliError';
  }
}

type SessionFlags = {
  dryRun?: boolean;
  mode?: TransferMode;
  concurrency?: number;
  watch?: boolean;
  verbose?: boolean;
};

type RunCommandOptions = SessionFlags & { config?: string };

type ValidateCommandOptions = {
  config?: string;
  dryRun?: boolean;
};

type InlineCommandOptions = SessionFlags & {
  source: string;
  destination?: string;
};

export type ParsedArgs =
  | { kind: 'run'; options: RunCommandOptions }
  | { kind: 'validate'; options: ValidateCommandOptions }
  | { kind: 'inline'; options: InlineCommandOptions };

/**
 * @returns process exit code
 */
export async function runCli(argv: string[] = process.argv): Promise<number> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printHelp();
    return 0;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return 0;
  }

  const parsed = parseArgs(args);

  if (parsed.kind === 'validate') {
    const configPath = await resolveConfigPath('validate', parsed.options.config);
    const config = await loadConfig(configPath, { dryRun: Boolean(parsed.options.dryRun) });
    printConfigSummary(config);
    logger.info('Configuration looks good.');
    return 0;
  }

  const flags = parsed.options;
  if (flags.verbose) {
    setLogLevel('debug');
  }

  const config =
    parsed.kind === 'run'
      ? await loadConfig(await resolveConfigPath('run', parsed.options.config), overridesFrom(flags))
      : await loadInlineRunConfig(parsed.options);

  return startRunSession(config, { watch: Boolean(flags.watch), verbose: Boolean(flags.verbose) });
}

export function parseArgs(args: string[]): ParsedArgs {
  if (args.length === 0) {
    throw new DatesortCliError('Provide a command (run | validate) or <source> <destination>.');
  }

  const [first, ...rest] = args;
  if (first === 'run') {
    return { kind: 'run', options: parseRunOptions(rest) };
  }
  if (first === 'validate') {
    return { kind: 'validate', options: parseValidateOptions(rest) };
  }
  if (first.startsWith('-')) {
    throw new DatesortCliError('Provide a source path before specifying options.');
  }
  return { kind: 'inline', options: parseInlineOptions(first, rest) };
}

function parseRunOptions(tokens: string[]): RunCommandOptions {
  const options: RunCommandOptions = {};
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('-')) {
      throw new DatesortCliError(`Unexpected argument "${token}".`);
    }
    const { flag, inlineValue } = splitFlagToken(token);
    if (flag === '--config' || flag === '-c') {
      const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
      options.config = value;
      i = nextIndex;
      continue;
    }
    i = applySessionFlag(options, flag, inlineValue, tokens, i);
  }
  return options;
}

function parseValidateOptions(tokens: string[]): ValidateCommandOptions {
  const options: ValidateCommandOptions = {};
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('-')) {
      throw new DatesortCliError(`Unexpected argument "${token}".`);
    }
    const { flag, inlineValue } = splitFlagToken(token);
    switch (flag) {
      case '--config':
      case '-c': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.config = value;
        i = nextIndex;
        break;
      }
      case '--dry-run':
        options.dryRun = true;
        break;
      default:
        throw new DatesortCliError(`Unknown option "${flag}".`);
    }
  }
  return options;
}

function parseInlineOptions(source: string, tokens: string[]): InlineCommandOptions {
  const options: InlineCommandOptions = { source };
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('-')) {
      if (options.destination !== undefined) {
        throw new DatesortCliError(`Unexpected argument "${token}".`);
      }
      options.destination = token;
      continue;
    }
    const { flag, inlineValue } = splitFlagToken(token);
    i = applySessionFlag(options, flag, inlineValue, tokens, i);
  }
  if (options.destination === undefined) {
    throw new DatesortCliError('Provide a destination path after the source path.');
  }
  return options;
}

/**
 * Flags shared by `run` and the inline shortcut
 *
 * @returns index of the last token consumed
 */
function applySessionFlag(
  options: SessionFlags,
  flag: string,
  inlineValue: string | undefined,
  tokens: string[],
  index: number
): number {
  switch (flag) {
    case '--dry-run':
      options.dryRun = true;
      return index;
    case '--copy':
      options.mode = 'copy';
      return index;
    case '--move':
      options.mode = 'move';
      return index;
    case '--watch':
      options.watch = true;
      return index;
    case '--verbose':
      options.verbose = true;
      return index;
    case '--concurrency':
    case '-j': {
      const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, index);
      const concurrency = Number(value);
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new DatesortCliError(`Option ${flag} expects a positive integer.`);
      }
      options.concurrency = concurrency;
      return nextIndex;
    }
    default:
      throw new DatesortCliError(`Unknown option "${flag}".`);
  }
}

function splitFlagToken(token: string): { flag: string; inlineValue?: string } {
  if (token.startsWith('--')) {
    const eqIndex = token.indexOf('=');
    if (eqIndex !== -1) {
      return { flag: token.slice(0, eqIndex), inlineValue: token.slice(eqIndex + 1) };
    }
  }
  return { flag: token };
}

function consumeOptionValue(
  flag: string,
  inlineValue: string | undefined,
  tokens: string[],
  currentIndex: number
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined && inlineValue.length > 0) {
    return { value: inlineValue, nextIndex: currentIndex };
  }
  const nextToken = tokens[currentIndex + 1];
  if (!nextToken) {
    throw new DatesortCliError(`Option ${flag} requires a value.`);
  }
  return { value: nextToken, nextIndex: currentIndex + 1 };
}

function overridesFrom(flags: SessionFlags): LoadConfigOptions {
  return { dryRun: flags.dryRun, mode: flags.mode, concurrency: flags.concurrency };
}

/**
 * Inline runs take everything except the paths from the global config, if present
 */
async function loadInlineRunConfig(options: InlineCommandOptions): Promise<DatesortConfig> {
  const defaults = await loadGlobalDefaults();
  const inlineConfig: DatesortConfigInput = {
    ...defaults,
    source: options.source,
    destination: options.destination,
  };
  return loadInlineConfig(inlineConfig, overridesFrom(options));
}

async function startRunSession(
  config: DatesortConfig,
  options: { watch: boolean; verbose: boolean }
): Promise<number> {
  printConfigSummary(config);

  const coordinator = new WorkCoordinator(config, { logger });
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal. Finishing files in flight.');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  let summary: RunSummary;
  try {
    summary = await drainResults(coordinator, controller.signal);
  } catch (error) {
    if (error instanceof RunAbortedError) {
      printSummary(error.summary);
      logger.error({ err: error.message }, 'Run aborted.');
      return 2;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  printSummary(summary);

  if (options.watch && !summary.cancelled) {
    await watchSource(config, coordinator, options.verbose);
    printSummary(coordinator.summary());
    return coordinator.summary().failed > 0 ? 1 : 0;
  }

  return summary.failed > 0 || summary.cancelled ? 1 : 0;
}

async function drainResults(coordinator: WorkCoordinator, signal: AbortSignal): Promise<RunSummary> {
  const results = coordinator.results(signal);
  while (true) {
    const step = await results.next();
    if (step.done) {
      return step.value;
    }
    reportResult(step.value);
  }
}

/**
 * Keep organizing new arrivals until SIGINT/SIGTERM. Files are handled one
 * at a time, in arrival order.
 */
async function watchSource(config: DatesortConfig, coordinator: WorkCoordinator, verbose: boolean): Promise<void> {
  const watchLogger = logger.child({ scope: 'watch' });
  let queue: Promise<void> = Promise.resolve();
  let stopped = false;

  const session = startSourceWatcher(config, {
    verbose,
    logger: watchLogger,
    onFileAdded: (filePath) => {
      queue = queue.then(async () => {
        if (stopped) {
          return;
        }
        try {
          const result = await coordinator.processPath(filePath);
          if (result) {
            reportResult(result);
          }
        } catch (error) {
          if (!(error instanceof RunAbortedError)) {
            watchLogger.warn({ file: filePath, err: errorMessage(error) }, 'Could not process new file.');
            return;
          }
          watchLogger.error({ err: error.message }, 'Stopping watch after fatal error.');
          stopped = true;
          await session.close();
        }
      });
      return queue;
    },
  });
  await session.ready;
  logger.info({ source: config.source }, 'Watching for new files. Press Ctrl+C to stop.');

  await holdProcessOpen(session);
  stopped = true;
  await queue;
}

async function holdProcessOpen(watchSession: WatchSession): Promise<void> {
  await new Promise<void>((resolve) => {
    const handleSignal = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Received shutdown signal.');
      cleanup();
      watchSession.close().then(resolve, (error: unknown) => {
        logger.warn({ err: errorMessage(error) }, 'Watcher did not close cleanly.');
        resolve();
      });
    };
    const cleanup = () => {
      process.off('SIGINT', handleSignal);
      process.off('SIGTERM', handleSignal);
    };
    process.on('SIGINT', handleSignal);
    process.on('SIGTERM', handleSignal);
  });
}

function reportResult(result: ProcessingResult): void {
  const entry = {
    file: result.file.relativePath,
    outcome: result.outcome,
    destination: result.decision?.relativePath,
    date:
      result.resolved?.state === 'resolved' ? formatCaptureDate(result.resolved.date) : undefined,
    via: result.resolved?.state === 'resolved' ? result.resolved.strategy : undefined,
  };
  if (result.status === 'failed') {
    logger.warn({ ...entry, kind: result.error?.kind }, result.error?.message ?? 'Failed');
  } else if (result.error) {
    logger.info({ ...entry, note: result.error.kind }, result.error.message);
  } else {
    logger.info(entry, 'Organized');
  }
}

function printConfigSummary(config: DatesortConfig): void {
  logger.info(
    {
      configPath: config.configPath,
      source: config.source,
      destination: config.destination,
      mode: config.mode,
      dryRun: config.dryRun,
      concurrency: config.concurrency,
      ffprobe: config.probe.ffprobe,
      minimumTier: config.dates.minimumTier,
    },
    'Loaded datesort config.'
  );
}

/**
 * Summary report lines. Unsupported files count as unresolved dates.
 */
export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    `${summary.dryRun ? 'Planned' : 'Processed'} ${summary.processed} of ${summary.total} files${summary.cancelled ? ' (cancelled)' : ''}`,
    `  moved:             ${summary.moved}`,
    `  copied:            ${summary.copied}`,
    `  skipped-duplicate: ${summary.skippedDuplicate}`,
    `  unresolved-date:   ${summary.unresolvedDate + summary.unsupported}`,
    `  failed:            ${summary.failed}`,
  ];
  if (summary.dryRun) {
    lines.splice(1, 0, `  planned:           ${summary.planned}`);
  }
  for (const failure of summary.failures) {
    lines.push(`  ! ${failure.path}: ${failure.kind}: ${failure.message}`);
  }
  return lines;
}

function printSummary(summary: RunSummary): void {
  for (const line of formatSummary(summary)) {
    console.log(line);
  }
}

async function resolveConfigPath(commandName: string, provided?: string): Promise<string> {
  if (provided) {
    return provided;
  }
  const globalPath = await findGlobalConfigPath();
  if (globalPath) {
    logger.info({ globalConfig: globalPath }, 'Using global config.');
    return globalPath;
  }
  throw new DatesortCliError(
    `Missing --config <path> option for '${commandName}'. Create ${getGlobalConfigPath()} or pass --config explicitly.`
  );
}

async function findGlobalConfigPath(): Promise<string | undefined> {
  const globalPath = getGlobalConfigPath();
  try {
    await fs.access(globalPath);
    return globalPath;
  } catch {
    return undefined;
  }
}

async function loadGlobalDefaults(): Promise<DatesortConfigInput> {
  const globalPath = await findGlobalConfigPath();
  if (!globalPath) {
    return {};
  }
  try {
    const raw = await fs.readFile(globalPath, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (isPlainObject(parsed)) {
      return parsed;
    }
    logger.warn({ globalConfig: globalPath }, 'Global config is not an object. Skipping defaults.');
  } catch (error) {
    logger.warn(
      { err: errorMessage(error), globalConfig: globalPath },
      'Unable to read global config. Skipping defaults.'
    );
  }
  return {};
}

function printHelp(): void {
  console.log(`datesort v${VERSION}`);
  console.log('Usage: datesort <command> [options]\n');
  console.log('Commands:');
  console.log('  run        Organize the configured source into the destination.');
  console.log('  validate   Validate the config file without touching any files.\n');
  console.log('Options:');
  console.log('  -c, --config <path>       Path to datesort config (JSON).');
  console.log('      --move                Move files (default).');
  console.log('      --copy                Copy files and leave the source untouched.');
  console.log('      --dry-run             Plan and report only.');
  console.log('  -j, --concurrency <n>     Number of files processed at once.');
  console.log('      --watch               Keep organizing new files after the first pass.');
  console.log('      --verbose             Enable verbose logging.');
  console.log('  -h, --help                Show this help message.');
  console.log('  -v, --version             Show CLI version.');
  console.log('\nShortcuts:');
  console.log('  datesort <source> <destination> [--copy] [--dry-run] [--watch]');
  console.log('    Uses inline config plus ~/.datesort/config.json defaults if present.');
}

export { loadConfig, loadInlineConfig };
export type { DatesortConfig };
export { organize, WorkCoordinator } from './workflow/coordinator';
export type { ProcessingResult, RunSummary } from './types/Processing';
