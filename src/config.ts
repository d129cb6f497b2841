import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';

import {
  DEFAULT_FILENAME_PATTERNS,
  DEFAULT_JUNK_FILES,
  DEFAULT_MINIMUM_TIER,
  DEFAULT_MIN_YEAR,
  DEFAULT_UNKNOWN_FOLDER,
  DEFAULT_YEARS_AHEAD,
} from './config/dateRules';
import { DatesortConfigError, errorMessage } from './errors';
import { ConfidenceTier, CONFIDENCE_TIERS, isConfidenceTier } from './types/MediaKind';
import { TransferMode } from './types/Processing';

export { DatesortConfigError };

const envVariablePattern = /^\$\{?([A-Z0-9_]+)\}?(.*)$/i;
const DEFAULT_CONCURRENCY = 4;
const MAX_CONCURRENCY = 64;
const DEFAULT_HASH_ALGORITHM = 'sha256';
const DEFAULT_READ_TIMEOUT_MS = 5_000;
const DEFAULT_EXTRACT_TIMEOUT_MS = 15_000;
const DEFAULT_TRANSFER_TIMEOUT_MS = 30 * 60 * 1000;
const DEFAULT_HASH_TIMEOUT_MS = 5 * 60 * 1000;
const DEFAULT_DEBOUNCE_MS = 1500;
const REQUIRED_PATTERN_GROUPS = ['y', 'm', 'd'];

/**
 * Whitelist of environment variables that path values may reference
 * (security: prevent arbitrary env var access from shared config files)
 */
const ALLOWED_ENV_VARS = new Set([
  // Standard safe variables
  'HOME',
  'USER',
  'USERPROFILE',
  'TMPDIR',

  // datesort specific
  'DATESORT_HOME',
  'DATESORT_SOURCE',
  'DATESORT_DESTINATION',

  // Testing
  'TEST_DATESORT_SOURCE',
  'TEST_DATESORT_DESTINATION',
]);

interface RawRootConfig {
  source?: unknown;
  destination?: unknown;
  mode?: unknown;
  dryRun?: unknown;
  concurrency?: unknown;
  ignore?: unknown;
  unknownFolder?: unknown;
  hashAlgorithm?: unknown;
  dates?: unknown;
  probe?: unknown;
  timeouts?: unknown;
  cleanup?: unknown;
  watch?: unknown;
}

export type DatesortConfigInput = RawRootConfig;

export interface DateRulesConfig {
  minYear: number;
  yearsAhead: number;
  minimumTier: ConfidenceTier;
  filesystemFallback: boolean;
  filenamePatterns: string[];
}

export interface DatesortConfig {
  configPath: string;
  configDir: string;
  source: string;
  destination: string;
  mode: TransferMode;
  dryRun: boolean;
  concurrency: number;
  ignore: string[];
  unknownFolder: string;
  hashAlgorithm: string;
  dates: DateRulesConfig;
  probe: {
    ffprobe: boolean;
    ffprobePath?: string;
  };
  timeouts: {
    readMs: number;
    extractMs: number;
    transferMs: number;
    hashMs: number;
  };
  cleanup: {
    junkFiles: string[];
    deleteJunk: boolean;
    removeEmptyDirs: boolean;
  };
  watch: {
    debounceMs: number;
    pollIntervalMs?: number;
  };
}

/**
 * Values from the command line that win over the file
 */
export interface LoadConfigOptions {
  dryRun?: boolean;
  mode?: TransferMode;
  concurrency?: number;
}

/**
 * Get the datesort home directory
 * Defaults to ~/.datesort unless DATESORT_HOME is set
 */
export function getDatesortHome(): string {
  return process.env.DATESORT_HOME
    ? path.resolve(process.env.DATESORT_HOME)
    : path.join(os.homedir(), '.datesort');
}

export function getGlobalConfigPath(): string {
  return path.join(getDatesortHome(), 'config.json');
}

export async function loadConfig(
  providedPath: string,
  options: LoadConfigOptions = {}
): Promise<DatesortConfig> {
  const absolutePath = path.resolve(providedPath);
  let fileContents: string;
  try {
    fileContents = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new DatesortConfigError(
      `Unable to read config at ${absolutePath}: ${errorMessage(error)}`,
      error
    );
  }

  if (!fileContents.trim()) {
    throw new DatesortConfigError('Config file is empty.');
  }

  const parsed = parseConfigFile(fileContents, absolutePath);

  return normalizeConfig(parsed, absolutePath, options);
}

export function loadInlineConfig(
  config: DatesortConfigInput,
  options: LoadConfigOptions & { configPath?: string } = {}
): DatesortConfig {
  const configPath =
    options.configPath ?? path.join(process.cwd(), 'datesort.inline.config.json');
  return normalizeConfig(config, configPath, options);
}

function parseConfigFile(contents: string, filename: string): unknown {
  const ext = path.extname(filename).toLowerCase();
  if (ext && ext !== '.json') {
    throw new DatesortConfigError(
      `Unsupported config extension "${ext}". Use JSON for now.`
    );
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new DatesortConfigError(
      `Unable to parse config file ${filename} as JSON.`,
      error
    );
  }
}

function normalizeConfig(
  rawConfig: unknown,
  configPath: string,
  options: LoadConfigOptions
): DatesortConfig {
  if (!isPlainObject(rawConfig)) {
    throw new DatesortConfigError('Config root must be an object.');
  }

  const typedRoot = rawConfig;
  const configDir = path.dirname(configPath);

  const source = resolvePath(
    resolveEnvValue(expectString(typedRoot.source, 'source'), 'source'),
    configDir
  );
  const destination = resolvePath(
    resolveEnvValue(expectString(typedRoot.destination, 'destination'), 'destination'),
    configDir
  );
  if (source === destination) {
    throw new DatesortConfigError('`source` and `destination` must be different directories.');
  }

  const mode = options.mode ?? expectOptionalMode(typedRoot.mode, 'mode') ?? 'move';

  const dryRun =
    options.dryRun ?? expectOptionalBoolean(typedRoot.dryRun, 'dryRun') ?? false;

  const concurrency =
    options.concurrency !== undefined
      ? expectIntegerInRange(options.concurrency, '--concurrency', 1, MAX_CONCURRENCY)
      : typedRoot.concurrency === undefined
        ? DEFAULT_CONCURRENCY
        : expectIntegerInRange(typedRoot.concurrency, 'concurrency', 1, MAX_CONCURRENCY);

  const ignore = dedupeStrings(
    typedRoot.ignore ? validateStringArray(typedRoot.ignore, 'ignore') : []
  );

  const unknownFolder =
    typedRoot.unknownFolder === undefined
      ? DEFAULT_UNKNOWN_FOLDER
      : expectFolderName(typedRoot.unknownFolder, 'unknownFolder');

  const hashAlgorithm =
    typedRoot.hashAlgorithm === undefined
      ? DEFAULT_HASH_ALGORITHM
      : expectHashAlgorithm(typedRoot.hashAlgorithm, 'hashAlgorithm');

  return {
    configPath,
    configDir,
    source,
    destination,
    mode,
    dryRun,
    concurrency,
    ignore,
    unknownFolder,
    hashAlgorithm,
    dates: normalizeDateRules(typedRoot.dates),
    probe: normalizeProbe(typedRoot.probe, configDir),
    timeouts: normalizeTimeouts(typedRoot.timeouts),
    cleanup: normalizeCleanup(typedRoot.cleanup),
    watch: normalizeWatch(typedRoot.watch),
  };
}

function normalizeDateRules(rawDates: unknown): DateRulesConfig {
  const dates = expectOptionalObject(rawDates, 'dates');

  const minYear =
    dates.minYear === undefined
      ? DEFAULT_MIN_YEAR
      : expectIntegerInRange(dates.minYear, 'dates.minYear', 1800, 9999);

  const yearsAhead =
    dates.yearsAhead === undefined
      ? DEFAULT_YEARS_AHEAD
      : expectIntegerInRange(dates.yearsAhead, 'dates.yearsAhead', 0, 100);

  let minimumTier: ConfidenceTier = DEFAULT_MINIMUM_TIER;
  if (dates.minimumTier !== undefined) {
    if (!isConfidenceTier(dates.minimumTier)) {
      throw new DatesortConfigError(
        `dates.minimumTier must be one of: ${CONFIDENCE_TIERS.join(', ')}.`
      );
    }
    minimumTier = dates.minimumTier;
  }

  const filesystemFallback =
    expectOptionalBoolean(dates.filesystemFallback, 'dates.filesystemFallback') ?? true;

  const filenamePatterns = dates.filenamePatterns
    ? validateStringArray(dates.filenamePatterns, 'dates.filenamePatterns')
    : [...DEFAULT_FILENAME_PATTERNS];
  filenamePatterns.forEach((pattern, index) =>
    validateFilenamePattern(pattern, `dates.filenamePatterns[${index}]`)
  );

  return { minYear, yearsAhead, minimumTier, filesystemFallback, filenamePatterns };
}

function normalizeProbe(rawProbe: unknown, configDir: string): DatesortConfig['probe'] {
  const probe = expectOptionalObject(rawProbe, 'probe');
  const ffprobe = expectOptionalBoolean(probe.ffprobe, 'probe.ffprobe') ?? true;
  const rawPath = expectOptionalString(probe.ffprobePath, 'probe.ffprobePath');
  const ffprobePath = rawPath
    ? resolvePath(resolveEnvValue(rawPath, 'probe.ffprobePath'), configDir)
    : undefined;
  return { ffprobe, ffprobePath };
}

function normalizeTimeouts(rawTimeouts: unknown): DatesortConfig['timeouts'] {
  const timeouts = expectOptionalObject(rawTimeouts, 'timeouts');
  return {
    readMs:
      timeouts.readMs === undefined
        ? DEFAULT_READ_TIMEOUT_MS
        : expectPositiveInteger(timeouts.readMs, 'timeouts.readMs'),
    extractMs:
      timeouts.extractMs === undefined
        ? DEFAULT_EXTRACT_TIMEOUT_MS
        : expectPositiveInteger(timeouts.extractMs, 'timeouts.extractMs'),
    transferMs:
      timeouts.transferMs === undefined
        ? DEFAULT_TRANSFER_TIMEOUT_MS
        : expectPositiveInteger(timeouts.transferMs, 'timeouts.transferMs'),
    hashMs:
      timeouts.hashMs === undefined
        ? DEFAULT_HASH_TIMEOUT_MS
        : expectPositiveInteger(timeouts.hashMs, 'timeouts.hashMs'),
  };
}

function normalizeCleanup(rawCleanup: unknown): DatesortConfig['cleanup'] {
  const cleanup = expectOptionalObject(rawCleanup, 'cleanup');
  const junkFiles = cleanup.junkFiles
    ? dedupeStrings(validateStringArray(cleanup.junkFiles, 'cleanup.junkFiles'))
    : [...DEFAULT_JUNK_FILES];
  return {
    junkFiles,
    deleteJunk: expectOptionalBoolean(cleanup.deleteJunk, 'cleanup.deleteJunk') ?? false,
    removeEmptyDirs:
      expectOptionalBoolean(cleanup.removeEmptyDirs, 'cleanup.removeEmptyDirs') ?? false,
  };
}

function normalizeWatch(rawWatch: unknown): DatesortConfig['watch'] {
  const watch = expectOptionalObject(rawWatch, 'watch');
  const debounceMs =
    watch.debounceMs === undefined
      ? DEFAULT_DEBOUNCE_MS
      : expectNonNegativeInteger(watch.debounceMs, 'watch.debounceMs');
  const pollIntervalMs =
    watch.pollIntervalMs === undefined
      ? undefined
      : expectPositiveInteger(watch.pollIntervalMs, 'watch.pollIntervalMs');
  return { debounceMs, pollIntervalMs };
}

function validateFilenamePattern(pattern: string, label: string): void {
  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern);
  } catch (error) {
    throw new DatesortConfigError(
      `${label} is not a valid regular expression: ${errorMessage(error)}`,
      error
    );
  }
  const missing = REQUIRED_PATTERN_GROUPS.filter(
    group => !compiled.source.includes(`(?<${group}>`)
  );
  if (missing.length > 0) {
    throw new DatesortConfigError(
      `${label} must define the named groups ${missing.map(g => `(?<${g}>...)`).join(', ')}.`
    );
  }
}

function validateStringArray(value: unknown, label: string): string[] {
  if (!Array.isArray(value)) {
    throw new DatesortConfigError(`${label} must be an array of strings.`);
  }
  return value.map((entry, index) =>
    expectString(entry, `${label}[${index}]`, { allowEmpty: false })
  );
}

function expectOptionalObject(value: unknown, label: string): Record<string, unknown> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isPlainObject(value)) {
    throw new DatesortConfigError(`\`${label}\` must be an object.`);
  }
  return value;
}

function expectString(
  value: unknown,
  label: string,
  options: { allowEmpty?: boolean } = {}
): string {
  if (typeof value !== 'string') {
    throw new DatesortConfigError(`${label} must be a string.`);
  }
  if (!options.allowEmpty && value.trim().length === 0) {
    throw new DatesortConfigError(`${label} cannot be empty.`);
  }
  return value;
}

function expectOptionalString(
  value: unknown,
  label: string
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return expectString(value, label);
}

function expectOptionalBoolean(
  value: unknown,
  label: string
): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new DatesortConfigError(`${label} must be a boolean.`);
  }
  return value;
}

function expectOptionalMode(value: unknown, label: string): TransferMode | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value !== 'move' && value !== 'copy') {
    throw new DatesortConfigError(`${label} must be "move" or "copy".`);
  }
  return value;
}

function expectFolderName(value: unknown, label: string): string {
  const name = expectString(value, label).trim();
  if (name === '.' || name === '..' || /[\\/]/.test(name)) {
    throw new DatesortConfigError(`${label} must be a single folder name.`);
  }
  return name;
}

function expectHashAlgorithm(value: unknown, label: string): string {
  const algorithm = expectString(value, label).toLowerCase();
  if (!crypto.getHashes().includes(algorithm)) {
    throw new DatesortConfigError(`${label} "${algorithm}" is not supported by this Node.js build.`);
  }
  return algorithm;
}

function expectIntegerInRange(
  value: unknown,
  label: string,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new DatesortConfigError(`${label} must be an integer.`);
  }
  if (value < min || value > max) {
    throw new DatesortConfigError(
      `${label} must be between ${min} and ${max}.`
    );
  }
  return value;
}

function expectPositiveInteger(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new DatesortConfigError(`${label} must be a positive integer.`);
  }
  return value;
}

function expectNonNegativeInteger(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new DatesortConfigError(
      `${label} must be a non-negative integer.`
    );
  }
  return value;
}

/**
 * Expand a leading `$VAR` / `${VAR}` reference. Anything after the variable
 * is kept, so `$HOME/Pictures` works.
 */
function resolveEnvValue(value: string, label: string): string {
  const match = value.match(envVariablePattern);
  if (!match) {
    return value;
  }

  const envKey = match[1];
  const rest = match[2] ?? '';

  // Security: Enforce environment variable whitelist
  if (!ALLOWED_ENV_VARS.has(envKey)) {
    throw new DatesortConfigError(
      `Environment variable ${envKey} referenced by ${label} is not allowed. ` +
      `Allowed variables: ${Array.from(ALLOWED_ENV_VARS).join(', ')}`
    );
  }

  const resolved = process.env[envKey];
  if (!resolved) {
    throw new DatesortConfigError(
      `Environment variable ${envKey} referenced by ${label} is not set.`
    );
  }

  return `${resolved}${rest}`;
}

function resolvePath(targetPath: string, baseDir: string): string {
  // Expand tilde (~) to home directory
  let expandedPath = targetPath;
  if (targetPath.startsWith('~/') || targetPath === '~') {
    expandedPath = targetPath.replace(/^~/, os.homedir());
  }

  const candidate = path.isAbsolute(expandedPath)
    ? expandedPath
    : path.resolve(baseDir, expandedPath);
  return path.normalize(candidate).replace(/[\\/]+$/, '') || path.sep;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function dedupeStrings(items: string[]): string[] {
  return Array.from(new Set(items));
}
