import { readFile as readFileAsync } from 'node:fs/promises';
import {
  AuthenticationError,
  DataRequestError,
  DatastreamClient,
  ServiceUnavailableError,
  TokenManager,
} from '@libs/datastream-client';
import type { Clock, HttpTransport, Logger } from '@libs/datastream-client';
import { parseArgs, USAGE, UsageError } from './args';
import type { DataCommand, MetadataCommand, ScreenCommand, TimeSeriesCommand } from './args';
import { ConfigError, initConfig } from './config';
import type { AppConfig, LoadConfigOptions } from './config';
import { mergeInstruments, parseInstrumentList } from './instruments';
import { createConsoleLogger } from './logger';
import { errorsToTable, exportTables, staticDataToTable, timeSeriesToTable } from './export';
import type { ExportTable } from './export';
import { compilePreset, parsePresetFile, PresetError, runScreen, screenToTable } from './screen';
import type { CompiledScreen } from './screen';

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  usage: 2,
  authentication: 3,
  serviceUnavailable: 4,
  dataRequest: 5,
  config: 78,
} as const;

export interface CliDeps {
  initConfig?: (options: LoadConfigOptions) => AppConfig;
  transport?: HttpTransport;
  now?: Clock;
  /** Used instead of a console logger built from the configured level. */
  logger?: Logger;
  readFile?: (path: string) => Promise<string>;
  print?: (text: string) => void;
}

/**
 * Run one console command and return the process exit code. Every failure is
 * reported through the logger and mapped to a non-zero code.
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  let logger: Logger = deps.logger ?? createConsoleLogger('info');

  try {
    const command = parseArgs(argv);
    if (command.kind === 'help') {
      (deps.print ?? console.log)(USAGE);
      return EXIT_CODES.ok;
    }

    const config = (deps.initConfig ?? initConfig)(
      command.configFile ? { configFile: command.configFile } : {},
    );
    logger = deps.logger ?? createConsoleLogger(config.logLevel);

    const readFile = deps.readFile ?? readText;
    const instruments = await resolveInstruments(command, readFile);
    if (instruments.length === 0) {
      throw new UsageError('The instrument list is empty');
    }
    const fetchTables = await planFetch(command, instruments, readFile, logger);

    const tokens = new TokenManager({
      credential: config.credential,
      tokenUrl: config.tokenUrl,
      timeoutMs: config.timeoutMs,
      transport: deps.transport,
      now: deps.now,
      logger,
    });
    const client = new DatastreamClient(tokens, {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      transport: deps.transport,
      reauthenticateOnUnauthorized: config.reauthenticateOnUnauthorized,
      logger,
    });

    try {
      await tokens.authenticate();
      const tables = await fetchTables(client);

      await exportTables(command.format, command.out, tables);
      const rowCount = tables.reduce((sum, table) => sum + table.rows.length, 0);
      logger.info?.(`Wrote ${rowCount} row(s) to ${command.out}`);
    } finally {
      tokens.logout();
    }

    return EXIT_CODES.ok;
  } catch (error) {
    logger.error?.(describeFailure(error));
    if (error instanceof UsageError) {
      logger.error?.(USAGE);
    }
    return exitCodeFor(error);
  }
}

type TableFetch = (client: DatastreamClient) => Promise<ExportTable[]>;

/** Everything that can fail without the service (presets) is checked before authenticating. */
async function planFetch(
  command: DataCommand,
  instruments: string[],
  readFile: (path: string) => Promise<string>,
  logger: Logger,
): Promise<TableFetch> {
  switch (command.kind) {
    case 'timeseries': {
      const timeseries = command;
      return (client) => fetchTimeSeriesTables(client, timeseries, instruments);
    }
    case 'metadata': {
      const metadata = command;
      return (client) => fetchMetadataTables(client, metadata, instruments);
    }
    case 'screen': {
      const screen = await loadScreen(command, readFile);
      return (client) => fetchScreenTables(client, screen, instruments, logger);
    }
  }
}

async function fetchTimeSeriesTables(
  client: DatastreamClient,
  command: TimeSeriesCommand,
  instruments: string[],
): Promise<ExportTable[]> {
  const results = await client.getTimeSeriesForInstruments(instruments, {
    datatypes: command.datatypes,
    start: command.start,
    end: command.end,
    frequency: command.frequency,
  });
  const tables = [timeSeriesToTable(results, command.datatypes)];
  const errors = results.flatMap(({ result }) => result.errors);
  if (errors.length > 0) {
    tables.push(errorsToTable(errors));
  }
  return tables;
}

async function fetchMetadataTables(
  client: DatastreamClient,
  command: MetadataCommand,
  instruments: string[],
): Promise<ExportTable[]> {
  const result = await client.getStaticData({ instruments, datatypes: command.datatypes });
  const tables = [staticDataToTable(result, command.datatypes)];
  if (result.errors.length > 0) {
    tables.push(errorsToTable(result.errors));
  }
  return tables;
}

async function fetchScreenTables(
  client: DatastreamClient,
  screen: CompiledScreen,
  instruments: string[],
  logger: Logger,
): Promise<ExportTable[]> {
  const outcome = await runScreen(client, instruments, screen, logger);
  const tables = [screenToTable(outcome)];
  if (outcome.errors.length > 0) {
    tables.push(errorsToTable(outcome.errors));
  }
  return tables;
}

async function loadScreen(
  command: ScreenCommand,
  readFile: (path: string) => Promise<string>,
): Promise<CompiledScreen> {
  let text: string;
  try {
    text = await readFile(command.presetsFile);
  } catch (error) {
    throw new PresetError(
      `Cannot read presets file ${command.presetsFile}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return compilePreset(parsePresetFile(text, command.presetsFile), command.preset);
}

async function resolveInstruments(
  command: DataCommand,
  readFile: (path: string) => Promise<string>,
): Promise<string[]> {
  if (!command.instrumentsFile) {
    return mergeInstruments(command.instruments);
  }
  let text: string;
  try {
    text = await readFile(command.instrumentsFile);
  } catch (error) {
    throw new UsageError(
      `Cannot read ${command.instrumentsFile}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return mergeInstruments(command.instruments, parseInstrumentList(text, command.instrumentsFile));
}

function readText(path: string): Promise<string> {
  return readFileAsync(path, 'utf8');
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError || error instanceof PresetError) return EXIT_CODES.usage;
  if (error instanceof ConfigError) return EXIT_CODES.config;
  if (error instanceof AuthenticationError) return EXIT_CODES.authentication;
  if (error instanceof ServiceUnavailableError) return EXIT_CODES.serviceUnavailable;
  if (error instanceof DataRequestError) return EXIT_CODES.dataRequest;
  return EXIT_CODES.failure;
}

export function describeFailure(error: unknown): string {
  if (error instanceof DataRequestError && error.responseBody) {
    return `${error.name}: ${error.message}\n${error.responseBody.slice(0, 2000)}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `Unexpected failure: ${String(error)}`;
}
