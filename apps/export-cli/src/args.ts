import { z } from 'zod';
import { FIXED_COLUMNS } from './export/table';

/**
 * Command-line arguments
 *
 * datastream-export timeseries --instruments VOD,BARC --datatypes P,PH --period 1year --out prices.xlsx
 * datastream-export metadata --instruments-file symbols.txt --datatypes NAME,ISIN --out meta.json
 * datastream-export screen --instruments-file symbols.txt --presets-file presets.json --preset growth --out matches.xlsx
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage:
  datastream-export timeseries [options]   Export time series for each instrument
  datastream-export metadata [options]     Export static fields for the instrument list
  datastream-export screen [options]       Export the instruments that pass a KPI screening preset

Options:
  --instruments <a,b,...>      Comma-separated instrument codes
  --instruments-file <path>    JSON array or one code per line (# starts a comment)
  --datatypes <a,b,...>        Datastream datatypes, e.g. P,PH,PL or NAME,ISIN
  --period <name>              1year, 3year, 5year, 7year, 10year or 15year (timeseries, default 1year)
  --start <date>               Start date, absolute (2024-01-01) or relative (-30D); overrides --period
  --end <date>                 End date (default -0D)
  --frequency <D|W|M|Q|Y>      Sampling frequency (timeseries, default D)
  --presets-file <path>        JSON file of screening presets (screen)
  --preset <name>              Preset to apply from --presets-file (screen)
  --format <xlsx|json>         Output format (default: taken from --out extension)
  --out <path>                 Output file
  --config <path>              JSON config file (overrides DATASTREAM_CONFIG_FILE)
  -h, --help                   Show this help`;

export const PERIODS = ['1year', '3year', '5year', '7year', '10year', '15year'] as const;

export type Period = (typeof PERIODS)[number];

/** Lookback windows, as relative DSWS start/end dates. */
export const PERIOD_RANGES: Record<Period, { start: string; end: string }> = {
  '1year': { start: '-1Y', end: '-0D' },
  '3year': { start: '-3Y', end: '-0D' },
  '5year': { start: '-5Y', end: '-0D' },
  '7year': { start: '-7Y', end: '-0D' },
  '10year': { start: '-10Y', end: '-0D' },
  '15year': { start: '-15Y', end: '-0D' },
};

export type ExportFormat = 'xlsx' | 'json';

interface CommonOptions {
  instruments: string[];
  instrumentsFile?: string;
  format: ExportFormat;
  out: string;
  configFile?: string;
}

export interface TimeSeriesCommand extends CommonOptions {
  kind: 'timeseries';
  datatypes: string[];
  start: string;
  end: string;
  frequency: 'D' | 'W' | 'M' | 'Q' | 'Y';
}

export interface MetadataCommand extends CommonOptions {
  kind: 'metadata';
  datatypes: string[];
}

export interface ScreenCommand extends CommonOptions {
  kind: 'screen';
  presetsFile: string;
  preset: string;
}

export interface HelpCommand {
  kind: 'help';
}

export type DataCommand = TimeSeriesCommand | MetadataCommand | ScreenCommand;

export type Command = DataCommand | HelpCommand;

const KNOWN_FLAGS = new Set([
  'instruments',
  'instruments-file',
  'datatypes',
  'period',
  'start',
  'end',
  'frequency',
  'format',
  'out',
  'config',
  'presets-file',
  'preset',
]);

const listSchema = z
  .string()
  .transform((value) => [...new Set(value.split(',').map((item) => item.trim()).filter(Boolean))]);

const fixedColumns = new Set<string>(FIXED_COLUMNS);

const datatypesSchema = listSchema.pipe(
  z
    .array(z.string())
    .min(1, '--datatypes needs at least one datatype')
    .superRefine((datatypes, ctx) => {
      for (const datatype of datatypes.filter((item) => fixedColumns.has(item))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${datatype}" is reserved for a fixed output column`,
        });
      }
    }),
);

const commonSchema = z.object({
  instruments: listSchema.optional(),
  'instruments-file': z.string().min(1).optional(),
  format: z.enum(['xlsx', 'json']).optional(),
  out: z.string({ required_error: '--out is required' }).min(1, '--out is required'),
  config: z.string().min(1).optional(),
});

const timeSeriesSchema = commonSchema.extend({
  datatypes: datatypesSchema,
  period: z.enum(PERIODS).default('1year'),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
  frequency: z.enum(['D', 'W', 'M', 'Q', 'Y']).default('D'),
});

const metadataSchema = commonSchema.extend({ datatypes: datatypesSchema }).strict();

const screenSchema = commonSchema
  .extend({
    'presets-file': z.string({ required_error: '--presets-file is required' }).min(1),
    preset: z.string({ required_error: '--preset is required' }).min(1),
  })
  .strict();

export function parseArgs(argv: string[]): Command {
  const [kind, ...rest] = argv;

  if (!kind || kind === '-h' || kind === '--help' || kind === 'help') {
    return { kind: 'help' };
  }
  if (rest.includes('-h') || rest.includes('--help')) {
    return { kind: 'help' };
  }

  const flags = readFlags(rest);

  if (kind === 'timeseries') {
    const parsed = validate(timeSeriesSchema, flags);
    const range = PERIOD_RANGES[parsed.period];
    return {
      kind: 'timeseries',
      ...common(parsed),
      datatypes: parsed.datatypes,
      start: parsed.start ?? range.start,
      end: parsed.end ?? range.end,
      frequency: parsed.frequency,
    };
  }

  if (kind === 'metadata') {
    const parsed = validate(metadataSchema, flags);
    return { kind: 'metadata', ...common(parsed), datatypes: parsed.datatypes };
  }

  if (kind === 'screen') {
    const parsed = validate(screenSchema, flags);
    return {
      kind: 'screen',
      ...common(parsed),
      presetsFile: parsed['presets-file'],
      preset: parsed.preset,
    };
  }

  throw new UsageError(`Unknown command "${kind}"`);
}

function readFlags(args: string[]): Record<string, string> {
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument "${arg}"`);
    }
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!KNOWN_FLAGS.has(name)) {
      throw new UsageError(`Unknown option --${name}`);
    }
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = args[i + 1];
      // Relative dates such as -30D are values, not flags
      if (next === undefined || next.startsWith('--')) {
        throw new UsageError(`Option --${name} needs a value`);
      }
      value = next;
      i += 1;
    }
    flags[name] = value;
  }
  return flags;
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, flags: Record<string, string>): T {
  const result = schema.safeParse(flags);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => {
        const flag = issue.path[0];
        return flag !== undefined && !issue.message.startsWith('--')
          ? `--${String(flag)}: ${issue.message}`
          : issue.message;
      })
      .join('; ');
    throw new UsageError(message);
  }
  return result.data;
}

function common(parsed: z.output<typeof commonSchema>): CommonOptions {
  const instruments = parsed.instruments ?? [];
  const instrumentsFile = parsed['instruments-file'];
  if (instruments.length === 0 && !instrumentsFile) {
    throw new UsageError('Provide --instruments or --instruments-file');
  }
  const format = parsed.format ?? inferFormat(parsed.out);
  const options: CommonOptions = {
    instruments,
    format,
    out: parsed.out,
  };
  if (instrumentsFile) {
    options.instrumentsFile = instrumentsFile;
  }
  if (parsed.config) {
    options.configFile = parsed.config;
  }
  return options;
}

function inferFormat(out: string): ExportFormat {
  const lower = out.toLowerCase();
  if (lower.endsWith('.xlsx')) {
    return 'xlsx';
  }
  if (lower.endsWith('.json')) {
    return 'json';
  }
  throw new UsageError(`Cannot infer the output format from "${out}"; pass --format xlsx or --format json`);
}
