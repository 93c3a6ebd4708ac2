import { describe, it, expect } from 'vitest';
import { parseArgs, UsageError } from '../args';

describe('parseArgs', () => {
  it('should return help without a command or with -h/--help', () => {
    expect(parseArgs([])).toEqual({ kind: 'help' });
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['timeseries', '--out', 'x.json', '-h'])).toEqual({ kind: 'help' });
  });

  it('should parse a timeseries command with period defaults', () => {
    const command = parseArgs([
      'timeseries',
      '--instruments',
      'VOD, BARC',
      '--datatypes',
      'P,PH',
      '--out',
      'out/prices.xlsx',
    ]);

    expect(command).toEqual({
      kind: 'timeseries',
      instruments: ['VOD', 'BARC'],
      datatypes: ['P', 'PH'],
      format: 'xlsx',
      out: 'out/prices.xlsx',
      start: '-1Y',
      end: '-0D',
      frequency: 'D',
    });
  });

  it('should map --period to a relative start date', () => {
    const command = parseArgs([
      'timeseries',
      '--instruments=VOD',
      '--datatypes=P',
      '--period=10year',
      '--out=prices.json',
    ]);

    expect(command).toMatchObject({ kind: 'timeseries', start: '-10Y', end: '-0D', format: 'json' });
  });

  it('should accept relative dates that start with a dash', () => {
    const command = parseArgs([
      'timeseries',
      '--instruments',
      'VOD',
      '--datatypes',
      'P',
      '--start',
      '-30D',
      '--end',
      '-1D',
      '--frequency',
      'W',
      '--out',
      'p.json',
    ]);

    expect(command).toMatchObject({ start: '-30D', end: '-1D', frequency: 'W' });
  });

  it('should parse a metadata command from an instrument file', () => {
    const command = parseArgs([
      'metadata',
      '--instruments-file',
      'symbols.txt',
      '--datatypes',
      'NAME,ISIN',
      '--format',
      'json',
      '--out',
      'meta.out',
      '--config',
      'ds.json',
    ]);

    expect(command).toEqual({
      kind: 'metadata',
      instruments: [],
      instrumentsFile: 'symbols.txt',
      datatypes: ['NAME', 'ISIN'],
      format: 'json',
      out: 'meta.out',
      configFile: 'ds.json',
    });
  });

  it('should reject unknown commands and options', () => {
    expect(() => parseArgs(['export'])).toThrow(new UsageError('Unknown command "export"'));
    expect(() => parseArgs(['timeseries', '--verbose', 'yes'])).toThrow('Unknown option --verbose');
    expect(() => parseArgs(['timeseries', 'VOD'])).toThrow('Unexpected argument "VOD"');
  });

  it('should reject an option without a value', () => {
    expect(() => parseArgs(['timeseries', '--datatypes', 'P', '--out'])).toThrow(
      'Option --out needs a value',
    );
    expect(() => parseArgs(['timeseries', '--datatypes', '--out', 'p.json'])).toThrow(
      'Option --datatypes needs a value',
    );
  });

  it('should require instruments from the command line or a file', () => {
    expect(() => parseArgs(['timeseries', '--datatypes', 'P', '--out', 'p.json'])).toThrow(
      'Provide --instruments or --instruments-file',
    );
  });

  it('should require datatypes', () => {
    expect(() => parseArgs(['timeseries', '--instruments', 'VOD', '--out', 'p.json'])).toThrow(
      '--datatypes: Required',
    );
    expect(() =>
      parseArgs(['timeseries', '--instruments', 'VOD', '--datatypes', ',', '--out', 'p.json']),
    ).toThrow('--datatypes needs at least one datatype');
  });

  it('should prefix schema issues with the flag name', () => {
    expect(() =>
      parseArgs(['timeseries', '--instruments', 'VOD', '--datatypes', 'P', '--frequency', 'H', '--out', 'p.json']),
    ).toThrow(/^--frequency: Invalid enum value/);
  });

  it('should not take timeseries options for metadata', () => {
    expect(() =>
      parseArgs(['metadata', '--instruments', 'VOD', '--datatypes', 'NAME', '--period', '1year', '--out', 'm.json']),
    ).toThrow(UsageError);
  });

  it('should need --format when the output extension is unknown', () => {
    expect(() =>
      parseArgs(['metadata', '--instruments', 'VOD', '--datatypes', 'NAME', '--out', 'meta.csv']),
    ).toThrow('Cannot infer the output format from "meta.csv"; pass --format xlsx or --format json');
  });

  it('should drop repeated datatypes', () => {
    const command = parseArgs(['metadata', '--instruments', 'VOD', '--datatypes', 'NAME,ISIN,NAME', '--out', 'm.json']);

    expect(command).toMatchObject({ datatypes: ['NAME', 'ISIN'] });
  });

  it('should reject datatypes that clash with a fixed output column', () => {
    expect(() =>
      parseArgs(['timeseries', '--instruments', 'VOD', '--datatypes', 'P,date', '--out', 'p.json']),
    ).toThrow(new UsageError('--datatypes: "date" is reserved for a fixed output column'));
    expect(() =>
      parseArgs(['metadata', '--instruments', 'VOD', '--datatypes', 'symbol', '--out', 'm.json']),
    ).toThrow(new UsageError('--datatypes: "symbol" is reserved for a fixed output column'));
  });

  it('should parse a screen command', () => {
    const command = parseArgs([
      'screen',
      '--instruments-file',
      'symbols.txt',
      '--presets-file',
      'presets.json',
      '--preset',
      'growth',
      '--out',
      'matches.xlsx',
    ]);

    expect(command).toEqual({
      kind: 'screen',
      instruments: [],
      instrumentsFile: 'symbols.txt',
      presetsFile: 'presets.json',
      preset: 'growth',
      format: 'xlsx',
      out: 'matches.xlsx',
    });
  });

  it('should require a presets file and a preset name for screen', () => {
    expect(() => parseArgs(['screen', '--instruments', 'VOD', '--preset', 'growth', '--out', 'm.json'])).toThrow(
      new UsageError('--presets-file is required'),
    );
    expect(() =>
      parseArgs(['screen', '--instruments', 'VOD', '--presets-file', 'presets.json', '--out', 'm.json']),
    ).toThrow(new UsageError('--preset is required'));
  });

  it('should not take datatypes for screen', () => {
    expect(() =>
      parseArgs(['screen', '--instruments', 'VOD', '--presets-file', 'p.json', '--preset', 'g', '--datatypes', 'P', '--out', 'm.json']),
    ).toThrow(UsageError);
  });
});
