import { parseArgs } from 'util';
import { convertTo } from '../core/convert';
import { XmlSyntaxError } from '../core/errors';
import { ConversionOptionsInput, parseConversionOptions } from '../core/settings';
import { OutputSink } from '../core/sink';

export interface CliIO {
  /** Reads a file, or standard input when `path` is undefined. */
  read(path: string | undefined): string;
  sink: OutputSink;
  error(message: string): void;
}

export const USAGE =
  'Usage: xml2json [file] [--indent <unit>] [--content-prefix <prefix>] [--attribute-prefix <prefix>] [--single-line] [--config <file>]';

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      indent: { type: 'string', short: 'i' },
      'content-prefix': { type: 'string' },
      'attribute-prefix': { type: 'string' },
      'single-line': { type: 'boolean' },
      config: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/**
 * `--indent 4` means four spaces and `--indent tab` a tab; anything else is
 * used as the indent unit verbatim.
 */
export function resolveIndent(value: string): string {
  if (/^\d+$/.test(value)) return ' '.repeat(Number(value));
  if (value === 'tab') return '\t';
  return value;
}

/** Runs one conversion and returns the process exit code. */
export function run(argv: string[], io: CliIO): number {
  let cli: ReturnType<typeof parseCommandLine>;
  try {
    cli = parseCommandLine(argv);
  } catch (e) {
    io.error(`xml2json: ${e instanceof Error ? e.message : String(e)}\n${USAGE}`);
    return 2;
  }

  const { values, positionals } = cli;
  if (values.help) {
    io.error(USAGE);
    return 0;
  }
  if (positionals.length > 1) {
    io.error(`xml2json: expected at most one input file\n${USAGE}`);
    return 2;
  }
  const file: string | undefined = positionals[0];

  try {
    const fromConfig = values.config
      ? parseConversionOptions(JSON.parse(io.read(values.config)), values.config)
      : {};

    const overrides: ConversionOptionsInput = {};
    if (values.indent !== undefined) overrides.indent = resolveIndent(values.indent);
    if (values['content-prefix'] !== undefined) overrides.contentPrefix = values['content-prefix'];
    if (values['attribute-prefix'] !== undefined) overrides.attributePrefix = values['attribute-prefix'];
    if (values['single-line'] !== undefined) overrides.singleLine = values['single-line'];

    convertTo(io.read(file), io.sink, { ...fromConfig, ...overrides });
    return 0;
  } catch (e) {
    if (e instanceof XmlSyntaxError) {
      io.error(`${file ?? '<stdin>'}:${e.line + 1}:${e.column}: ${e.message}`);
    } else {
      io.error(`xml2json: ${e instanceof Error ? e.message : String(e)}`);
    }
    return 1;
  }
}
