/**
 * jsonpp: read a sequence of JSON values from a file or stdin and print
 * each one, pretty by default.
 */

import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { consoleLogger, reportError, type Logger } from './diagnostics.js';
import { repeatedMemberPolicySchema, type RepeatedMemberPolicy } from './options.js';
import { JsonReader } from './reader.js';
import { StringStream, openFileStream, type CharStream, type TextSink } from './stream.js';
import { writeJson } from './writer.js';

export const HELP = `Usage: jsonpp [options] [file]

Reads JSON values from file (or stdin) and prints each one.

Options:
  --compact             Print without whitespace
  --comments            Accept // and /* */ comments
  --trailing-commas     Accept a comma before ] and }
  --repeated <policy>   Repeated object members: reject (default), keep-first, keep-last
  -h, --help            Show this help`;

export interface CliIO {
  out: TextSink;
  logger: Logger;
  /** Default input when no file is named. */
  stdin: () => CharStream;
}

const defaultIO: CliIO = {
  out: { write: (text) => process.stdout.write(text) },
  logger: consoleLogger,
  stdin: () => new StringStream(readFileSync(0, 'utf8'), '<stdin>'),
};

function logError(logger: Logger, event: string, message: string): void {
  logger({ timestamp: Date.now(), level: 'error', event, message });
}

function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      compact: { type: 'boolean' },
      comments: { type: 'boolean' },
      'trailing-commas': { type: 'boolean' },
      repeated: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });
}

function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Returns the process exit code. */
export function runCli(args: string[], io: CliIO = defaultIO): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(args);
  } catch (err) {
    if (!isSystemError(err)) throw err;
    logError(io.logger, 'cli:usage', err.message);
    return 2;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    io.out.write(`${HELP}\n`);
    return 0;
  }
  if (positionals.length > 1) {
    logError(io.logger, 'cli:usage', 'expected at most one input file');
    return 2;
  }

  let repeatedMembers: RepeatedMemberPolicy | undefined;
  if (values.repeated !== undefined) {
    const policy = repeatedMemberPolicySchema.safeParse(values.repeated);
    if (!policy.success) {
      logError(
        io.logger,
        'cli:usage',
        `--repeated must be one of ${repeatedMemberPolicySchema.options.join(', ')}`
      );
      return 2;
    }
    repeatedMembers = policy.data;
  }

  let reader: JsonReader;
  try {
    const file = positionals[0];
    reader = new JsonReader(file === undefined ? io.stdin() : openFileStream(file), {
      allowComments: values.comments,
      allowTrailingCommas: values['trailing-commas'],
      repeatedMembers,
    });
  } catch (err) {
    if (isSystemError(err)) {
      logError(io.logger, 'cli:input', err.message);
      return 2;
    }
    throw err;
  }

  const style = values.compact ? 'compact' : 'pretty';
  for (;;) {
    const result = reader.getValue();
    if (result.status === 'eof') return 0;
    if (result.status === 'error') {
      reportError(result.error, io.logger);
      return 1;
    }
    writeJson(io.out, result.value, { style });
    io.out.write('\n');
  }
}
