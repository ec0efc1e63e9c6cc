/**
 * Command-line surface of the attachment extractor
 *
 * Usage:
 *   extract-attachments [-h] [-o OUTDIR] [-s {low,max}] path
 *
 * Exit codes:
 *   0  run completed (individual file or attachment failures are only logged)
 *   1  input path does not exist, or the run failed unexpectedly
 *   2  invalid arguments
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { overwritePolicySchema, type Env } from '../config/env.js';
import { runExtraction } from '../extraction/fattura/AttachmentExtractionPipeline.js';
import type { ExtractionOptions } from '../extraction/fattura/types.js';
import { InvalidArgumentsError, toAppError } from '../types/errors.js';

export const PROGRAM_NAME = 'extract-attachments';

export const USAGE = `usage: ${PROGRAM_NAME} [-h] [-o OUTDIR] [-s {low,max}] path`;

export const HELP = `${USAGE}

Extract and save attachments from an invoice in "xml" format.

positional arguments:
  path                  A file or a folder to be parsed.

optional arguments:
  -h, --help            show this help message and exit
  -o OUTDIR, --outdir OUTDIR
                        Output directory
  -s {low,max}, --safety {low,max}
                        (default: "max") If file already exists:
                            "max" == do *not* overwrite.
                            "low" == overwrite
`;

const cliArgumentsSchema = z.object({
  path: z.string({ required_error: 'the following arguments are required: path' }).min(1, 'path must not be empty'),
  // An empty directory means no override
  outdir: z.string().optional(),
  safety: overwritePolicySchema,
});

export type ParsedCommand = { kind: 'help' } | { kind: 'run'; options: ExtractionOptions };

interface RawArguments {
  path?: string;
  outdir?: string;
  safety?: string;
}

const OPTION_LABELS: Record<string, string> = {
  outdir: '-o/--outdir',
  safety: '-s/--safety',
};

/**
 * Parse command line arguments. Flags override the environment defaults.
 *
 * @throws InvalidArgumentsError
 */
export function parseCliArguments(argv: string[], env: Pick<Env, 'ATTACHMENTS_OUTDIR' | 'ATTACHMENTS_SAFETY'>): ParsedCommand {
  const raw: RawArguments = {};
  let positionalOnly = false;

  const takeValue = (option: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || (value.startsWith('-') && value !== '-')) {
      throw new InvalidArgumentsError(`argument ${option}: expected one argument`);
    }
    return value;
  };

  // -oDIR, -slow, -s=low
  const joinedValue = (arg: string): string => {
    const value = arg.slice(2);
    return value.startsWith('=') ? value.slice(1) : value;
  };

  const setPositional = (value: string) => {
    if (raw.path !== undefined) {
      throw new InvalidArgumentsError(`unrecognized arguments: ${value}`);
    }
    raw.path = value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (positionalOnly) {
      setPositional(arg);
    } else if (arg === '--') {
      positionalOnly = true;
    } else if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    } else if (arg === '-o' || arg === '--outdir') {
      raw.outdir = takeValue(arg, i++);
    } else if (arg.startsWith('--outdir=')) {
      raw.outdir = arg.slice('--outdir='.length);
    } else if (arg === '-s' || arg === '--safety') {
      raw.safety = takeValue(arg, i++);
    } else if (arg.startsWith('--safety=')) {
      raw.safety = arg.slice('--safety='.length);
    } else if (arg.startsWith('-o') && !arg.startsWith('--')) {
      raw.outdir = joinedValue(arg);
    } else if (arg.startsWith('-s') && !arg.startsWith('--')) {
      raw.safety = joinedValue(arg);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new InvalidArgumentsError(`unrecognized arguments: ${arg}`);
    } else {
      setPositional(arg);
    }
  }

  const result = cliArgumentsSchema.safeParse({
    path: raw.path,
    outdir: raw.outdir ?? env.ATTACHMENTS_OUTDIR,
    safety: raw.safety ?? env.ATTACHMENTS_SAFETY,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue.path[0] ?? '');
    if (field === 'safety') {
      throw new InvalidArgumentsError(
        `argument ${OPTION_LABELS.safety}: invalid choice: '${raw.safety ?? env.ATTACHMENTS_SAFETY}' (choose from 'low', 'max')`
      );
    }
    const label = OPTION_LABELS[field];
    throw new InvalidArgumentsError(label ? `argument ${label}: ${issue.message}` : issue.message);
  }

  return {
    kind: 'run',
    options: {
      inputPath: result.data.path,
      outputDirectory: result.data.outdir || undefined,
      overwritePolicy: result.data.safety,
    },
  };
}

export interface TextSink {
  write(chunk: string): unknown;
}

export interface CliDependencies {
  env: Pick<Env, 'ATTACHMENTS_OUTDIR' | 'ATTACHMENTS_SAFETY'>;
  logger: Logger;
  stdout: TextSink;
  stderr: TextSink;
}

/**
 * Run the extractor for an argv (without the node and script entries) and
 * return the process exit code
 */
export function runCli(argv: string[], deps: CliDependencies): number {
  let command: ParsedCommand;
  try {
    command = parseCliArguments(argv, deps.env);
  } catch (error) {
    if (error instanceof InvalidArgumentsError) {
      deps.stderr.write(`${USAGE}\n${PROGRAM_NAME}: error: ${error.message}\n`);
      return 2;
    }
    throw error;
  }

  if (command.kind === 'help') {
    deps.stdout.write(HELP);
    return 0;
  }

  try {
    runExtraction(command.options, deps.logger);
    return 0;
  } catch (error) {
    const appError = toAppError(error);
    // Unexpected failures keep their stack for the bug report
    const stack = !appError.isOperational && error instanceof Error ? { stack: error.stack } : {};
    deps.logger.fatal({ code: appError.code, ...appError.context, ...stack }, appError.message);
    return 1;
  }
}
