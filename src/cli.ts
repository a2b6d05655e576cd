import { Command, CommanderError } from 'commander';
import type { ChalkInstance } from 'chalk';
import { z } from 'zod';
import { APP_NAME, versionBanner } from './config.js';
import type { BuildInfo } from './config.js';
import { QueryJsonError, UsageError } from './errors.js';
import { formatResult } from './output/format.js';
import { Reporter } from './output/reporter.js';
import type { TextSink } from './output/reporter.js';
import type { QueryEvaluator } from './query/evaluator.js';
import { runQuery } from './query/run.js';

export type CliIO = {
  stdout: TextSink;
  stderr: TextSink;
  chalk: ChalkInstance;
  buildInfo: BuildInfo;
  evaluator?: QueryEvaluator;
};

const optionsSchema = z.object({
  query: z.string().optional(),
  pretty: z.boolean().default(true),
  raw: z.boolean().default(false),
  version: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof optionsSchema>;

const EXAMPLES = [
  'Examples:',
  `  ${APP_NAME} --query '$.users[0].name' ./examples/data.json`,
  `  ${APP_NAME} --query '$.products[?(@.price > 100)]' ./examples/data.json`,
  `  ${APP_NAME} --query '$.users[*].email' --raw ./examples/data.json`,
].join('\n');

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/**
 * Rewrite `--pretty=false` style arguments into the `--pretty` / `--no-pretty`
 * forms commander understands. Everything after `--` is left alone.
 */
export function normalizeBooleanFlags(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') { out.push(...argv.slice(i)); break; }
    const m = /^--(pretty|raw|version)=(.*)$/.exec(arg);
    if (!m) { out.push(arg); continue; }
    const [, flag, value] = m;
    if (TRUE_VALUES.has(value)) out.push(`--${flag}`);
    else if (FALSE_VALUES.has(value)) { if (flag !== 'version') out.push(`--no-${flag}`); }
    else throw new UsageError(`invalid boolean value "${value}" for --${flag}`);
  }
  return out;
}

export function buildProgram(): Command {
  return new Command()
    .name(APP_NAME)
    .usage('[options] <json-file>')
    .description('Evaluate a JSONPath query against a JSON file')
    .argument('[json-file]', 'JSON file to read')
    .option('--query <jsonpath>', 'JSONPath query (e.g., $.root[0], $.users[*].name)')
    .option('--pretty', 'Pretty print JSON output', true)
    .option('--no-pretty', 'Print compact JSON output')
    .option('--raw', 'Output raw values (no JSON formatting for strings)')
    .option('--no-raw', 'Output values as JSON')
    .option('--version', 'Show version information')
    .allowExcessArguments(true)
    .addHelpText('after', `\n${EXAMPLES}`)
    .exitOverride();
}

// Commander writes `error: ...`, sometimes followed by a suggestion line.
function commanderUsageError(err: CommanderError): UsageError {
  const [first] = err.message.split('\n');
  return new UsageError(first.replace(/^error: /, ''));
}

export function usageText(program: Command): string {
  return `${program.helpInformation()}\n${EXAMPLES}\n`;
}

/**
 * Parse `argv` (user arguments only), run the query and write the outcome to
 * `io`. Resolves to the process exit code; never rejects for expected
 * failures.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const reporter = new Reporter(io);
  let helpText = '';
  const program = buildProgram().configureOutput({
    writeOut: (str) => { helpText += str; },
    // failures are reported through the Reporter instead
    writeErr: () => undefined,
  });

  let exitCode = 0;
  program.action(async (file: string | undefined, rawOptions: unknown) => {
    const parsed = optionsSchema.safeParse(rawOptions);
    if (!parsed.success) throw new UsageError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
    const opts: CliOptions = parsed.data;

    if (opts.version) {
      await reporter.result(versionBanner(io.buildInfo));
      return;
    }
    if (file === undefined) {
      await reporter.usage(usageText(program));
      exitCode = 1;
      return;
    }
    if (!opts.query) throw new UsageError('--query parameter is required');

    const result = await runQuery({ query: opts.query, file, evaluator: io.evaluator });
    await reporter.result(formatResult(result, opts));
  });

  try {
    await program.parseAsync(normalizeBooleanFlags(argv), { from: 'user' });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError && err.exitCode === 0) {
      await io.stdout.write(helpText);
      return 0;
    }
    await reporter.error(err instanceof CommanderError ? commanderUsageError(err) : err);
    return err instanceof QueryJsonError ? err.exitCode : 1;
  }
}
