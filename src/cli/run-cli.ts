import { parseArgs } from 'node:util';
import { buildSchemaArtifactMap } from '../kernel/schema-artifacts.js';
import { createCompilerConfig, type CompilerConfig } from '../ssdl/compiler-config.js';
import type { CompileDescriptorResult } from '../ssdl/compiler-core.js';
import { createCompilerLogger } from '../ssdl/compiler-logger.js';
import { serializeIR } from '../ssdl/emit-ir.js';
import { compileDescriptorFile } from '../ssdl/load-descriptor-source.js';
import { loadCliConfigFile } from './cli-config.js';
import { formatDiagnostics } from './format-diagnostics.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_MALFORMED = 2;

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

const USAGE = `Usage:
  ssdl compile <descriptor.yaml> [--format text|json] [--config <file>] [--verbose]
  ssdl schema
  ssdl help

Exit codes: 0 compiled (warnings allowed), 1 fatal diagnostic, 2 malformed input or usage error.
`;

type OutputFormat = 'text' | 'json';

export function runCli(argv: readonly string[], io: CliIo): number {
  const [command, ...rest] = argv;
  switch (command) {
    case 'compile':
      return runCompile(rest, io);
    case 'schema':
      io.stdout(`${JSON.stringify(buildSchemaArtifactMap()['DescriptorIR.schema.json'], null, 2)}\n`);
      return EXIT_OK;
    case 'help':
    case '--help':
    case '-h':
      io.stdout(USAGE);
      return EXIT_OK;
    default:
      io.stderr(command === undefined ? USAGE : `Unknown command "${command}".\n${USAGE}`);
      return EXIT_MALFORMED;
  }
}

function parseCompileArgs(args: readonly string[]) {
  return parseArgs({
    args: [...args],
    allowPositionals: true,
    strict: true,
    options: {
      format: { type: 'string', default: 'text' },
      config: { type: 'string' },
      verbose: { type: 'boolean', default: false },
    },
  });
}

function runCompile(args: readonly string[], io: CliIo): number {
  let parsed: ReturnType<typeof parseCompileArgs>;
  try {
    parsed = parseCompileArgs(args);
  } catch (error) {
    io.stderr(`${formatError(error)}\n${USAGE}`);
    return EXIT_MALFORMED;
  }

  const { values, positionals } = parsed;
  const format = values.format;
  if (format !== 'text' && format !== 'json') {
    io.stderr(`Unsupported --format "${String(format)}"; use text or json.\n`);
    return EXIT_MALFORMED;
  }
  const [descriptorPath, ...extra] = positionals;
  if (descriptorPath === undefined || extra.length > 0) {
    io.stderr(`compile takes exactly one descriptor file.\n${USAGE}`);
    return EXIT_MALFORMED;
  }

  let config: CompilerConfig;
  try {
    config = createCompilerConfig({
      ...(values.config === undefined ? {} : loadCliConfigFile(values.config)),
      logger: createCompilerLogger({
        enabled: values.verbose === true,
        console: { log: (...parts) => io.stderr(`${parts.join(' ')}\n`), warn: (...parts) => io.stderr(`${parts.join(' ')}\n`) },
      }),
    });
  } catch (error) {
    io.stderr(`${formatError(error)}\n`);
    return EXIT_MALFORMED;
  }

  const result = compileDescriptorFile(descriptorPath, config);
  writeResult(result, format, io);
  return exitCodeFor(result);
}

export function exitCodeFor(result: CompileDescriptorResult): number {
  if (result.state !== 'FAILED') {
    return EXIT_OK;
  }
  return result.diagnostics.some((diagnostic) => diagnostic.kind === 'ParseError') ? EXIT_MALFORMED : EXIT_FATAL;
}

function writeResult(result: CompileDescriptorResult, format: OutputFormat, io: CliIo): void {
  if (format === 'json') {
    if (result.ir !== null) {
      io.stdout(serializeIR(result.ir));
      return;
    }
    io.stdout(
      `${JSON.stringify(
        {
          state: result.state,
          transitions: result.transitions,
          diagnostics: result.diagnostics,
          truncatedDiagnosticCount: result.truncatedDiagnosticCount,
        },
        null,
        2,
      )}\n`,
    );
    return;
  }

  const lines: string[] = [];
  if (result.ir !== null) {
    const { service } = result.ir;
    const version = `${service.version.major}.${service.version.minor}.${service.version.patch}`;
    lines.push(
      `Compiled "${service.name}" ${version} (${service.compatibility}): ` +
        `${Object.keys(result.ir.dataSources).length} data source(s), ` +
        `${Object.keys(result.ir.visualizations).length} visualization(s), ` +
        `${Object.keys(result.ir.deploymentEnvs).length} deployment environment(s).`,
    );
  } else {
    const reached = result.transitions.filter((state) => state !== 'FAILED').at(-1) ?? 'INIT';
    lines.push(`Compilation failed after ${reached}.`);
  }
  if (result.diagnostics.length > 0) {
    lines.push(formatDiagnostics(result.diagnostics));
  }
  if (result.truncatedDiagnosticCount > 0) {
    lines.push(`${result.truncatedDiagnosticCount} more warning(s) were truncated.`);
  }
  (result.ir === null ? io.stderr : io.stdout)(`${lines.join('\n')}\n`);
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
