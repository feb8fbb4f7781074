import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { compileReadDescriptor, type CompileDescriptorResult } from './compiler-core.js';
import { createCompilerConfig, type CompilerConfig } from './compiler-config.js';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';
import { EMPTY_SOURCE_MAP } from './source-map.js';
import { readDescriptorSource, type DescriptorSourceReadResult } from './source-reader.js';
import { createDiagnostic } from './validate-shared.js';

const SUPPORTED_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;

/** Reads a YAML or JSON descriptor file. JSON goes through the YAML reader, which accepts it as YAML 1.2. */
export function readDescriptorFile(filePath: string, config: CompilerConfig): DescriptorSourceReadResult {
  const extension = extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.some((supported) => supported === extension)) {
    return unreadable(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_FORMAT_UNSUPPORTED,
        '',
        `Unsupported descriptor format "${extension || '(none)'}" for ${filePath}.`,
        { expected: SUPPORTED_EXTENSIONS.join(' | '), actual: extension || '(none)', suggestion: 'Use a .yaml, .yml or .json file.' },
      ),
    );
  }

  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    return unreadable(
      createDiagnostic(
        'ParseError',
        SSDL_DIAGNOSTIC_CODES.SSDL_SOURCE_FILE_UNREADABLE,
        '',
        `Failed to read descriptor file ${filePath}: ${formatError(error)}.`,
        { suggestion: 'Check the file path and permissions.' },
      ),
    );
  }

  return readDescriptorSource(text, {
    maxInputBytes: config.limits.maxInputBytes,
    maxDepth: config.limits.maxDepth,
    maxAliasCount: config.limits.maxAliasCount,
  });
}

export function compileDescriptorFile(
  filePath: string,
  config: CompilerConfig = createCompilerConfig(),
): CompileDescriptorResult {
  return compileReadDescriptor(readDescriptorFile(filePath, config), config);
}

function unreadable(diagnostic: Diagnostic): DescriptorSourceReadResult {
  return { root: null, sourceMap: EMPTY_SOURCE_MAP, diagnostics: [diagnostic] };
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
