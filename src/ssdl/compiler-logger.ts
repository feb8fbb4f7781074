import type { PipelineState } from './compiler-core.js';

export interface StageLogEntry {
  readonly stage: PipelineState;
  readonly diagnosticCount: number;
  readonly errorCount: number;
}

export interface HaltLogEntry {
  readonly stage: PipelineState;
  readonly reason: string;
}

export interface SummaryLogEntry {
  readonly state: PipelineState;
  readonly dataSourceCount: number;
  readonly visualizationCount: number;
  readonly errorCount: number;
  readonly warningCount: number;
}

// Console abstraction (for testing)
export interface LoggerConsole {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export interface CompilerLogger {
  readonly enabled: boolean;
  logStage(entry: StageLogEntry): void;
  logHalt(entry: HaltLogEntry): void;
  logSummary(entry: SummaryLogEntry): void;
}

export interface CreateCompilerLoggerOptions {
  readonly console?: LoggerConsole;
  readonly enabled?: boolean;
}

export function createCompilerLogger(options?: CreateCompilerLoggerOptions): CompilerLogger {
  const cons: LoggerConsole = options?.console ?? globalThis.console;
  const enabled = options?.enabled ?? false;

  return {
    enabled,

    logStage(entry: StageLogEntry): void {
      if (!enabled) return;
      cons.log(`[ssdl:${entry.stage}] ${entry.diagnosticCount} diagnostic(s), ${entry.errorCount} error(s)`);
    },

    logHalt(entry: HaltLogEntry): void {
      if (!enabled) return;
      cons.warn(`[ssdl:${entry.stage}] halted: ${entry.reason}`);
    },

    logSummary(entry: SummaryLogEntry): void {
      if (!enabled) return;
      cons.log(
        `[ssdl:${entry.state}] ${entry.dataSourceCount} data source(s), ${entry.visualizationCount} visualization(s), ` +
          `${entry.errorCount} error(s), ${entry.warningCount} warning(s)`,
      );
    },
  };
}

export const SILENT_COMPILER_LOGGER: CompilerLogger = createCompilerLogger({ enabled: false });
