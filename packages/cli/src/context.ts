/**
 * Options accepted before or after any command.
 */
export interface GlobalFlags {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Shared between commands and `main`; commands report their exit code here.
 */
export interface CliContext {
  exitCode: number;
}
