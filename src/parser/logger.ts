export type LogType = "parse" | "lex";

/**
 * Receives a line for every parser decision: lexed tokens, shifts,
 * reductions, reused subtrees and error recovery.
 */
export type ParseLogger = (type: LogType, message: string) => void;

/**
 * Logger that writes `[prefix:type] message` lines to stderr.
 */
export function createConsoleLogger(prefix = "sylvan", types?: LogType[]): ParseLogger {
  const enabled = new Set<LogType>(types ?? ["parse", "lex"]);
  return (type, message) => {
    if (enabled.has(type)) console.error(`[${prefix}:${type}] ${message}`);
  };
}
