/**
 * Optional logger accepted by backends and capabilities.
 *
 * Every method is optional; an absent logger or method means silence.
 */
export interface IoLogger {
  trace?: (message: string, fields?: Record<string, unknown>) => void;
  debug?: (message: string, fields?: Record<string, unknown>) => void;
  error?: (message: string, fields?: Record<string, unknown>) => void;
}
