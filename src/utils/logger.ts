/**
 * Component logger.
 *
 * Prefixes every line with `[Component]`. Everything goes to stderr so command
 * output on stdout stays clean; info/debug lines only appear with ARBOR_DEBUG=1.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function verbose(): boolean {
  const flag = process.env.ARBOR_DEBUG;
  return flag === '1' || flag === 'true';
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;

  return {
    debug(message, ...details) {
      if (verbose()) console.error(prefix, message, ...details);
    },
    info(message, ...details) {
      if (verbose()) console.error(prefix, message, ...details);
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      console.error(prefix, message, ...details);
    }
  };
}
