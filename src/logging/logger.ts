export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const RESET = '\x1b[0m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const DIM = '\x1b[2m';

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta) return '';
  const parts = Object.entries(meta)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? ` ${DIM}${parts.join(' ')}${RESET}` : '';
}

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    debug: (message, meta) => {
      if (verbose) console.log(`${DIM}[debug]${RESET} ${message}${formatMeta(meta)}`);
    },
    info: (message, meta) => {
      console.log(`[info] ${message}${formatMeta(meta)}`);
    },
    warn: (message, meta) => {
      console.warn(`${YELLOW}[warn]${RESET} ${message}${formatMeta(meta)}`);
    },
    error: (message, meta) => {
      console.error(`${RED}[error]${RESET} ${message}${formatMeta(meta)}`);
    },
  };
}
