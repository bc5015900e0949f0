import { getPIIMasker } from '../services/masking/PIIMasker';

const MASK_PII_DISABLE_VALUE = 'false';

type LogMethod = (...args: unknown[]) => void;

/**
 * Logging surface handed to every pipeline component. The console-backed
 * `logger` below is only the default; tests pass their own.
 */
export interface Logger {
  log: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  debug: LogMethod;
}

const masker = getPIIMasker();

function isMaskingEnabled(): boolean {
  return process.env.MASK_PII !== MASK_PII_DISABLE_VALUE;
}

function maskError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: masker.maskText(error.message),
    stack: error.stack ? masker.maskText(error.stack) : undefined,
  };
}

function maskArg(arg: unknown): unknown {
  if (!isMaskingEnabled()) {
    return arg;
  }

  if (typeof arg === 'string') {
    return masker.maskText(arg);
  }

  if (typeof arg === 'object' && arg !== null) {
    if (arg instanceof Error) {
      return maskError(arg);
    }

    return masker.maskObject(arg);
  }

  return arg;
}

export const logger: Logger = {
  log: (...args) => {
    console.log(...args.map(maskArg));
  },

  info: (...args) => {
    console.info(...args.map(maskArg));
  },

  error: (...args) => {
    console.error(...args.map(maskArg));
  },

  warn: (...args) => {
    console.warn(...args.map(maskArg));
  },

  debug: (...args) => {
    console.debug(...args.map(maskArg));
  },
};

const noop: LogMethod = () => {};

export const silentLogger: Logger = {
  log: noop,
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
