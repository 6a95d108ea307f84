import { PipelineLogger } from '../types/logger';

function format(message: string, context?: Record<string, unknown>): string {
  return context ? `${message} ${JSON.stringify(context)}` : message;
}

/**
 * Default logger, writes to the console
 */
export const consoleLogger: PipelineLogger = {
  debug(message, context) {
    if (process.env.LOG_LEVEL === 'debug') {
      console.debug(format(message, context));
    }
  },
  info(message, context) {
    console.log(format(message, context));
  },
  warn(message, context) {
    console.warn(format(message, context));
  },
  error(message, context) {
    console.error(format(message, context));
  }
};

/**
 * Logger that discards everything
 */
export const silentLogger: PipelineLogger = {
  debug() {
    // discard
  },
  info() {
    // discard
  },
  warn() {
    // discard
  },
  error() {
    // discard
  }
};
