import * as IO from 'fp-ts/lib/IO';

import chalk from 'chalk';

import { LogLevels, LogTypes } from './types';

type Transporter = (message: string) => IO.IO<void>;

export type Logger = {
  readonly [key in LogTypes]: Transporter;
};

export const customConsoleTransporters: Logger = {
  INFO(message) {
    return () => console.info(chalk.blueBright.bold('INFO: ') + message);
  },

  WARN(message) {
    return () => console.warn(chalk.yellowBright.bold('WARNING: ') + message);
  },

  DEBUG(message) {
    return () => console.debug(chalk.grey.bold('DEBUG: ') + message);
  },

  ERROR(message) {
    return () => console.error(chalk.redBright.bold('ERROR: ') + message);
  },
};

// Transporters below `minLevel` become no-ops
export function createLogger(
  minLevel: LogLevels = LogLevels.INFO,
  transporters: Logger = customConsoleTransporters
): Logger {
  const gate =
    (logType: LogTypes): Transporter =>
    message =>
      LogLevels[logType] >= minLevel ? transporters[logType](message) : IO.of(undefined);

  return {
    INFO: gate('INFO'),
    WARN: gate('WARN'),
    DEBUG: gate('DEBUG'),
    ERROR: gate('ERROR'),
  };
}

export { LogLevels };
export type { LogTypes };
