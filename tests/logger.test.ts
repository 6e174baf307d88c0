/* globals describe, test, expect, jest */
import { createLogger, customConsoleTransporters, LogLevels, Logger } from '@lib/logger';

function createMockTransporters() {
  const written: string[] = [];

  const record = (label: string) => (message: string) => () => {
    written.push(`${label} ${message}`);
  };

  const transporters: Logger = {
    INFO: record('info'),
    WARN: record('warn'),
    DEBUG: record('debug'),
    ERROR: record('error'),
  };

  return { transporters, written };
}

describe('Logger', () => {
  test('Should drop messages below the minimum level', () => {
    // Arrange
    const { transporters, written } = createMockTransporters();
    const logger = createLogger(LogLevels.WARN, transporters);

    // Act
    logger.DEBUG('debugging')();
    logger.INFO('informing')();
    logger.WARN('warning')();
    logger.ERROR('failing')();

    // Assert
    expect(written).toStrictEqual(['warn warning', 'error failing']);
  });

  test('Should skip debug output by default', () => {
    // Arrange
    const { transporters, written } = createMockTransporters();
    const logger = createLogger(undefined, transporters);

    // Act
    logger.DEBUG('debugging')();
    logger.INFO('informing')();

    // Assert
    expect(written).toStrictEqual(['info informing']);
  });

  test('Should prefix console output with its level label', () => {
    // Arrange
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    // Act
    customConsoleTransporters.ERROR('Expected value: --name')();

    // Assert
    expect(errorSpy).toHaveBeenCalledExactlyOnceWith('ERROR: Expected value: --name');
    errorSpy.mockRestore();
  });
});
