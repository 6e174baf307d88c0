/* globals describe, test, expect, jest, beforeEach, afterEach */
import path from 'path';
import fsExtra from 'fs-extra';

import main from '../src/cli';

import { ExitCodes } from '../src/constants';

let logSpy: jest.SpyInstance;
let warnSpy: jest.SpyInstance;
let errorSpy: jest.SpyInstance;

const exitSpy = jest.spyOn(process, 'exit');

beforeEach(() => {
  logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  exitSpy.mockClear();
});

afterEach(() => {
  logSpy.mockRestore();
  warnSpy.mockRestore();
  errorSpy.mockRestore();
});

describe('Greeting output', () => {
  test('Should greet the default target once when no arguments are passed', () => {
    // Act
    const exitCode = main(['flagpole']);

    // Assert
    expect(exitCode).toBe(ExitCodes.OK);
    expect(logSpy).toHaveBeenCalledExactlyOnceWith('Hello, world!');
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  test('Should honour the name, times and shout arguments', () => {
    // Act
    const exitCode = main(['flagpole', '-n', 'Ada', '--times', '3', '-s']);

    // Assert
    expect(exitCode).toBe(ExitCodes.OK);
    expect(logSpy).toHaveBeenCalledExactlyOnceWith('HELLO, ADA!\nHELLO, ADA!\nHELLO, ADA!');
  });

  test('Should print nothing when asked to greet zero times', () => {
    // Act
    const exitCode = main(['flagpole', '--times', '0']);

    // Assert
    expect(exitCode).toBe(ExitCodes.OK);
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('Should warn about arguments it does not recognize and still greet', () => {
    // Act
    const exitCode = main(['flagpole', 'extra', '--loud']);

    // Assert
    expect(exitCode).toBe(ExitCodes.OK);
    expect(warnSpy).toHaveBeenCalledTimes(3);
    expect(warnSpy).toHaveBeenNthCalledWith(2, 'Warnings(2)');
    expect(warnSpy).toHaveBeenNthCalledWith(
      3,
      'Ignoring unrecognized argument: extra\nIgnoring unrecognized argument: --loud'
    );
    expect(logSpy).toHaveBeenCalledExactlyOnceWith('Hello, world!');
  });

  test('Should print the package version instead of a greeting', () => {
    // Arrange
    const { version } = fsExtra.readJSONSync(path.join(__dirname, '..', 'package.json'));

    // Act
    const exitCode = main(['flagpole', '--version']);

    // Assert
    expect(exitCode).toBe(ExitCodes.OK);
    expect(logSpy).toHaveBeenCalledExactlyOnceWith(`v${version}`);
  });
});

describe('Failures', () => {
  test('Should log an error and fail when the greeting count is not an integer', () => {
    // Act
    const exitCode = main(['flagpole', '--times', 'many']);

    // Assert
    expect(exitCode).toBe(ExitCodes.GENERAL);
    expect(errorSpy).toHaveBeenCalledExactlyOnceWith(
      'ERROR: Incorrect argument type: --times=many'
    );
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('Should log an error and fail when asked to greet more times than allowed', () => {
    // Act
    const exitCode = main(['flagpole', '--times', '99999999999']);

    // Assert
    expect(exitCode).toBe(ExitCodes.GENERAL);
    expect(errorSpy).toHaveBeenCalledExactlyOnceWith(
      'ERROR: Cannot greet more than 100 times: 99999999999'
    );
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('Should greet exactly as many times as the limit allows', () => {
    // Act
    const exitCode = main(['flagpole', '-t', '100']);

    // Assert
    expect(exitCode).toBe(ExitCodes.OK);
    expect(logSpy).toHaveBeenCalledExactlyOnceWith(
      new Array<string>(100).fill('Hello, world!').join('\n')
    );
  });

  test('Should log an error and fail when an option is missing its value', () => {
    // Act
    const exitCode = main(['flagpole', '-t', '2', '--name']);

    // Assert
    expect(exitCode).toBe(ExitCodes.GENERAL);
    expect(errorSpy).toHaveBeenCalledExactlyOnceWith('ERROR: Expected value: --name');
    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe('Help', () => {
  test('Should print help and exit successfully through the post-help handler', () => {
    // Arrange
    const expectedHelpText = [
      'USAGE:',
      '  flagpole [OPTIONS...]',
      '',
      'OPTIONS:',
      '  -n, --name     Who to greet             default: world  <optional>',
      '  -t, --times    How many times to greet  default: 1  <optional>',
      '  -s, --shout    Greet in upper case      default: false  <optional>',
      '  -v, --version  Print the version        default: false  <optional>',
    ].join('\n');

    // Act
    main(['flagpole', '--help']);

    // Assert
    expect(exitSpy).toHaveBeenCalledExactlyOnceWith(ExitCodes.OK);
    expect(logSpy).toHaveBeenNthCalledWith(1, expectedHelpText);
  });

  test('Should keep going after help when the process is not terminated', () => {
    // Act
    const exitCode = main(['flagpole', '-h', '--name', 'Grace']);

    // Assert
    expect(exitCode).toBe(ExitCodes.OK);
    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenNthCalledWith(2, 'Hello, Grace!');
  });
});
