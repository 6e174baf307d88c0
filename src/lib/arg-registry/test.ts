/* globals describe, test, expect, jest */
import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';

import ArgRegistry, {
  scalar,
  ScalarKind,
  ArgErrorKind,
  formatArgError,
  errorKindToString,
} from './index';

function createRegistry() {
  const onError = jest.fn();
  const onPostHelp = jest.fn();
  const write = jest.fn();

  const registry = new ArgRegistry({ onError, onPostHelp, write, color: false });
  return { registry, onError, onPostHelp, write };
}

describe('Registration', () => {
  test('Should reject a definition whose aliases overlap an existing one without registering any of its aliases', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.addOption(['-a', '--alpha'], 'First option');

    // Act
    const registrationResult = registry.addFlag(['-b', '--alpha', '-a'], 'Clashing flag', false);
    const parseResult = registry.parse(['prog', '-b']);

    // Assert
    expect(registrationResult).toStrictEqual(
      E.left({ kind: ArgErrorKind.DUPLICATE_DEFINITION, context: '--alpha' })
    );
    expect(onError).toHaveBeenCalledTimes(2);
    expect(onError).toHaveBeenNthCalledWith(1, ArgErrorKind.DUPLICATE_DEFINITION, '--alpha');
    expect(onError).toHaveBeenNthCalledWith(2, ArgErrorKind.DUPLICATE_DEFINITION, '-a');
    expect(registry.get('-b', 'boolean')).toStrictEqual(O.none);
    expect(registry.unmatched()).toStrictEqual(['-b']);
    expect(E.isRight(parseResult)).toBeTrue();
  });

  test('Should collapse repeated aliases within a single registration', () => {
    // Arrange
    const { registry, onError } = createRegistry();

    // Act
    const registrationResult = registry.addOption(['-o', '--out', '-o'], 'Output path');

    // Assert
    expect(registrationResult).toStrictEqual(E.right(['-o', '--out']));
    expect(onError).not.toHaveBeenCalled();
    expect(registry.definitions()[0].aliases).toStrictEqual(['-o', '--out']);
  });

  test('Should normalize every kind of default value to text at registration time', () => {
    // Arrange
    const { registry } = createRegistry();

    // Act
    registry.addOption(['--text'], 'Text', 'plain');
    registry.addOption(['--int'], 'Integer', 42);
    registry.addOption(['--trunc'], 'Truncated integer', scalar.integer(2.9));
    registry.addOption(['--float'], 'Float', 2.5);
    registry.addOption(['--whole-float'], 'Whole float', scalar.float(3));
    registry.addOption(['--bool'], 'Boolean', true);
    registry.addFlag(['--flag'], 'Flag', false);
    registry.addOption(['--empty'], 'No default');

    // Assert
    expect(registry.definitions().map(({ defaultValue }) => defaultValue)).toStrictEqual([
      'plain',
      '42',
      '2',
      '2.5',
      '3',
      'true',
      'false',
      '',
    ]);
  });

  test('Should read back every kind of default value as the kind it was registered with', () => {
    // Arrange
    const { registry, onError } = createRegistry();

    // Act
    registry.addOption(['--text'], 'Text', 'plain');
    registry.addOption(['--int'], 'Integer', scalar.integer(-7));
    registry.addOption(['--max'], 'Largest safe integer', Number.MAX_SAFE_INTEGER);
    registry.addOption(['--float'], 'Float', 2.5);
    registry.addOption(['--huge'], 'Huge float', scalar.float(1e300));
    registry.addOption(['--bool'], 'Boolean', false);

    // Assert
    expect(registry.get('--text', 'string')).toStrictEqual(O.some('plain'));
    expect(registry.get('--int', 'integer')).toStrictEqual(O.some(-7));
    expect(registry.get('--max', 'integer')).toStrictEqual(O.some(Number.MAX_SAFE_INTEGER));
    expect(registry.get('--float', 'float')).toStrictEqual(O.some(2.5));
    expect(registry.get('--huge', 'float')).toStrictEqual(O.some(1e300));
    expect(registry.get('--bool', 'boolean')).toStrictEqual(O.some(false));
    expect(onError).not.toHaveBeenCalled();
  });

  test('Should reject numeric defaults that could not be read back as their own kind', () => {
    // Arrange
    const { registry, onError } = createRegistry();

    // Act
    const registrationResults = [
      registry.addOption(['--big'], 'Beyond the safe range', 1e21),
      registry.addOption(['-w', '--wide'], 'Beyond the safe range', scalar.integer(2 ** 53 + 2)),
      registry.addOption(['--nan'], 'Not a number', NaN),
      registry.addOption(['--inf'], 'Infinite', scalar.float(Infinity)),
    ];

    // Assert
    expect(registrationResults).toStrictEqual([
      E.left({ kind: ArgErrorKind.INCORRECT_ARGUMENT_TYPE, context: '--big=1e+21' }),
      E.left({ kind: ArgErrorKind.INCORRECT_ARGUMENT_TYPE, context: '-w --wide=9007199254740994' }),
      E.left({ kind: ArgErrorKind.INCORRECT_ARGUMENT_TYPE, context: '--nan=NaN' }),
      E.left({ kind: ArgErrorKind.INCORRECT_ARGUMENT_TYPE, context: '--inf=Infinity' }),
    ]);
    expect(onError).toHaveBeenCalledTimes(4);
    expect(onError).toHaveBeenNthCalledWith(1, ArgErrorKind.INCORRECT_ARGUMENT_TYPE, '--big=1e+21');
    expect(registry.definitions()).toBeEmpty();
    expect(registry.get('--wide', 'string')).toStrictEqual(O.none);
  });

  test('Should reject a definition without any alias', () => {
    // Arrange
    const { registry, onError } = createRegistry();

    // Act
    const registrationResult = registry.addOption([], 'Nameless', '', true);
    const parseResult = registry.parse(['prog']);

    // Assert
    expect(registrationResult).toStrictEqual(
      E.left({ kind: ArgErrorKind.MISSING_ALIASES, context: 'Nameless' })
    );
    expect(onError).toHaveBeenCalledExactlyOnceWith(ArgErrorKind.MISSING_ALIASES, 'Nameless');
    expect(registry.definitions()).toBeEmpty();
    expect(E.isRight(parseResult)).toBeTrue();
  });

  test('Should refuse new definitions once arguments have been parsed', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.parse(['prog']);

    // Act
    const registrationResult = registry.addFlag(['-z', '--zap'], 'Too late', false);

    // Assert
    expect(registrationResult).toStrictEqual(
      E.left({ kind: ArgErrorKind.ALREADY_PARSED, context: '-z --zap' })
    );
    expect(onError).toHaveBeenCalledWith(ArgErrorKind.ALREADY_PARSED, '-z --zap');
    expect(registry.get('-z', 'boolean')).toStrictEqual(O.none);
  });
});

describe('Parsing', () => {
  test('Should set a flag when it is passed on the command line', () => {
    // Arrange
    const { registry } = createRegistry();
    registry.addFlag(['-b', '--bool'], 'A bool', false);

    // Act
    const parseResult = registry.parse(['prog', '--bool']);

    // Assert
    expect(parseResult).toStrictEqual(E.right({ programName: 'prog', unmatched: [] }));
    expect(registry.get('--bool', 'boolean')).toStrictEqual(O.some(true));
    expect(registry.get('-b', 'boolean')).toStrictEqual(O.some(true));
  });

  test.each([
    ['once', ['prog', '-v'], false, true],
    ['twice', ['prog', '-v', '--verbose'], false, true],
    ['zero times with a false default', ['prog'], false, false],
    ['zero times with a true default', ['prog'], true, true],
  ])(
    'Should resolve a flag passed %s to the expected boolean',
    (_, argv, defaultValue, expectedValue) => {
      // Arrange
      const { registry } = createRegistry();
      registry.addFlag(['-v', '--verbose'], 'Chatty output', defaultValue);

      // Act
      registry.parse(argv);

      // Assert
      expect(registry.get('-v', 'boolean')).toStrictEqual(O.some(expectedValue));
    }
  );

  test('Should fall back to a textual "1" default when retrieving a boolean that was never passed', () => {
    // Arrange
    const { registry } = createRegistry();
    registry.addOption(['-o', '--on'], 'Switch', '1');

    // Act
    const parseResult = registry.parse(['prog']);

    // Assert
    expect(E.isRight(parseResult)).toBeTrue();
    expect(registry.get('--on', 'boolean')).toStrictEqual(O.some(true));
  });

  test('Should fail with the joined aliases of a required option that was never passed', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.addOption(['-b', '--bool'], 'A bool', false, true);

    // Act
    const parseResult = registry.parse(['prog']);

    // Assert
    expect(parseResult).toStrictEqual(
      E.left({ kind: ArgErrorKind.MISSING_REQUIRED_ARGUMENT, context: '-b --bool' })
    );
    expect(onError).toHaveBeenCalledExactlyOnceWith(ArgErrorKind.MISSING_REQUIRED_ARGUMENT, '-b --bool');
  });

  test('Should only report the first unmet requirement in registration order', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.addOption(['--first'], 'First', '', true);
    registry.addFlag(['--second'], 'Second', false, true);

    // Act
    registry.parse(['prog']);

    // Assert
    expect(onError).toHaveBeenCalledExactlyOnceWith(ArgErrorKind.MISSING_REQUIRED_ARGUMENT, '--first');
  });

  test('Should succeed once every required definition has been passed', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.addOption(['-n', '--name'], 'Name', '', true);
    registry.addFlag(['-f', '--force'], 'Force', false, true);

    // Act
    const parseResult = registry.parse(['prog', '-f', '--name', 'Ada']);

    // Assert
    expect(E.isRight(parseResult)).toBeTrue();
    expect(onError).not.toHaveBeenCalled();
    expect(registry.get('-n', 'string')).toStrictEqual(O.some('Ada'));
  });

  test('Should stop scanning when an option ends argv without a value', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.addOption(['-n', '--name'], 'Name');
    registry.addFlag(['-r', '--required'], 'Required flag', false, true);

    // Act
    const parseResult = registry.parse(['prog', 'stray', '--name']);

    // Assert
    expect(parseResult).toStrictEqual(
      E.left({ kind: ArgErrorKind.EXPECTED_VALUE, context: '--name' })
    );
    expect(onError).toHaveBeenCalledExactlyOnceWith(ArgErrorKind.EXPECTED_VALUE, '--name');
    expect(registry.unmatched()).toStrictEqual(['stray']);
  });

  test('Should consume the token after an option as its value even when it looks like an alias', () => {
    // Arrange
    const { registry } = createRegistry();
    registry.addOption(['-o', '--out'], 'Output');
    registry.addFlag(['-v'], 'Verbose', false);

    // Act
    registry.parse(['prog', '-o', '-v']);

    // Assert
    expect(registry.get('-o', 'string')).toStrictEqual(O.some('-v'));
    expect(registry.get('-v', 'boolean')).toStrictEqual(O.some(false));
  });

  test('Should collect unrecognized tokens in the order they appeared without failing', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.addFlag(['-v'], 'Verbose', false);
    registry.addOption(['-n'], 'Count', 0);

    // Act
    const parseResult = registry.parse(['prog', 'one', '--two', '-v', '-n', '5', '-3', 'four']);

    // Assert
    expect(parseResult).toStrictEqual(
      E.right({ programName: 'prog', unmatched: ['one', '--two', '-3', 'four'] })
    );
    expect(registry.unmatched()).toStrictEqual(['one', '--two', '-3', 'four']);
    expect(registry.get('-n', 'integer')).toStrictEqual(O.some(5));
    expect(onError).not.toHaveBeenCalled();
  });

  test('Should never match the program name against registered aliases', () => {
    // Arrange
    const { registry } = createRegistry();
    registry.addFlag(['prog'], 'Same as the program name', false);

    // Act
    registry.parse(['prog']);

    // Assert
    expect(registry.programName()).toBe('prog');
    expect(registry.get('prog', 'boolean')).toStrictEqual(O.some(false));
    expect(registry.unmatched()).toBeEmpty();
  });

  test('Should accept an empty argv', () => {
    // Arrange
    const { registry } = createRegistry();

    // Act
    const parseResult = registry.parse([]);

    // Assert
    expect(parseResult).toStrictEqual(E.right({ programName: '', unmatched: [] }));
    expect(registry.isParsed()).toBeTrue();
  });

  test('Should refuse to parse a second time', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.parse(['prog']);

    // Act
    const parseResult = registry.parse(['again', '--x']);

    // Assert
    expect(parseResult).toStrictEqual(
      E.left({ kind: ArgErrorKind.ALREADY_PARSED, context: 'again' })
    );
    expect(onError).toHaveBeenCalledExactlyOnceWith(ArgErrorKind.ALREADY_PARSED, 'again');
    expect(registry.programName()).toBe('prog');
    expect(registry.unmatched()).toBeEmpty();
  });

  test('Should return failure without an error handler and keep the error for later inspection', () => {
    // Arrange
    const registry = new ArgRegistry({ write: jest.fn() });
    registry.addOption(['-n'], 'Name', '', true);

    // Act
    const lastErrorBeforeParse = registry.lastError();
    const parseResult = registry.parse(['prog']);

    // Assert
    expect(lastErrorBeforeParse).toStrictEqual(O.none);
    expect(E.isLeft(parseResult)).toBeTrue();
    expect(registry.lastError()).toStrictEqual(
      O.some({ kind: ArgErrorKind.MISSING_REQUIRED_ARGUMENT, context: '-n' })
    );
  });

  test('Should use an error handler set after construction', () => {
    // Arrange
    const registry = new ArgRegistry({ write: jest.fn() });
    const onError = jest.fn();
    registry.setErrorHandler(onError);
    registry.addOption(['-n'], 'Name');

    // Act
    registry.parse(['prog', '-n']);

    // Assert
    expect(onError).toHaveBeenCalledExactlyOnceWith(ArgErrorKind.EXPECTED_VALUE, '-n');
  });
});

describe('Help', () => {
  test('Should print help, call the post-help handler once and keep applying requirement checks', () => {
    // Arrange
    const { registry, onError, onPostHelp, write } = createRegistry();
    registry.addOption(['-n', '--name'], 'Name', '', true);

    // Act
    const parseResult = registry.parse(['prog', '--help']);

    // Assert
    expect(write).toHaveBeenCalledExactlyOnceWith(registry.helpText());
    expect(onPostHelp).toHaveBeenCalledTimes(1);
    expect(parseResult).toStrictEqual(
      E.left({ kind: ArgErrorKind.MISSING_REQUIRED_ARGUMENT, context: '-n --name' })
    );
    expect(onError).toHaveBeenCalledExactlyOnceWith(ArgErrorKind.MISSING_REQUIRED_ARGUMENT, '-n --name');
  });

  test('Should continue scanning after printing help', () => {
    // Arrange
    const { registry, onPostHelp, write } = createRegistry();
    registry.addFlag(['-v', '--verbose'], 'Verbose', false);

    // Act
    const parseResult = registry.parse(['prog', '-h', '-v', 'extra']);

    // Assert
    expect(write).toHaveBeenCalledTimes(1);
    expect(onPostHelp).toHaveBeenCalledTimes(1);
    expect(parseResult).toStrictEqual(E.right({ programName: 'prog', unmatched: ['extra'] }));
    expect(registry.get('--verbose', 'boolean')).toStrictEqual(O.some(true));
  });

  test('Should print help without a post-help handler', () => {
    // Arrange
    const write = jest.fn();
    const registry = new ArgRegistry({ write, color: false });

    // Act
    const parseResult = registry.parse(['prog', '--help']);

    // Assert
    expect(write).toHaveBeenCalledExactlyOnceWith('USAGE:\n  prog [OPTIONS...]\n\nOPTIONS:');
    expect(E.isRight(parseResult)).toBeTrue();
  });

  test('Should treat help aliases as unmatched tokens when automatic help is disabled', () => {
    // Arrange
    const { registry, onPostHelp, write } = createRegistry();
    registry.setAutoHelp(false);

    // Act
    registry.parse(['prog', '-h', '--help']);

    // Assert
    expect(write).not.toHaveBeenCalled();
    expect(onPostHelp).not.toHaveBeenCalled();
    expect(registry.unmatched()).toStrictEqual(['-h', '--help']);
  });

  test('Should honour custom help aliases and a post-help handler set after construction', () => {
    // Arrange
    const write = jest.fn();
    const onPostHelp = jest.fn();
    const registry = new ArgRegistry({ write, color: false, helpAliases: ['-?'] });
    registry.setPostHelpHandler(onPostHelp);

    // Act
    registry.parse(['prog', '-?', '--help']);

    // Assert
    expect(write).toHaveBeenCalledTimes(1);
    expect(onPostHelp).toHaveBeenCalledTimes(1);
    expect(registry.unmatched()).toStrictEqual(['--help']);
  });

  test('Should list every definition in registration order with aliases, description, default and requirement', () => {
    // Arrange
    const { registry } = createRegistry();
    registry.addOption(['-n', '--name'], 'Who to greet', 'world', true);
    registry.addFlag(['-v', '--verbose'], 'Chatty output', false);
    registry.addOption(['--out'], 'Output path');

    // Act
    registry.parse(['prog', '-n', 'Ada']);
    const helpLines = registry.helpText().split('\n');

    // Assert
    expect(helpLines).toStrictEqual([
      'USAGE:',
      '  prog [OPTIONS...]',
      '',
      'OPTIONS:',
      '  -n, --name     Who to greet   default: world  <required>',
      '  -v, --verbose  Chatty output  default: false  <optional>',
      '  --out          Output path    default: <none>  <optional>',
    ]);
  });
});

describe('Value retrieval', () => {
  test('Should return nothing for an alias that was never registered without reporting an error', () => {
    // Arrange
    const { registry, onError } = createRegistry();
    registry.parse(['prog']);

    // Act
    const value = registry.get('--missing', 'string');

    // Assert
    expect(value).toStrictEqual(O.none);
    expect(onError).not.toHaveBeenCalled();
  });

  test('Should convert supplied text into the requested scalar type', () => {
    // Arrange
    const { registry } = createRegistry();
    registry.addOption(['--count'], 'Count', 1);
    registry.addOption(['--ratio'], 'Ratio', 0.5);
    registry.addOption(['--title'], 'Title');

    // Act
    registry.parse(['prog', '--count', '-12', '--ratio', '1e3', '--title', 'hello world']);

    // Assert
    expect(registry.get('--count', 'integer')).toStrictEqual(O.some(-12));
    expect(registry.get('--count', 'float')).toStrictEqual(O.some(-12));
    expect(registry.get('--ratio', 'float')).toStrictEqual(O.some(1000));
    expect(registry.get('--title', 'string')).toStrictEqual(O.some('hello world'));
  });

  const mismatchedTypeCases: Array<[string, ScalarKind, string]> = [
    ['an integer', 'integer', '2.5'],
    ['an integer', 'integer', '9007199254740993'],
    ['a float', 'float', 'abc'],
    ['a boolean', 'boolean', 'yes'],
  ];

  test.each(mismatchedTypeCases)(
    'Should report an incorrect argument type when text is requested as %s it cannot represent',
    (_, kind, suppliedText) => {
      // Arrange
      const { registry, onError } = createRegistry();
      registry.addOption(['-x'], 'Value');
      registry.parse(['prog', '-x', suppliedText]);

      // Act
      const value = registry.get('-x', kind);

      // Assert
      expect(value).toStrictEqual(O.none);
      expect(onError).toHaveBeenCalledExactlyOnceWith(
        ArgErrorKind.INCORRECT_ARGUMENT_TYPE,
        `-x=${suppliedText}`
      );
      expect(registry.lastError()).toStrictEqual(
        O.some({ kind: ArgErrorKind.INCORRECT_ARGUMENT_TYPE, context: `-x=${suppliedText}` })
      );
    }
  );

  test('Should expose definitions with their current values and requirement status', () => {
    // Arrange
    const { registry } = createRegistry();
    registry.addOption(['-n', '--name'], 'Name', 'world', true);
    registry.addFlag(['-q'], 'Quiet', false);

    // Act
    registry.parse(['prog', '--name', 'Ada']);

    // Assert
    expect(registry.definitions()).toStrictEqual([
      {
        aliases: ['-n', '--name'],
        description: 'Name',
        defaultValue: 'world',
        isFlag: false,
        value: 'Ada',
        required: true,
      },
      {
        aliases: ['-q'],
        description: 'Quiet',
        defaultValue: 'false',
        isFlag: true,
        value: 'false',
        required: false,
      },
    ]);
  });
});

test('Should describe every error kind in words', () => {
  expect(Object.values(ArgErrorKind).map(errorKindToString)).toStrictEqual([
    'Duplicate definition',
    'Missing required argument',
    'Incorrect argument type',
    'Expected value',
    'Arguments already parsed',
    'Missing aliases',
  ]);

  expect(
    formatArgError({ kind: ArgErrorKind.EXPECTED_VALUE, context: '--name' })
  ).toBe('Expected value: --name');
});
