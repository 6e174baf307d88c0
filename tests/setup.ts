import 'jest-extended';

import chalk from 'chalk';

// Assertions compare plain text, whatever terminal the tests run in
chalk.level = 0;

jest.spyOn(process, 'exit').mockImplementation(() => undefined as never);
