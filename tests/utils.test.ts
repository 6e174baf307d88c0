/* globals describe, test, expect */
import path from 'path';
import fsExtra from 'fs-extra';

import { getCliVersion, toProgramArgv } from '@utils/index';

describe('Test for utils', () => {
  test('Should keep the script name as the program name and drop the node executable', () => {
    // Act
    const programArgv = toProgramArgv(['/usr/bin/node', '/opt/tools/flagpole', '-n', 'Ada']);

    // Assert
    expect(programArgv).toStrictEqual(['flagpole', '-n', 'Ada']);
  });

  test('Should produce an empty program name when argv has no script path', () => {
    expect(toProgramArgv([])).toStrictEqual(['']);
  });

  test('Should read the version from the package manifest', () => {
    // Arrange
    const { version } = fsExtra.readJSONSync(path.join(__dirname, '..', 'package.json'));

    // Act
    const cliVersion = getCliVersion()();

    // Assert
    expect(cliVersion).toBe(version);
  });
});
