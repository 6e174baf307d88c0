import * as A from 'fp-ts/lib/Array';
import * as O from 'fp-ts/lib/Option';
import * as S from 'fp-ts/lib/string';
import * as IO from 'fp-ts/lib/IO';

import path from 'path';
import chalk from 'chalk';
import fsExtra from 'fs-extra';

import { slice } from 'ramda';
import { pipe } from 'fp-ts/lib/function';
import { INDEX_OF_CLI_ARGS, PACKAGE_JSON_SEARCH_DIRS } from '../constants';

export function logWarnings(warnings: string[]): IO.IO<void> {
  return () => {
    if (A.isEmpty(warnings)) return;

    const warningStr = pipe(
      warnings,
      A.map(chalk.yellow),
      A.intercalate(S.Monoid)('\n')
    );

    const title = `${chalk.yellowBright.underline.bold('Warnings')}(${chalk.yellow.dim.underline(
      warnings.length
    )})`;

    console.warn('\n');
    console.warn(title);
    console.warn(warningStr);
  };
}

export function logOutput(outputMsgs: string[]): IO.IO<void> {
  return () => {
    if (A.isEmpty(outputMsgs)) return;

    const outputStr = pipe(outputMsgs, A.intercalate(S.Monoid)('\n'));
    console.log(outputStr);
  };
}

/**
 * Turns `process.argv` into the argv the parser expects: the script's base
 * name as the program name, followed by the user's arguments.
 */
export function toProgramArgv(processArgv: string[]): string[] {
  const scriptPath = processArgv[INDEX_OF_CLI_ARGS - 1] ?? '';
  const cliArgs = slice(INDEX_OF_CLI_ARGS, Infinity, processArgv);

  return [path.basename(scriptPath), ...cliArgs];
}

interface PackageJson {
  readonly version: string;
}

export function getCliVersion(baseDir: string = __dirname): IO.IO<string> {
  return () =>
    pipe(
      PACKAGE_JSON_SEARCH_DIRS,
      A.map(relativeDir => path.join(baseDir, relativeDir, 'package.json')),
      A.findFirst(fsExtra.pathExistsSync),
      O.map(packageJsonPath => {
        const { version }: PackageJson = fsExtra.readJSONSync(packageJsonPath);
        return version;
      }),
      O.getOrElse(() => 'unknown')
    );
}
