import * as A from 'fp-ts/lib/Array';
import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import * as IO from 'fp-ts/lib/IO';

import ArgRegistry, { formatArgError } from './lib/arg-registry';

import { pipe } from 'fp-ts/lib/function';
import { sequenceS } from 'fp-ts/lib/Apply';
import { createLogger, Logger } from './lib/logger';
import { getCliVersion, logOutput, logWarnings } from './utils';
import {
  ExitCodes,
  MAX_GREETING_COUNT,
  DEFAULT_GREETING_COUNT,
  DEFAULT_GREETING_TARGET,
} from './constants';

interface GreetingInputs {
  name: string;
  times: number;
  shout: boolean;
  version: boolean;
}

function registerCliOptions(registry: ArgRegistry) {
  return pipe(
    [
      registry.addOption(['-n', '--name'], 'Who to greet', DEFAULT_GREETING_TARGET),
      registry.addOption(['-t', '--times'], 'How many times to greet', DEFAULT_GREETING_COUNT),
      registry.addFlag(['-s', '--shout'], 'Greet in upper case', false),
      registry.addFlag(['-v', '--version'], 'Print the version', false),
    ],
    A.sequence(E.Applicative)
  );
}

function readGreetingInputs(registry: ArgRegistry): O.Option<GreetingInputs> {
  return sequenceS(O.Apply)({
    name: registry.get('--name', 'string'),
    times: registry.get('--times', 'integer'),
    shout: registry.get('--shout', 'boolean'),
    version: registry.get('--version', 'boolean'),
  });
}

function renderGreetings({ name, times, shout }: GreetingInputs): string[] {
  const greeting = `Hello, ${name}!`;
  return A.replicate(Math.max(times, 0), shout ? greeting.toUpperCase() : greeting);
}

function reportUnmatchedArgs(unmatched: ReadonlyArray<string>): IO.IO<void> {
  return logWarnings(unmatched.map(token => `Ignoring unrecognized argument: ${token}`));
}

export default function main(argv: string[], logger: Logger = createLogger()): ExitCodes {
  const registry = new ArgRegistry({
    onError: (kind, context) => logger.ERROR(formatArgError({ kind, context }))(),
    onPostHelp: () => process.exit(ExitCodes.OK),
  });

  // Errors have already been logged by the `onError` handler by the time a `none` comes out
  return pipe(
    registerCliOptions(registry),
    E.chainW(() => registry.parse(argv)),
    O.fromEither,
    O.bindTo('parseSummary'),
    O.bind('greetingInputs', () => readGreetingInputs(registry)),

    O.fold(
      (): ExitCodes => ExitCodes.GENERAL,

      ({ parseSummary, greetingInputs }) => {
        if (!greetingInputs.version && greetingInputs.times > MAX_GREETING_COUNT) {
          logger.ERROR(
            `Cannot greet more than ${MAX_GREETING_COUNT} times: ${greetingInputs.times}`
          )();
          return ExitCodes.GENERAL;
        }

        const output = greetingInputs.version
          ? [`v${getCliVersion()()}`]
          : renderGreetings(greetingInputs);

        pipe(
          reportUnmatchedArgs(parseSummary.unmatched),
          IO.chain(() => logOutput(output))
        )();

        return ExitCodes.OK;
      }
    )
  );
}
