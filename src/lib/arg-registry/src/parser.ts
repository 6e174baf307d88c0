import * as O from 'fp-ts/lib/Option';

import { pipe } from 'fp-ts/lib/function';
import { isHelpAlias } from './utils';
import { PROGRAM_NAME_INDEX } from './constants';
import {
  Argv,
  ScanEvent,
  ScanConfig,
  ClassifiedToken,
  SCAN_EVENT_TYPE,
  PARSER_TOKEN_TYPE,
} from './types';

export default function* scanTokens(
  argv: Argv,
  scanConfig: ScanConfig
): Generator<ScanEvent, void, undefined> {
  const classifyToken = tokenClassifier(scanConfig);

  for (let tokenIndex = PROGRAM_NAME_INDEX + 1; tokenIndex < argv.length; ) {
    const token = argv[tokenIndex];
    const classifiedToken = classifyToken(token);

    switch (classifiedToken.tokenType) {
      case PARSER_TOKEN_TYPE.HELP:
        tokenIndex += 1;
        yield { eventType: SCAN_EVENT_TYPE.HELP_REQUESTED };
        break;

      case PARSER_TOKEN_TYPE.FLAG:
        tokenIndex += 1;
        yield {
          eventType: SCAN_EVENT_TYPE.FLAG_SET,
          entryIndex: classifiedToken.entryIndex,
        };
        break;

      case PARSER_TOKEN_TYPE.OPTION: {
        const valueIndex = tokenIndex + 1;

        // An option that ends argv has nothing to consume, so the scan ends here
        if (valueIndex >= argv.length) {
          yield { eventType: SCAN_EVENT_TYPE.VALUE_MISSING, alias: token };
          return;
        }

        // The next token is taken as the value even when it looks like an alias
        tokenIndex += 2;
        yield {
          eventType: SCAN_EVENT_TYPE.VALUE_SUPPLIED,
          entryIndex: classifiedToken.entryIndex,
          value: argv[valueIndex],
        };
        break;
      }

      default:
        tokenIndex += 1;
        yield { eventType: SCAN_EVENT_TYPE.UNMATCHED_TOKEN, token };
        break;
    }
  }
}

export function tokenClassifier({ autoHelp, helpAliases, lookupAlias }: ScanConfig) {
  const isHelpToken = isHelpAlias(helpAliases);

  return (token: string): ClassifiedToken => {
    if (autoHelp && isHelpToken(token)) return { tokenType: PARSER_TOKEN_TYPE.HELP };

    return pipe(
      lookupAlias(token),
      O.fold(
        (): ClassifiedToken => ({ tokenType: PARSER_TOKEN_TYPE.UNMATCHED }),
        ({ entryIndex, isFlag }) => ({
          tokenType: isFlag ? PARSER_TOKEN_TYPE.FLAG : PARSER_TOKEN_TYPE.OPTION,
          entryIndex,
        })
      )
    );
  };
}
