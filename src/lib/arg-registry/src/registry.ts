import * as A from 'fp-ts/lib/Array';
import * as E from 'fp-ts/lib/Either';
import * as L from 'monocle-ts/lib/Lens';
import * as O from 'fp-ts/lib/Option';
import * as NEA from 'fp-ts/lib/NonEmptyArray';

import scanTokens from './parser';

import { formatHelp } from './help';
import { normalizeScalar, parseScalarText } from './scalar';
import { constTrue, pipe } from 'fp-ts/lib/function';
import { DEFAULT_PARSER_SETTINGS, FLAG_SET_VALUE, PROGRAM_NAME_INDEX } from './constants';
import { createArgError, joinAliases, normalizeAliases } from './utils';
import {
  Argv,
  ArgError,
  ScanEvent,
  ScanConfig,
  ScalarKind,
  ScalarInput,
  ArgErrorKind,
  ErrorHandler,
  ParseSummary,
  ArgumentEntry,
  ScalarTypeMap,
  DefinitionView,
  ParserSettings,
  PostHelpHandler,
  SCAN_EVENT_TYPE,
} from './types';

type RegistrationResult = E.Either<ArgError, ReadonlyArray<string>>;

const valueLens = pipe(L.id<ArgumentEntry>(), L.prop('value'));
const requirementLens = pipe(L.id<ArgumentEntry>(), L.prop('requirement'));

const markRequirementFound = pipe(
  requirementLens,
  L.modify((requirement: O.Option<boolean>) => pipe(requirement, O.map(constTrue)))
);

/**
 * Holds the registered argument definitions of one program and performs a
 * single parse pass over its argv.
 *
 * Definitions can only be added before `parse` runs. Errors never throw: they
 * are passed to the `onError` handler, kept as the last error, and returned as
 * a `Left`.
 */
export default class ArgRegistry {
  #settings: ParserSettings;

  #entries: ArgumentEntry[] = [];
  #aliasIndex = new Map<string, number>();

  #parsed = false;
  #programName = '';
  #unmatched: string[] = [];
  #lastError: O.Option<ArgError> = O.none;

  constructor(parserSettings: Partial<ParserSettings> = {}) {
    this.#settings = { ...DEFAULT_PARSER_SETTINGS, ...parserSettings };
  }

  setErrorHandler(onError: ErrorHandler): void {
    this.#settings = { ...this.#settings, onError };
  }

  setPostHelpHandler(onPostHelp: PostHelpHandler): void {
    this.#settings = { ...this.#settings, onPostHelp };
  }

  setAutoHelp(autoHelp: boolean): void {
    this.#settings = { ...this.#settings, autoHelp };
  }

  addOption(
    aliases: ReadonlyArray<string>,
    description: string,
    defaultValue: ScalarInput = '',
    required = false
  ): RegistrationResult {
    return this.#addDefinition(aliases, description, defaultValue, required, false);
  }

  addFlag(
    aliases: ReadonlyArray<string>,
    description: string,
    defaultValue: boolean,
    required = false
  ): RegistrationResult {
    return this.#addDefinition(aliases, description, defaultValue, required, true);
  }

  parse(argv: Argv): E.Either<ArgError, ParseSummary> {
    const programName = pipe(
      argv,
      A.lookup(PROGRAM_NAME_INDEX),
      O.getOrElse(() => '')
    );

    if (this.#parsed) return this.#reportError(ArgErrorKind.ALREADY_PARSED, programName);

    this.#parsed = true;
    this.#programName = programName;

    // eslint-disable-next-line no-restricted-syntax
    for (const scanEvent of scanTokens(argv, this.#scanConfig())) {
      const scanOutcome = this.#applyScanEvent(scanEvent);
      if (E.isLeft(scanOutcome)) return scanOutcome;
    }

    return pipe(
      this.#entries,
      A.findFirst(({ requirement }: ArgumentEntry) => pipe(requirement, O.exists(found => !found))),
      O.fold(
        (): E.Either<ArgError, ParseSummary> =>
          E.right({ programName, unmatched: this.unmatched() }),

        ({ definition }) =>
          this.#reportError(
            ArgErrorKind.MISSING_REQUIRED_ARGUMENT,
            joinAliases(definition.aliases)
          )
      )
    );
  }

  get<Kind extends ScalarKind>(alias: string, kind: Kind): O.Option<ScalarTypeMap[Kind]> {
    return pipe(
      this.#findEntry(alias),
      O.chain(({ value }) => {
        const parsedValue = parseScalarText(kind, value);

        if (E.isLeft(parsedValue)) {
          this.#reportError(ArgErrorKind.INCORRECT_ARGUMENT_TYPE, `${alias}=${value}`);
        }

        return O.fromEither(parsedValue);
      })
    );
  }

  unmatched(): ReadonlyArray<string> {
    return [...this.#unmatched];
  }

  programName(): string {
    return this.#programName;
  }

  isParsed(): boolean {
    return this.#parsed;
  }

  lastError(): O.Option<ArgError> {
    return this.#lastError;
  }

  definitions(): ReadonlyArray<DefinitionView> {
    return this.#entries.map(({ definition, value, requirement }) => ({
      ...definition,
      value,
      required: O.isSome(requirement),
    }));
  }

  helpText(): string {
    return formatHelp(this.#programName, this.definitions(), this.#settings.color);
  }

  #addDefinition(
    aliases: ReadonlyArray<string>,
    description: string,
    defaultValue: ScalarInput,
    required: boolean,
    isFlag: boolean
  ): RegistrationResult {
    const uniqueAliases = normalizeAliases(aliases);

    if (this.#parsed) {
      return this.#reportError(ArgErrorKind.ALREADY_PARSED, joinAliases(uniqueAliases));
    }

    if (A.isEmpty(uniqueAliases)) {
      return this.#reportError(ArgErrorKind.MISSING_ALIASES, description);
    }

    return pipe(
      uniqueAliases,
      A.filter((alias: string) => this.#aliasIndex.has(alias)),
      NEA.fromArray,
      O.fold(
        (): RegistrationResult =>
          pipe(
            normalizeScalar(defaultValue),
            E.fold(
              (unreadableText): RegistrationResult =>
                this.#reportError(
                  ArgErrorKind.INCORRECT_ARGUMENT_TYPE,
                  `${joinAliases(uniqueAliases)}=${unreadableText}`
                ),

              defaultText => {
                const entryIndex = this.#entries.length;

                this.#entries.push({
                  definition: {
                    aliases: uniqueAliases,
                    description,
                    defaultValue: defaultText,
                    isFlag,
                  },
                  value: defaultText,
                  requirement: required ? O.some(false) : O.none,
                });

                uniqueAliases.forEach(alias => this.#aliasIndex.set(alias, entryIndex));
                return E.right(uniqueAliases);
              }
            )
          ),

        // Every clashing alias is reported before the whole registration is rejected
        duplicateAliases =>
          pipe(
            duplicateAliases,
            NEA.map(alias => this.#reportError(ArgErrorKind.DUPLICATE_DEFINITION, alias)),
            NEA.head
          )
      )
    );
  }

  #scanConfig(): ScanConfig {
    const { autoHelp, helpAliases } = this.#settings;

    return {
      autoHelp,
      helpAliases,
      lookupAlias: (token: string) =>
        pipe(
          O.fromNullable(this.#aliasIndex.get(token)),
          O.map(entryIndex => ({
            entryIndex,
            isFlag: this.#entries[entryIndex].definition.isFlag,
          }))
        ),
    };
  }

  #applyScanEvent(scanEvent: ScanEvent): E.Either<ArgError, void> {
    switch (scanEvent.eventType) {
      case SCAN_EVENT_TYPE.HELP_REQUESTED:
        this.#printHelp();
        this.#settings.onPostHelp?.();
        return E.right(undefined);

      case SCAN_EVENT_TYPE.FLAG_SET:
        this.#recordValue(scanEvent.entryIndex, FLAG_SET_VALUE);
        return E.right(undefined);

      case SCAN_EVENT_TYPE.VALUE_SUPPLIED:
        this.#recordValue(scanEvent.entryIndex, scanEvent.value);
        return E.right(undefined);

      case SCAN_EVENT_TYPE.VALUE_MISSING:
        return this.#reportError(ArgErrorKind.EXPECTED_VALUE, scanEvent.alias);

      case SCAN_EVENT_TYPE.UNMATCHED_TOKEN:
        this.#unmatched.push(scanEvent.token);
        return E.right(undefined);

      default:
        return E.right(undefined);
    }
  }

  #recordValue(entryIndex: number, value: string): void {
    this.#entries[entryIndex] = pipe(
      this.#entries[entryIndex],
      valueLens.set(value),
      markRequirementFound
    );
  }

  #printHelp(): void {
    this.#settings.write(this.helpText());
  }

  #findEntry(alias: string): O.Option<ArgumentEntry> {
    return pipe(
      O.fromNullable(this.#aliasIndex.get(alias)),
      O.map(entryIndex => this.#entries[entryIndex])
    );
  }

  #reportError(kind: ArgErrorKind, context: string): E.Either<ArgError, never> {
    const argError = createArgError(kind, context);

    this.#lastError = O.some(argError);
    this.#settings.onError?.(kind, context);

    return E.left(argError);
  }
}
