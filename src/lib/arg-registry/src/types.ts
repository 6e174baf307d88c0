import { Option } from 'fp-ts/lib/Option';
import { LiteralUnion } from 'type-fest';

export type Argv = string[];

export enum ArgErrorKind {
  DUPLICATE_DEFINITION = 'DUPLICATE_DEFINITION',
  MISSING_REQUIRED_ARGUMENT = 'MISSING_REQUIRED_ARGUMENT',
  INCORRECT_ARGUMENT_TYPE = 'INCORRECT_ARGUMENT_TYPE',
  EXPECTED_VALUE = 'EXPECTED_VALUE',
  ALREADY_PARSED = 'ALREADY_PARSED',
  MISSING_ALIASES = 'MISSING_ALIASES',
}

export interface ArgError {
  readonly kind: ArgErrorKind;
  // The offending alias, or the space-joined aliases of a definition
  // (the description for a definition registered without any alias)
  readonly context: string;
}

export type ErrorHandler = (kind: ArgErrorKind, context: string) => void;
export type PostHelpHandler = () => void;

export type Scalar =
  | { readonly _tag: 'Text'; readonly value: string }
  | { readonly _tag: 'Integer'; readonly value: number }
  | { readonly _tag: 'Float'; readonly value: number }
  | { readonly _tag: 'Boolean'; readonly value: boolean };

export type ScalarInput = Scalar | string | number | boolean;

export interface ScalarTypeMap {
  string: string;
  integer: number;
  float: number;
  boolean: boolean;
}

export type ScalarKind = keyof ScalarTypeMap;

export type HelpAlias = '-h' | '--help';

export interface ParserSettings {
  autoHelp: boolean;
  helpAliases: ReadonlyArray<LiteralUnion<HelpAlias, string>>;
  color: boolean;
  write: (text: string) => void;
  onError?: ErrorHandler;
  onPostHelp?: PostHelpHandler;
}

export interface ArgumentDefinition {
  readonly aliases: ReadonlyArray<string>;
  readonly description: string;
  readonly defaultValue: string;
  readonly isFlag: boolean;
}

// `requirement` is a tri-state: none = optional, some(false) = required but unseen, some(true) = required and seen
export interface ArgumentEntry {
  readonly definition: ArgumentDefinition;
  readonly value: string;
  readonly requirement: Option<boolean>;
}

export interface DefinitionView extends ArgumentDefinition {
  readonly value: string;
  readonly required: boolean;
}

export interface ParseSummary {
  readonly programName: string;
  readonly unmatched: ReadonlyArray<string>;
}

export enum PARSER_TOKEN_TYPE {
  // Example: ['--help'] with automatic help enabled
  HELP = 'HELP',

  // Example: ['--verbose'] where --verbose is a registered flag
  FLAG = 'FLAG',

  // Example: ['--name', 'value']
  OPTION = 'OPTION',

  // Anything that is not a registered alias
  UNMATCHED = 'UNMATCHED',
}

export type ClassifiedToken =
  | { tokenType: PARSER_TOKEN_TYPE.HELP | PARSER_TOKEN_TYPE.UNMATCHED }
  | {
      tokenType: PARSER_TOKEN_TYPE.FLAG | PARSER_TOKEN_TYPE.OPTION;
      entryIndex: number;
    };

export interface AliasTarget {
  entryIndex: number;
  isFlag: boolean;
}

export interface ScanConfig {
  autoHelp: boolean;
  helpAliases: ReadonlyArray<string>;
  lookupAlias: (token: string) => Option<AliasTarget>;
}

export enum SCAN_EVENT_TYPE {
  HELP_REQUESTED = 'HELP_REQUESTED',
  FLAG_SET = 'FLAG_SET',
  VALUE_SUPPLIED = 'VALUE_SUPPLIED',
  VALUE_MISSING = 'VALUE_MISSING',
  UNMATCHED_TOKEN = 'UNMATCHED_TOKEN',
}

export interface HelpRequested {
  eventType: SCAN_EVENT_TYPE.HELP_REQUESTED;
}

export interface FlagSet {
  eventType: SCAN_EVENT_TYPE.FLAG_SET;
  entryIndex: number;
}

export interface ValueSupplied {
  eventType: SCAN_EVENT_TYPE.VALUE_SUPPLIED;
  entryIndex: number;
  value: string;
}

export interface ValueMissing {
  eventType: SCAN_EVENT_TYPE.VALUE_MISSING;
  alias: string;
}

export interface UnmatchedToken {
  eventType: SCAN_EVENT_TYPE.UNMATCHED_TOKEN;
  token: string;
}

export type ScanEvent = HelpRequested | FlagSet | ValueSupplied | ValueMissing | UnmatchedToken;
