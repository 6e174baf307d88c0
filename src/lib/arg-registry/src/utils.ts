import { join, uniq } from 'ramda';
import { match } from 'ts-pattern';
import { ArgError, ArgErrorKind } from './types';

export function createArgError(kind: ArgErrorKind, context: string): ArgError {
  return { kind, context };
}

export function errorKindToString(kind: ArgErrorKind): string {
  return match(kind)
    .with(ArgErrorKind.DUPLICATE_DEFINITION, () => 'Duplicate definition')
    .with(ArgErrorKind.MISSING_REQUIRED_ARGUMENT, () => 'Missing required argument')
    .with(ArgErrorKind.INCORRECT_ARGUMENT_TYPE, () => 'Incorrect argument type')
    .with(ArgErrorKind.EXPECTED_VALUE, () => 'Expected value')
    .with(ArgErrorKind.ALREADY_PARSED, () => 'Arguments already parsed')
    .with(ArgErrorKind.MISSING_ALIASES, () => 'Missing aliases')
    .exhaustive();
}

export function formatArgError({ kind, context }: ArgError): string {
  return `${errorKindToString(kind)}: ${context}`;
}

export function joinAliases(aliases: ReadonlyArray<string>): string {
  return join(' ', aliases);
}

export function normalizeAliases(aliases: ReadonlyArray<string>): string[] {
  return uniq(aliases);
}

export function isHelpAlias(helpAliases: ReadonlyArray<string>) {
  return (token: string) => helpAliases.includes(token);
}
