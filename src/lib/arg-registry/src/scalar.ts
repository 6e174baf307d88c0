import * as E from 'fp-ts/lib/Either';

import { match, P } from 'ts-pattern';
import { pipe } from 'fp-ts/lib/function';
import { BOOLEAN_TEXT, scalarTextPattern } from './constants';
import { Scalar, ScalarInput, ScalarKind, ScalarTypeMap } from './types';

export const text = (value: string): Scalar => ({ _tag: 'Text', value });
export const integer = (value: number): Scalar => ({ _tag: 'Integer', value });
export const float = (value: number): Scalar => ({ _tag: 'Float', value });
export const boolean = (value: boolean): Scalar => ({ _tag: 'Boolean', value });

export function toScalar(scalarInput: ScalarInput): Scalar {
  return match(scalarInput)
    .with(P.string, text)
    .with(P.boolean, boolean)
    .with(P.number, num => (Number.isInteger(num) ? integer(num) : float(num)))
    .with({ _tag: P.string }, scalar => scalar)
    .exhaustive();
}

/**
 * Normalizes a default value to the textual form every definition stores.
 * Integers are truncated, floats keep JavaScript's shortest round-trip form
 * and booleans become `true`/`false`.
 */
export function scalarToText(scalarInput: ScalarInput): string {
  return match(toScalar(scalarInput))
    .with({ _tag: 'Text' }, ({ value }) => value)
    .with({ _tag: 'Integer' }, ({ value }) => String(Math.trunc(value)))
    .with({ _tag: 'Float' }, ({ value }) => String(value))
    .with({ _tag: 'Boolean' }, ({ value }) => String(value))
    .exhaustive();
}

type TextParser<T> = (storedText: string) => E.Either<string, T>;

const textParsers: { [Kind in ScalarKind]: TextParser<ScalarTypeMap[Kind]> } = {
  string: storedText => E.right(storedText),

  integer: storedText =>
    pipe(
      storedText,
      E.fromPredicate(
        (str: string) => scalarTextPattern.integer.test(str),
        str => `${str} is not an integer`
      ),
      E.map(Number),
      E.filterOrElse(Number.isSafeInteger, () => `${storedText} is out of range`)
    ),

  float: storedText =>
    pipe(
      storedText,
      E.fromPredicate(
        (str: string) => scalarTextPattern.float.test(str),
        str => `${str} is not a number`
      ),
      E.map(Number),
      E.filterOrElse(Number.isFinite, () => `${storedText} is out of range`)
    ),

  boolean: storedText => {
    if (BOOLEAN_TEXT.truthy.includes(storedText)) return E.right(true);
    if (BOOLEAN_TEXT.falsy.includes(storedText)) return E.right(false);

    return E.left(`${storedText} is not a boolean`);
  },
};

export function parseScalarText<Kind extends ScalarKind>(
  kind: Kind,
  storedText: string
): E.Either<string, ScalarTypeMap[Kind]> {
  return textParsers[kind](storedText);
}

const scalarKindOf = (scalar: Scalar): ScalarKind =>
  match(scalar)
    .with({ _tag: 'Text' }, (): ScalarKind => 'string')
    .with({ _tag: 'Integer' }, (): ScalarKind => 'integer')
    .with({ _tag: 'Float' }, (): ScalarKind => 'float')
    .with({ _tag: 'Boolean' }, (): ScalarKind => 'boolean')
    .exhaustive();

/**
 * Normalizes a default value and checks that `get` can read it back as its own
 * kind. Non-finite floats and integers outside the safe range come out as a
 * `Left` holding the text they would have been stored as.
 */
export function normalizeScalar(scalarInput: ScalarInput): E.Either<string, string> {
  const scalar = toScalar(scalarInput);
  const storedText = scalarToText(scalar);

  return pipe(
    parseScalarText(scalarKindOf(scalar), storedText),
    E.bimap(
      () => storedText,
      () => storedText
    )
  );
}
