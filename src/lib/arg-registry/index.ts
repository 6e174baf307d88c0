import ArgRegistry from './src/registry';
import { formatArgError, errorKindToString } from './src/utils';
import { text, integer, float, boolean } from './src/scalar';
import {
  Argv,
  Scalar,
  ArgError,
  ScalarKind,
  ScalarInput,
  ArgErrorKind,
  ErrorHandler,
  ParseSummary,
  ScalarTypeMap,
  DefinitionView,
  ParserSettings,
  PostHelpHandler,
} from './src/types';

export default ArgRegistry;

export const scalar = { text, integer, float, boolean };

export { ArgErrorKind, formatArgError, errorKindToString };

export type {
  Argv,
  Scalar,
  ArgError,
  ScalarKind,
  ScalarInput,
  ErrorHandler,
  ParseSummary,
  ScalarTypeMap,
  DefinitionView,
  ParserSettings,
  PostHelpHandler,
};
