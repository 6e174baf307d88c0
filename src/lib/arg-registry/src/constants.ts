import { ParserSettings } from './types';

export const PROGRAM_NAME_INDEX = 0;

export const FLAG_SET_VALUE = 'true';

export const NO_DEFAULT_PLACEHOLDER = '<none>';

export const REQUIREMENT_MARKER = {
  required: '<required>',
  optional: '<optional>',
};

export const scalarTextPattern = {
  integer: /^[+-]?\d+$/,
  float: /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/,
};

export const BOOLEAN_TEXT = {
  truthy: ['true', '1'],
  falsy: ['false', '0'],
};

export const DEFAULT_PARSER_SETTINGS: ParserSettings = {
  autoHelp: true,
  helpAliases: ['-h', '--help'],
  color: true,
  write: (text: string) => console.log(text),
};
