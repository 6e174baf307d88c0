export enum ExitCodes {
  OK = 0,
  GENERAL = 1,
}

export const INDEX_OF_CLI_ARGS = 2;

export const DEFAULT_GREETING_TARGET = 'world';

export const DEFAULT_GREETING_COUNT = 1;

export const MAX_GREETING_COUNT = 100;

// Relative to `src/utils`: package.json is two levels up from the sources and three from `dist/`
export const PACKAGE_JSON_SEARCH_DIRS = ['../..', '../../..'];
