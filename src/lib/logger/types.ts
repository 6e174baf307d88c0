export type EnumKeys<E> = keyof E;

export enum LogLevels {
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

export type LogTypes = EnumKeys<typeof LogLevels>;
