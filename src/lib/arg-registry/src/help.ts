import chalk from 'chalk';

import { join } from 'ramda';
import { DefinitionView } from './types';
import { NO_DEFAULT_PLACEHOLDER, REQUIREMENT_MARKER } from './constants';

const DEFAULT_LEFT_PADDING = '  ';
const COLUMN_GAP = '  ';

interface HelpRow {
  aliases: string;
  description: string;
  defaultValue: string;
  marker: string;
}

/**
 * Renders the help listing: a usage line followed by one row per definition,
 * in registration order. Each row carries the aliases, the description, the
 * default (or `<none>` when it is empty) and a required/optional marker.
 */
export function formatHelp(
  programName: string,
  definitions: ReadonlyArray<DefinitionView>,
  color: boolean
): string {
  const palette = new chalk.Instance({ level: color ? chalk.level : 0 });
  const heading = (title: string) => palette.yellow.bold(title);

  const helpRows = definitions.map(toHelpRow);
  const aliasColumnWidth = widestOf(helpRows.map(({ aliases }) => aliases));
  const descriptionColumnWidth = widestOf(
    helpRows.map(({ description }) => description)
  );

  const optionLines = helpRows.map(
    ({ aliases, description, defaultValue, marker }) =>
      DEFAULT_LEFT_PADDING +
      [
        aliases.padEnd(aliasColumnWidth),
        description.padEnd(descriptionColumnWidth),
        `default: ${defaultValue}`,
        marker,
      ].join(COLUMN_GAP)
  );

  const usageLine = [programName, '[OPTIONS...]'].filter(Boolean).join(' ');

  return [
    heading('USAGE:'),
    `${DEFAULT_LEFT_PADDING}${usageLine}`,
    '',
    heading('OPTIONS:'),
    ...optionLines,
  ].join('\n');
}

function toHelpRow(definition: DefinitionView): HelpRow {
  return {
    aliases: join(', ', definition.aliases),
    description: definition.description,
    defaultValue: definition.defaultValue || NO_DEFAULT_PLACEHOLDER,
    marker: definition.required
      ? REQUIREMENT_MARKER.required
      : REQUIREMENT_MARKER.optional,
  };
}

function widestOf(columnValues: string[]): number {
  return Math.max(0, ...columnValues.map(({ length }) => length));
}
