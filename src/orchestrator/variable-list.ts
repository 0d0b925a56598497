import * as fs from 'node:fs';
import { ConfigError, asError, describeError } from '../common/pipeline-error';

/**
 * Read a variable allow-list: one raw variable name per line, blank
 * lines ignored.
 *
 * @throws ConfigError when the file cannot be read or names nothing
 */
export async function loadVariableList(filePath: string): Promise<Set<string>> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read variable file ${filePath}: ${describeError(error)}`,
      asError(error),
    );
  }

  const names = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (names.length === 0) {
    throw new ConfigError(`Variable file ${filePath} lists no variables`);
  }
  return new Set(names);
}
