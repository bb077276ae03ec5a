import { readFile } from 'node:fs/promises';
import { ValidationError } from '@refract/shared';

/** Text from an argument or, when `--file` is given, from that file. */
export async function readInput(label: string, inline: string | undefined, file: string | undefined): Promise<string> {
  if (file) return readFile(file, 'utf-8');
  if (inline !== undefined) return inline;
  throw new ValidationError(`Provide ${label} as an argument or with --file`);
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`Expected an integer, got '${value}'`);
  }
  return parsed;
}
