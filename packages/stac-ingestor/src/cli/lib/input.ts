/**
 * Read a JSON or YAML document from a file, or from stdin when path is "-"
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * @throws {Error} When the document cannot be read or parsed
 */
export async function readDocument(path: string): Promise<unknown> {
  const text = path === '-' ? await readStdin() : await readFile(path, 'utf-8');
  try {
    return parseYaml(text);
  } catch (error) {
    throw new Error(
      `Could not parse ${path === '-' ? 'stdin' : path}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}
