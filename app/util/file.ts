import { promises as fs } from 'fs';
import * as path from 'path';

/**
 * Writes a JSON document, creating its directory first. An existing file is overwritten.
 *
 * @param filename - the file to write
 * @param json - the value to serialize
 * @param indent - number of spaces used to pretty-print the document
 */
export async function writeJsonFile(filename: string, json: unknown, indent: number): Promise<void> {
  await fs.mkdir(path.dirname(filename), { recursive: true });
  await fs.writeFile(filename, JSON.stringify(json, null, indent));
}
