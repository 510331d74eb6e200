import * as fs from 'fs';
import * as path from 'path';
import { UnknownVocabularyValueError } from '../util/errors';

/**
 * A closed set of wire tokens (relation types, media types, licenses...) with a lookup
 * from a raw string to the typed token.
 */
export default class Vocabulary<T extends string> {
  readonly name: string;

  private readonly tokens: ReadonlySet<string>;

  /**
   * Builds a vocabulary
   *
   * @param name - name used when reporting unknown values
   * @param values - the tokens of the vocabulary, in their wire form
   */
  constructor(name: string, values: readonly string[]) {
    this.name = name;
    this.tokens = new Set(values);
  }

  /**
   * Returns true if the token belongs to this vocabulary
   * @param token - the raw token
   */
  has(token: unknown): token is T {
    return typeof token === 'string' && this.tokens.has(token);
  }

  /**
   * Finds the token matching the raw string
   *
   * @param token - the raw token
   * @returns the token, typed as a member of the vocabulary
   * @throws UnknownVocabularyValueError - if the token is not part of the vocabulary
   */
  find(token: string): T {
    if (this.has(token)) {
      return token;
    }
    throw new UnknownVocabularyValueError(this.name, `Unknown enum value for ${token}`);
  }

  /**
   * All tokens in declaration order
   */
  values(): T[] {
    return Array.from(this.tokens).filter((t): t is T => this.has(t));
  }
}

/**
 * Reads a JSON array of strings from the data directory next to this module
 *
 * @param filename - the name of the file in the data directory
 * @returns the strings in the file
 */
export function loadTokens(filename: string): string[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, 'data', filename), 'utf8'));
  if (!Array.isArray(parsed) || !parsed.every((t) => typeof t === 'string')) {
    throw new TypeError(`${filename} must contain an array of strings`);
  }
  return parsed;
}

/**
 * A string known to belong to the vocabulary named B. Used for vocabularies read from
 * data files, whose members are not known at compile time.
 */
export type Token<B extends string> = string & { readonly __vocabulary: B };
