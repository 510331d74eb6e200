/* eslint-disable max-classes-per-file */ // This file creates multiple tag classes

export class StacError extends Error {
  code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

// Malformed parent/path combinations, detected while constructing a node
export class InvalidConfigurationError extends StacError {
  constructor(message = 'Invalid catalog configuration') {
    super('stac.InvalidConfiguration', message);
  }
}

export class TypeMismatchError extends StacError {
  constructor(message = 'Value has an unexpected type') {
    super('stac.TypeMismatch', message);
  }
}

export class UnknownVocabularyValueError extends StacError {
  vocabulary: string;

  constructor(vocabulary: string, message: string) {
    super('stac.UnknownVocabularyValue', `${vocabulary}: ${message}`);
    this.vocabulary = vocabulary;
  }
}

// Never caught: signals a bug in the node hierarchy itself
export class InternalConsistencyError extends StacError {
  constructor(message = 'Internal consistency error') {
    super('stac.InternalConsistency', message);
  }
}

export interface SaveFailure {
  id: string;
  filename: string;
  cause: Error;
}

export class SaveError extends StacError {
  failures: SaveFailure[];

  constructor(failures: SaveFailure[]) {
    const ids = failures.map((f) => f.id).join(', ');
    super('stac.Save', `Failed to save ${failures.length} node(s): ${ids}`);
    this.failures = failures;
  }
}

/**
 * Returns the given value as an Error, wrapping it when something other than an Error
 * was thrown
 *
 * @param e - the thrown value
 * @returns an Error instance
 */
export function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
