import { TypeMismatchError } from '../util/errors';

export type RangeBound = string | number;

/**
 * Asserts that a range bound is a string or a number
 *
 * @param field - minimum or maximum
 * @param value - the value to check
 */
function assertBound(field: string, value: unknown): asserts value is RangeBound {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new TypeMismatchError(`${field} has type ${typeof value} but must have string or number type`);
  }
}

/**
 * A summary statistic for ordinal values (numbers, dates, grades...), used in place of
 * the full list of values in Collection summaries.
 */
export default class Range {
  private _minimum: RangeBound;

  private _maximum: RangeBound;

  constructor(minimum: RangeBound, maximum: RangeBound) {
    assertBound('minimum', minimum);
    assertBound('maximum', maximum);
    this._minimum = minimum;
    this._maximum = maximum;
  }

  get minimum(): RangeBound {
    return this._minimum;
  }

  set minimum(value: RangeBound) {
    assertBound('minimum', value);
    this._minimum = value;
  }

  get maximum(): RangeBound {
    return this._maximum;
  }

  set maximum(value: RangeBound) {
    assertBound('maximum', value);
    this._maximum = value;
  }

  toJSON(): [RangeBound, RangeBound] {
    return [this._minimum, this._maximum];
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
