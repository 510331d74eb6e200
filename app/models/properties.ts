import _ from 'lodash';
import { TypeMismatchError } from '../util/errors';

export type SerializedProperties = Record<string, unknown> & { datetime: string | null };

/**
 * Additional metadata fields of an Item (the GeoJSON Feature properties). Only
 * `datetime` is required, and it may be null when start_datetime and end_datetime
 * are given.
 */
export default class Properties {
  private _datetime: string | null;

  private readonly _otherProperties: Record<string, unknown> = {};

  /**
   * @param datetime - the searchable UTC date and time of the assets, formatted
   * according to RFC 3339, section 5.6, or null
   */
  constructor(datetime: string | null) {
    this._datetime = datetime;
    this.datetime = datetime;
  }

  get datetime(): string | null {
    return this._datetime;
  }

  set datetime(value: string | null) {
    if (value !== null && typeof value !== 'string') {
      throw new TypeMismatchError(`datetime has type ${typeof value} but must have string type or null`);
    }
    this._datetime = value;
  }

  /**
   * Additional properties. Assigning an object merges it into the existing
   * properties; assigning null clears them.
   */
  get otherProperties(): Record<string, unknown> {
    return this._otherProperties;
  }

  set otherProperties(value: Record<string, unknown> | null) {
    if (value === null) {
      for (const key of Object.keys(this._otherProperties)) {
        delete this._otherProperties[key];
      }
      return;
    }
    if (!_.isPlainObject(value)) {
      throw new TypeMismatchError('otherProperties must be a plain object or null');
    }
    Object.assign(this._otherProperties, value);
  }

  toJSON(): SerializedProperties {
    return { ..._.cloneDeep(this._otherProperties), datetime: this._datetime };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
