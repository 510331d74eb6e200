import { TypeMismatchError } from '../util/errors';
import { LINK_MEDIA_TYPES } from '../vocabulary/media-types';
import type { LinkMediaType } from '../vocabulary/media-types';
import { LINK_RELATION_TYPES } from '../vocabulary/relation-types';
import type { LinkRelationType } from '../vocabulary/relation-types';

/**
 * The format of a Link in a STAC document
 */
export interface SerializedLink {
  href: string;
  rel: string;
  type?: string;
  title?: string;
}

/**
 * Asserts that a value is a string or undefined
 *
 * @param field - the name of the field being assigned, used in the error message
 * @param value - the value to check
 * @throws TypeMismatchError - if the value has another type
 */
export function assertOptionalString(field: string, value: unknown): asserts value is string | undefined {
  if (value !== undefined && typeof value !== 'string') {
    throw new TypeMismatchError(`${field} has type ${typeof value} but must have string type or undefined`);
  }
}

/**
 * A relationship with another entity. The href and relation type are fixed at
 * construction, the media type and title can be changed afterwards.
 */
export default class Link {
  readonly href: string;

  readonly rel: LinkRelationType;

  private _type?: LinkMediaType;

  private _title?: string;

  /**
   * @param href - the actual link, relative or absolute
   * @param rel - relationship between the current document and the linked document
   * @param type - media type of the referenced entity
   * @param title - human readable title used when rendering the link
   */
  constructor(href: string, rel: LinkRelationType, type?: LinkMediaType, title?: string) {
    if (!LINK_RELATION_TYPES.has(rel)) {
      throw new TypeMismatchError(`rel ${String(rel)} is not a known link relation type`);
    }
    this.href = href;
    this.rel = rel;
    this.type = type;
    this.title = title;
  }

  get type(): LinkMediaType | undefined {
    return this._type;
  }

  set type(value: LinkMediaType | undefined) {
    if (value !== undefined && !LINK_MEDIA_TYPES.has(value)) {
      throw new TypeMismatchError(`type ${String(value)} is not a STAC or common media type`);
    }
    this._type = value;
  }

  get title(): string | undefined {
    return this._title;
  }

  set title(value: string | undefined) {
    assertOptionalString('title', value);
    this._title = value;
  }

  /**
   * Returns the link as it appears in a STAC document
   */
  toJSON(): SerializedLink {
    const link: SerializedLink = { href: this.href, rel: this.rel };
    if (this._type !== undefined) {
      link.type = this._type;
    }
    if (this._title !== undefined) {
      link.title = this._title;
    }
    return link;
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
