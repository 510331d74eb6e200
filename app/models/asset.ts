import _ from 'lodash';
import { TypeMismatchError } from '../util/errors';
import { ASSET_TYPES } from '../vocabulary/media-types';
import type { AssetType } from '../vocabulary/media-types';
import { ASSET_ROLES } from '../vocabulary/roles';
import type { StacAssetRole } from '../vocabulary/roles';
import { assertOptionalString } from './link';

export interface SerializedAsset {
  href: string;
  title?: string;
  description?: string;
  type?: string;
  roles?: StacAssetRole[];
}

/**
 * A URI to data associated with an Item or Collection that can be downloaded or streamed
 */
export default class Asset {
  private _href: string;

  private _title?: string;

  private _description?: string;

  private _type?: AssetType;

  readonly roles: StacAssetRole[] = [];

  /**
   * @param href - URI to the asset object, relative or absolute
   */
  constructor(href: string) {
    this._href = href;
    this.href = href;
  }

  get href(): string {
    return this._href;
  }

  set href(value: string) {
    if (typeof value !== 'string') {
      throw new TypeMismatchError(`href has type ${typeof value} but must have string type`);
    }
    this._href = value;
  }

  get title(): string | undefined {
    return this._title;
  }

  set title(value: string | undefined) {
    assertOptionalString('title', value);
    this._title = value;
  }

  get description(): string | undefined {
    return this._description;
  }

  set description(value: string | undefined) {
    assertOptionalString('description', value);
    this._description = value;
  }

  get type(): AssetType | undefined {
    return this._type;
  }

  set type(value: AssetType | undefined) {
    if (value !== undefined && !ASSET_TYPES.has(value)) {
      throw new TypeMismatchError(`type ${String(value)} is not an asset or common media type`);
    }
    this._type = value;
  }

  /**
   * Adds a role, looked up from its wire value
   *
   * @param role - the role, e.g. `thumbnail`
   * @returns this asset
   */
  addRole(role: string): this {
    this.roles.push(ASSET_ROLES.find(role));
    return this;
  }

  toJSON(): SerializedAsset {
    const asset: SerializedAsset = { href: this._href };
    if (this._title !== undefined) {
      asset.title = this._title;
    }
    if (this._description !== undefined) {
      asset.description = this._description;
    }
    if (this._type !== undefined) {
      asset.type = this._type;
    }
    if (this.roles.length > 0) {
      asset.roles = [...this.roles];
    }
    return asset;
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}

/**
 * Projects a map of assets to the map of their JSON representations
 *
 * @param assets - assets keyed by name
 * @returns the serialized assets, keyed by the same names
 */
export function serializeAssets(assets: Record<string, Asset>): Record<string, SerializedAsset> {
  return _.mapValues(assets, (asset) => asset.toJSON());
}
