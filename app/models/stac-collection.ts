import _ from 'lodash';
import { InvalidConfigurationError, TypeMismatchError } from '../util/errors';
import { LICENSES } from '../vocabulary/licenses';
import type { License } from '../vocabulary/licenses';
import Asset, { serializeAssets } from './asset';
import type { SerializedAsset } from './asset';
import Extent from './extent';
import type { SerializedExtent } from './extent';
import { checkChildPath, checkParentKind } from './node';
import type { ContainerKind, ParentNode } from './node';
import Provider from './provider';
import type { SerializedProvider } from './provider';
import Range from './range';
import StacCatalog from './stac-catalog';
import type { CatalogOptions, SerializedCatalog } from './stac-catalog';

export interface SerializedCollection extends SerializedCatalog {
  license: string;
  extent: SerializedExtent;
  keywords?: string[];
  providers?: SerializedProvider[];
  summaries?: Record<string, unknown>;
  assets?: Record<string, SerializedAsset>;
}

/**
 * Asserts that a value is a plain object or undefined
 *
 * @param field - the name of the field being assigned
 * @param value - the value to check
 */
function assertOptionalRecord(field: string, value: unknown): void {
  if (value !== undefined && !_.isPlainObject(value)) {
    throw new TypeMismatchError(`${field} must be an object or undefined`);
  }
}

/**
 * A Collection shares the fields of a Catalog and adds license, extent, providers,
 * keywords and summaries. Items in a collection implicitly share these fields. A
 * collection is never the root of the tree.
 */
export default class StacCollection extends StacCatalog {
  readonly keywords: string[] = [];

  // Chronological, the most recent provider last
  readonly providers: Provider[] = [];

  private _license: License;

  private _extent: Extent;

  private _summaries?: Record<string, unknown>;

  private _assets?: Record<string, Asset>;

  /**
   * Creates a collection and computes its links
   *
   * @param directory - root directory where the catalog files are written
   * @param id - identifier of the collection, unique across the provider
   * @param nodePath - location of the collection in the tree, as a REST path
   * @param description - detailed description of the collection
   * @param license - SPDX identifier of the collection's license, `proprietary` or `various`
   * @param extent - spatial and temporal extents
   * @param options - title, parent (mandatory) and STAC version
   * @throws InvalidConfigurationError - if no parent is given
   */
  constructor(
    directory: string,
    id: string,
    nodePath: string,
    description: string,
    license: License,
    extent: Extent,
    options: CatalogOptions = {},
  ) {
    super(directory, id, nodePath, description, options);
    this._license = license;
    this._extent = extent;
    this.license = license;
    this.extent = extent;
  }

  get kind(): ContainerKind {
    return 'Collection';
  }

  protected validateParent(parent: unknown): ParentNode {
    if (parent === undefined || parent === null) {
      throw new InvalidConfigurationError('parent cannot be undefined in a collection');
    }
    const validParent = checkParentKind(parent);
    checkChildPath(this.path, validParent);
    return validParent;
  }

  get license(): License {
    return this._license;
  }

  set license(value: License) {
    if (!LICENSES.has(value)) {
      throw new TypeMismatchError(`license ${String(value)} is not a known license`);
    }
    this._license = value;
  }

  get extent(): Extent {
    return this._extent;
  }

  set extent(value: Extent) {
    if (!(value instanceof Extent)) {
      throw new TypeMismatchError('extent must be an Extent');
    }
    this._extent = value;
  }

  /**
   * Property summaries: a set of values, a Range, or a JSON Schema, keyed by property
   */
  get summaries(): Record<string, unknown> | undefined {
    return this._summaries;
  }

  set summaries(value: Record<string, unknown> | undefined) {
    assertOptionalRecord('summaries', value);
    this._summaries = value;
  }

  /**
   * Assets that can be downloaded, each with a unique key
   */
  get assets(): Record<string, Asset> | undefined {
    return this._assets;
  }

  set assets(value: Record<string, Asset> | undefined) {
    assertOptionalRecord('assets', value);
    this._assets = value;
  }

  toJSON(): SerializedCollection {
    const collection: SerializedCollection = {
      ...super.toJSON(),
      license: this._license,
      extent: this._extent.toJSON(),
    };
    if (this.keywords.length > 0) {
      collection.keywords = [...this.keywords];
    }
    if (this.providers.length > 0) {
      collection.providers = this.providers.map((provider) => provider.toJSON());
    }
    if (this._summaries !== undefined) {
      collection.summaries = _.mapValues(this._summaries, (v) => (v instanceof Range ? v.toJSON() : v));
    }
    if (this._assets !== undefined) {
      collection.assets = serializeAssets(this._assets);
    }
    return collection;
  }

  describe(): string {
    return `StacCollection[id='${this.id}']`;
  }
}
