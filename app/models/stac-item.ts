import type { Geometry as GeoJsonGeometryObject } from 'geojson';
import env from '../util/env';
import { InvalidConfigurationError, TypeMismatchError } from '../util/errors';
import { writeJsonFile } from '../util/file';
import type { Geometry } from '../util/geometry';
import logger from '../util/log';
import { documentLocation, documentName, fixDirectorySyntax, normalizePath } from '../util/stac-path';
import { MediaType } from '../vocabulary/media-types';
import { RelationType } from '../vocabulary/relation-types';
import Asset, { serializeAssets } from './asset';
import type { SerializedAsset } from './asset';
import Link from './link';
import type { SerializedLink } from './link';
import { appendChildLink, checkChildPath, checkParentKind, createParentLink, createRootLink } from './node';
import type { ParentNode, PersistableNode, PersistContext, PersistEvent } from './node';
import Properties from './properties';
import type { SerializedProperties } from './properties';

export interface ItemOptions {
  // The catalog or collection containing the item
  parent?: ParentNode | null;
  stacVersion?: string;
  // Id of the collection the item belongs to
  collection?: string;
}

export interface SerializedItem {
  type: 'Feature';
  stac_version: string;
  id: string;
  stac_extensions?: string[];
  geometry: GeoJsonGeometryObject | null;
  bbox: number[] | null;
  properties: SerializedProperties;
  links: SerializedLink[];
  assets: Record<string, SerializedAsset>;
  collection?: string;
}

/**
 * An Item is a GeoJSON Feature holding the metadata of a scene and links to its assets.
 * Items are the leaves of the tree of catalogs and collections, and always have a parent.
 */
export default class StacItem implements PersistableNode {
  readonly kind = 'Feature';

  readonly rootDirectory: string;

  // Unique within the collection that contains the item
  readonly id: string;

  readonly path: string;

  // Footprint of the assets, in WGS 84 longitude/latitude
  readonly geometry: Geometry | null;

  // null without geometry, or when the geometry has no positions
  readonly bbox: number[] | null;

  readonly stacVersion: string;

  readonly stacExtensions: string[] = [];

  readonly properties: Properties;

  readonly links: Link[] = [];

  readonly assets: Record<string, Asset>;

  readonly parent: ParentNode;

  private _collection?: string;

  /**
   * Creates an item, computes its links and adds an item link to its parent
   *
   * @param directory - root directory where the catalog files are written
   * @param id - provider identifier of the item
   * @param nodePath - location of the item in the tree, as a REST path
   * @param geometry - footprint of the assets, or null
   * @param properties - additional metadata of the item
   * @param assets - assets that can be downloaded, each with a unique key
   * @param options - parent (mandatory), STAC version and collection id
   * @throws InvalidConfigurationError - if no parent is given or the path does not descend from it
   * @throws TypeMismatchError - if the parent is not a catalog or a collection
   */
  constructor(
    directory: string,
    id: string,
    nodePath: string,
    geometry: Geometry | null,
    properties: Properties,
    assets: Record<string, Asset>,
    options: ItemOptions = {},
  ) {
    this.rootDirectory = fixDirectorySyntax(directory);
    this.id = id;
    this.path = normalizePath(nodePath);
    this.geometry = geometry;
    const bounds = geometry ? geometry.bounds() : [];
    this.bbox = bounds.length > 0 ? bounds : null;
    this.stacVersion = options.stacVersion ?? env.stacVersion;
    this.properties = properties;
    this.assets = assets;
    this.collection = options.collection;
    this.parent = this.validateParent(options.parent);
    this.createLinks();
  }

  /**
   * The id of the collection this item references. Must be a non-empty string.
   */
  get collection(): string | undefined {
    return this._collection;
  }

  set collection(value: string | undefined) {
    if (value !== undefined && (typeof value !== 'string' || value.length === 0)) {
      throw new TypeMismatchError('collection must be a non-empty string or undefined');
    }
    this._collection = value;
  }

  private validateParent(parent: unknown): ParentNode {
    if (parent === undefined || parent === null) {
      throw new InvalidConfigurationError('parent cannot be undefined for an item');
    }
    const validParent = checkParentKind(parent);
    checkChildPath(this.path, validParent);
    return validParent;
  }

  private createLinks(): void {
    this.links.push(createRootLink(this.id, this.path, this.parent));
    this.links.push(new Link(documentName(this.id), RelationType.SELF, MediaType.STAC_ITEM, this.id));
    appendChildLink(this, this.parent, this.id);
    this.links.push(createParentLink(this.parent));
  }

  /**
   * Declares an extension implemented by this item. Extension fields of an item live in
   * its properties.
   *
   * @param extensionName - the extension schema URI
   * @param properties - the fields contributed by the extension
   */
  addStacExtension(extensionName: string, properties: Record<string, unknown> = {}): void {
    if (!this.stacExtensions.includes(extensionName)) {
      this.stacExtensions.push(extensionName);
    }
    this.properties.otherProperties = properties;
  }

  toJSON(): SerializedItem {
    const item: SerializedItem = {
      type: this.kind,
      stac_version: this.stacVersion,
      id: this.id,
      ...(this.stacExtensions.length > 0 && { stac_extensions: [...this.stacExtensions] }),
      geometry: this.geometry ? this.geometry.toInterchangeFormat() : null,
      bbox: this.bbox ? [...this.bbox] : null,
      properties: this.properties.toJSON(),
      links: this.links.map((link) => link.toJSON()),
      assets: serializeAssets(this.assets),
    };
    if (this._collection !== undefined) {
      item.collection = this._collection;
    }
    return item;
  }

  get filename(): string {
    return documentLocation(this.rootDirectory, this.path, this.id);
  }

  async persist(event: PersistEvent, context: PersistContext): Promise<void> {
    if (event === 'save') {
      const { filename } = this;
      logger.debug(`Saving in ${filename}`);
      await writeJsonFile(filename, this.toJSON(), context.jsonIndent);
      context.written.push(filename);
    } else {
      context.print(`\t ${this.kind} ${this.id} : ${this.path}/${documentName(this.id)}`);
    }
  }

  describe(): string {
    return `StacItem[id='${this.id}']`;
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
