import env from '../util/env';
import { InvalidConfigurationError, TypeMismatchError } from '../util/errors';
import { writeJsonFile } from '../util/file';
import logger from '../util/log';
import { documentLocation, documentName, fixDirectorySyntax, normalizePath } from '../util/stac-path';
import { RelationType } from '../vocabulary/relation-types';
import Link, { assertOptionalString } from './link';
import type { SerializedLink } from './link';
import {
  appendChildLink, checkChildPath, checkParentKind, createParentLink, createRootLink, findChildLink,
  mediaTypeForKind,
} from './node';
import type { ContainerKind, ParentNode, PersistableNode, PersistContext, PersistEvent } from './node';

export interface CatalogOptions {
  // A short descriptive one-line title
  title?: string;
  // The catalog or collection this node belongs to. Omitted for the root of the tree.
  parent?: ParentNode | null;
  stacVersion?: string;
}

export interface SerializedCatalog {
  type: string;
  stac_version: string;
  id: string;
  description: string;
  links: SerializedLink[];
  stac_extensions?: string[];
  title?: string;
  [extensionField: string]: unknown;
}

/**
 * A Catalog provides links to Items or to other Catalogs and Collections. The closest
 * analog is a folder in a file structure: it splits overly large collections into groups
 * or groups collections into an entry point for navigation.
 *
 * The links of a catalog are computed from its path when it is constructed: a root link,
 * a self link and, when it has a parent, a parent link. A child link to the catalog is
 * added to the parent's links.
 *
 * @example
 * const root = new StacCatalog('/tmp/stac', 'first_cat', '/', 'My first catalog');
 * const sub = new StacCatalog('/tmp/stac', 'sub_cat', '/first_cat/sub_cat', 'A sub catalog', { parent: root });
 */
export default class StacCatalog implements ParentNode, PersistableNode {
  readonly rootDirectory: string;

  readonly id: string;

  // REST-style location in the tree, '' for the root
  readonly path: string;

  readonly stacVersion: string;

  readonly links: Link[] = [];

  readonly stacExtensions: string[] = [];

  readonly stacExtensionsProperties: Record<string, unknown> = {};

  readonly parent?: ParentNode;

  private _description: string;

  private _title?: string;

  /**
   * Creates a catalog and computes its links
   *
   * @param directory - root directory where the catalog files are written
   * @param id - identifier of the catalog
   * @param nodePath - location of the catalog in the tree, as a REST path
   * @param description - detailed description of the catalog. CommonMark 0.29 syntax may be used.
   * @param options - title, parent and STAC version
   * @throws InvalidConfigurationError - if the path does not match the presence of a parent
   * @throws TypeMismatchError - if the parent is not a catalog or a collection
   */
  constructor(directory: string, id: string, nodePath: string, description: string, options: CatalogOptions = {}) {
    this.rootDirectory = fixDirectorySyntax(directory);
    this.id = id;
    this.path = normalizePath(nodePath);
    this._description = description;
    this.stacVersion = options.stacVersion ?? env.stacVersion;
    assertOptionalString('title', options.title);
    this._title = options.title;
    this.parent = this.validateParent(options.parent ?? undefined);
    this.createLinks();
  }

  /**
   * The kind of node, written to the `type` field
   */
  get kind(): ContainerKind {
    return 'Catalog';
  }

  get description(): string {
    return this._description;
  }

  set description(value: string) {
    if (typeof value !== 'string') {
      throw new TypeMismatchError(`description has type ${typeof value} but must have string type`);
    }
    this._description = value;
  }

  /**
   * A short descriptive one-line title. Changing it updates the title of the self link
   * and of the link to this node in its parent.
   */
  get title(): string | undefined {
    return this._title;
  }

  set title(value: string | undefined) {
    assertOptionalString('title', value);
    this._title = value;
    this.updateSelfLinkTitle(value);
    if (this.parent) {
      this.updateChildLinkTitle(this.parent, value);
    }
  }

  /**
   * Checks the parent of this node against its path
   *
   * @param parent - the declared parent
   * @returns the parent, or undefined for the root of the tree
   */
  protected validateParent(parent: unknown): ParentNode | undefined {
    if (parent === undefined) {
      if (this.path !== '') {
        throw new InvalidConfigurationError('When no parent is set, path must be set to \'/\'');
      }
      return undefined;
    }
    const validParent = checkParentKind(parent);
    checkChildPath(this.path, validParent);
    return validParent;
  }

  /**
   * Adds the root and self links, then registers this node with its parent
   */
  private createLinks(): void {
    this.links.push(createRootLink(this.id, this.path, this.parent));
    this.links.push(new Link(documentName(this.id), RelationType.SELF, mediaTypeForKind(this.kind), this._title ?? this.id));
    if (this.parent) {
      appendChildLink(this, this.parent, this._title);
      this.links.push(createParentLink(this.parent));
    }
  }

  private updateSelfLinkTitle(title: string | undefined): void {
    const selfLink = this.links.find((link) => link.rel === RelationType.SELF);
    if (selfLink) {
      selfLink.title = title;
    }
  }

  private updateChildLinkTitle(parent: ParentNode, title: string | undefined): void {
    const childLink = findChildLink(this, parent);
    if (childLink) {
      childLink.title = title;
    }
  }

  /**
   * Declares an extension implemented by this node. Its properties are added to the
   * root of the document; a property set by an earlier extension is overwritten.
   *
   * @param extensionName - the extension schema URI
   * @param properties - the fields contributed by the extension
   */
  addStacExtension(extensionName: string, properties: Record<string, unknown> = {}): void {
    if (!this.stacExtensions.includes(extensionName)) {
      this.stacExtensions.push(extensionName);
    }
    Object.assign(this.stacExtensionsProperties, properties);
  }

  /**
   * Returns the catalog as a STAC document
   */
  toJSON(): SerializedCatalog {
    const catalog: SerializedCatalog = {
      type: this.kind,
      stac_version: this.stacVersion,
      id: this.id,
      description: this._description,
      links: this.links.map((link) => link.toJSON()),
    };
    if (this.stacExtensions.length > 0) {
      catalog.stac_extensions = [...this.stacExtensions];
    }
    Object.assign(catalog, this.stacExtensionsProperties);
    if (this._title !== undefined) {
      catalog.title = this._title;
    }
    return catalog;
  }

  /**
   * The file this node is saved to
   */
  get filename(): string {
    return documentLocation(this.rootDirectory, this.path, this.id);
  }

  /**
   * Saves the document of this node, or prints its location in the tree
   *
   * @param event - save or tree
   * @param context - state shared across the nodes for this event
   */
  async persist(event: PersistEvent, context: PersistContext): Promise<void> {
    if (event === 'save') {
      const { filename } = this;
      logger.debug(`Saving in ${filename}`);
      await writeJsonFile(filename, this.toJSON(), context.jsonIndent);
      context.written.push(filename);
    } else {
      if (!context.rootDirectoryPrinted) {
        context.print(`Root directory: ${this.rootDirectory}`);
        context.rootDirectoryPrinted = true;
      }
      context.print(`\t ${this.kind} ${this.id} : ${this.path}/${documentName(this.id)}`);
    }
  }

  describe(): string {
    return `StacCatalog[id='${this.id}']`;
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
