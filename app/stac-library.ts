import env from './util/env';
import type { StacConfig } from './util/env';
import { SaveError, asError } from './util/errors';
import type { SaveFailure } from './util/errors';
import type { Geometry } from './util/geometry';
import logger, { setLogLevel } from './util/log';
import { documentLocation, fixDirectorySyntax } from './util/stac-path';
import type { License } from './vocabulary/licenses';
import type Asset from './models/asset';
import type Extent from './models/extent';
import type { PersistableNode, PersistContext, PersistEvent } from './models/node';
import type Properties from './models/properties';
import StacCatalog from './models/stac-catalog';
import type { CatalogOptions } from './models/stac-catalog';
import StacCollection from './models/stac-collection';
import StacItem from './models/stac-item';
import type { ItemOptions } from './models/stac-item';

/**
 * Where the lines of `tree()` are written
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface StacLibraryOptions {
  // Overrides the configuration loaded from the environment
  config?: StacConfig;
  // Log level name: TRACE, DEBUG, INFO, WARNING, ERROR or CRITICAL
  level?: string;
  // Destination of the tree output, process.stdout by default
  output?: OutputStream;
}

export interface SaveOptions {
  // Reject on the first node that fails instead of attempting every node
  abortOnError?: boolean;
}

/**
 * Builds a static catalog. Every node created through the library is registered, and
 * `save` and `tree` visit the registered nodes in the order they were created.
 *
 * @example
 * const library = new StacLibrary('/tmp/stac');
 * const root = library.createCatalog('first_cat', '/', 'My first catalog');
 * library.createCatalog('sub_cat', '/first_cat/sub_cat', 'A sub catalog', { parent: root });
 * await library.save();
 */
export default class StacLibrary {
  readonly directory: string;

  readonly config: StacConfig;

  private readonly output: OutputStream;

  private readonly registry: PersistableNode[] = [];

  /**
   * @param directory - root directory where the catalog files are written
   * @param options - configuration, log level and tree output
   */
  constructor(directory: string, options: StacLibraryOptions = {}) {
    this.directory = fixDirectorySyntax(directory);
    this.config = options.config ?? env;
    this.output = options.output ?? process.stdout;
    if (options.level !== undefined) {
      setLogLevel(options.level);
    }
  }

  /**
   * The registered nodes, in creation order
   */
  get nodes(): readonly PersistableNode[] {
    return this.registry;
  }

  private register<T extends PersistableNode>(node: T): T {
    this.registry.push(node);
    logger.debug(`Registered ${node.kind} ${node.id} at ${node.path || '/'}`);
    return node;
  }

  private withDefaults<T extends { stacVersion?: string }>(options: T): T {
    return { ...options, stacVersion: options.stacVersion ?? this.config.stacVersion };
  }

  /**
   * Creates a catalog. A catalog without parent is the root of the tree and must be
   * created at path '/'.
   *
   * @param id - identifier of the catalog
   * @param nodePath - location of the catalog in the tree
   * @param description - detailed description of the catalog
   * @param options - title, parent and STAC version
   * @returns the registered catalog
   */
  createCatalog(id: string, nodePath: string, description: string, options: CatalogOptions = {}): StacCatalog {
    return this.register(new StacCatalog(this.directory, id, nodePath, description, this.withDefaults(options)));
  }

  /**
   * Creates a collection below a catalog or another collection
   *
   * @param id - identifier of the collection
   * @param nodePath - location of the collection in the tree
   * @param description - detailed description of the collection
   * @param license - license of the collection
   * @param extent - spatial and temporal extents
   * @param options - title, parent (mandatory) and STAC version
   * @returns the registered collection
   */
  createCollection(
    id: string,
    nodePath: string,
    description: string,
    license: License,
    extent: Extent,
    options: CatalogOptions = {},
  ): StacCollection {
    return this.register(new StacCollection(
      this.directory, id, nodePath, description, license, extent, this.withDefaults(options),
    ));
  }

  /**
   * Creates an item below a catalog or a collection
   *
   * @param nodePath - location of the item in the tree
   * @param id - identifier of the item
   * @param geometry - footprint of the assets, or null
   * @param properties - additional metadata of the item
   * @param assets - assets keyed by name
   * @param options - parent (mandatory), STAC version and collection id
   * @returns the registered item
   */
  createItem(
    nodePath: string,
    id: string,
    geometry: Geometry | null,
    properties: Properties,
    assets: Record<string, Asset>,
    options: ItemOptions = {},
  ): StacItem {
    return this.register(new StacItem(
      this.directory, id, nodePath, geometry, properties, assets, this.withDefaults(options),
    ));
  }

  private newContext(): PersistContext {
    return {
      jsonIndent: this.config.jsonIndent,
      print: (line: string): void => {
        this.output.write(`${line}\n`);
      },
      rootDirectoryPrinted: false,
      written: [],
    };
  }

  private async broadcast(event: PersistEvent, context: PersistContext, abortOnError: boolean): Promise<SaveFailure[]> {
    const failures: SaveFailure[] = [];
    for (const node of this.registry) {
      try {
        await node.persist(event, context);
      } catch (e) {
        if (abortOnError) {
          throw e;
        }
        const cause = asError(e);
        logger.error(`Failed to save ${node.kind} ${node.id}: ${cause.message}`);
        failures.push({ id: node.id, filename: documentLocation(this.directory, node.path, node.id), cause });
      }
    }
    return failures;
  }

  /**
   * Writes the document of every registered node
   *
   * @param options - whether to stop at the first failure
   * @returns the files written, in creation order
   * @throws SaveError - if any node could not be saved
   */
  async save(options: SaveOptions = {}): Promise<string[]> {
    const context = this.newContext();
    const failures = await this.broadcast('save', context, options.abortOnError ?? false);
    if (failures.length > 0) {
      throw new SaveError(failures);
    }
    logger.info(`Saved ${context.written.length} STAC document(s) in ${this.directory}`);
    return context.written;
  }

  /**
   * Prints the location of every registered node
   *
   * @returns the lines written to the output
   */
  async tree(): Promise<string[]> {
    const lines: string[] = [];
    const context = this.newContext();
    const { print } = context;
    context.print = (line: string): void => {
      lines.push(line);
      print(line);
    };
    await this.broadcast('tree', context, true);
    return lines;
  }
}
