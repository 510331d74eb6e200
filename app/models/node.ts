import { InternalConsistencyError, InvalidConfigurationError, TypeMismatchError } from '../util/errors';
import { childHref, hrefFilename, isDescendantPath, parentHref, rootHref } from '../util/stac-path';
import { MediaType } from '../vocabulary/media-types';
import type { StacMediaType } from '../vocabulary/media-types';
import { RelationType } from '../vocabulary/relation-types';
import Link from './link';

export type ContainerKind = 'Catalog' | 'Collection';

export type NodeKind = ContainerKind | 'Feature';

/**
 * The capabilities of a Catalog or Collection that its children rely on. A child reads
 * the parent's identity and path, and appends its child/item link to the parent's links.
 */
export interface ParentNode {
  readonly kind: ContainerKind;
  readonly id: string;
  readonly path: string;
  readonly title?: string;
  readonly links: Link[];
}

export type PersistEvent = 'save' | 'tree';

/**
 * State shared by all nodes during one broadcast of a persist event
 */
export interface PersistContext {
  // Number of spaces used to indent saved documents
  jsonIndent: number;
  // Writes one line of tree output
  print(line: string): void;
  rootDirectoryPrinted: boolean;
  // Files written so far during a save
  written: string[];
}

/**
 * A node that can be saved or printed when the library broadcasts an event
 */
export interface PersistableNode {
  readonly kind: NodeKind;
  readonly id: string;
  readonly path: string;
  persist(event: PersistEvent, context: PersistContext): Promise<void>;
}

/**
 * Returns true if the value can act as the parent of a node
 *
 * @param value - the candidate parent
 */
export function isParentNode(value: unknown): value is ParentNode {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'kind' in value && (value.kind === 'Catalog' || value.kind === 'Collection')
    && 'id' in value && typeof value.id === 'string'
    && 'path' in value && typeof value.path === 'string'
    && 'links' in value && Array.isArray(value.links);
}

/**
 * Returns the media type of the documents of a node kind
 *
 * @param kind - the node kind
 * @returns the media type used in links to such a node
 * @throws InternalConsistencyError - if the kind is not a node kind
 */
export function mediaTypeForKind(kind: string): StacMediaType {
  switch (kind) {
    case 'Catalog':
      return MediaType.STAC_CATALOG;
    case 'Collection':
      return MediaType.STAC_COLLECTION;
    case 'Feature':
      return MediaType.STAC_ITEM;
    default:
      throw new InternalConsistencyError(`Unexpected node kind: ${kind}`);
  }
}

/**
 * Checks that a declared parent is a Catalog or a Collection
 *
 * @param parent - the declared parent
 * @returns the parent
 * @throws TypeMismatchError - if the parent is of any other kind
 */
export function checkParentKind(parent: unknown): ParentNode {
  if (!isParentNode(parent)) {
    const kind = typeof parent === 'object' && parent !== null && 'kind' in parent ? String(parent.kind) : typeof parent;
    throw new TypeMismatchError(`parent must be either a collection or a catalog: ${kind}`);
  }
  return parent;
}

/**
 * Checks that the path of a node is consistent with its parent
 *
 * @param nodePath - normalized path of the node
 * @param parent - the parent
 * @throws InvalidConfigurationError - if the path is empty or not below the parent's path
 */
export function checkChildPath(nodePath: string, parent: ParentNode): void {
  if (nodePath === '') {
    throw new InvalidConfigurationError('When a parent is set, path must not be the root path');
  }
  if (!isDescendantPath(nodePath, parent.path)) {
    throw new InvalidConfigurationError(`path ${nodePath} is not below the path ${parent.path || '/'} of its parent ${parent.id}`);
  }
}

/**
 * Creates the root link of a node. The root of the tree links to itself from the current
 * directory; any other node climbs back to the root directory, one level per segment of
 * its path, and reuses the file name from its parent's root link.
 *
 * @param id - id of the node
 * @param nodePath - normalized path of the node
 * @param parent - the parent, if any
 * @returns the root link
 */
export function createRootLink(id: string, nodePath: string, parent?: ParentNode): Link {
  let href: string;
  if (!parent) {
    href = `./${id}.json`;
  } else {
    const parentRoot = parent.links.find((link) => link.rel === RelationType.ROOT);
    if (!parentRoot) {
      throw new InternalConsistencyError(`Parent ${parent.id} has no root link`);
    }
    href = rootHref(nodePath, hrefFilename(parentRoot.href));
  }
  return new Link(href, RelationType.ROOT, MediaType.STAC_CATALOG);
}

/**
 * Creates the child (or item) link of a node and appends it to its parent's links
 *
 * @param child - the node being attached
 * @param parent - its parent
 * @param title - title of the link, if any
 * @returns the link added to the parent
 */
export function appendChildLink(
  child: { kind: NodeKind, id: string, path: string },
  parent: ParentNode,
  title?: string,
): Link {
  const rel = child.kind === 'Feature' ? RelationType.ITEM : RelationType.CHILD;
  const link = new Link(childHref(child.path, parent.path, child.id), rel, mediaTypeForKind(child.kind), title);
  parent.links.push(link);
  return link;
}

/**
 * Creates the link from a node back to its parent
 *
 * @param parent - the parent
 * @returns the parent link
 */
export function createParentLink(parent: ParentNode): Link {
  return new Link(parentHref(parent.id), RelationType.PARENT, mediaTypeForKind(parent.kind), parent.title);
}

/**
 * Finds the link of a parent that points to the given child
 *
 * @param child - the child node
 * @param parent - its parent
 * @returns the link, or undefined if the parent has no such link
 */
export function findChildLink(child: { id: string, path: string }, parent: ParentNode): Link | undefined {
  const href = childHref(child.path, parent.path, child.id);
  return parent.links.find((link) => link.href === href);
}
