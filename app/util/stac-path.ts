//
// Relative path arithmetic for the links of a static catalog. Node paths are REST-style
// strings ('/first_cat/first_coll'); the root position is the empty string. A node with
// id `id` at path `p` is written to `<root directory><p>/<id>.json`.
//

/**
 * Normalizes a node path: collapses repeated separators, removes any trailing separator
 * and ensures a non-empty path starts with a separator. '/' and '' both become ''.
 *
 * @param nodePath - the path as declared by the caller
 * @returns the normalized path
 */
export function normalizePath(nodePath: string): string {
  const segments = pathSegments(nodePath);
  return segments.length === 0 ? '' : `/${segments.join('/')}`;
}

/**
 * Removes a trailing separator from a directory name
 *
 * @param directory - the directory
 * @returns the directory without a trailing '/'
 */
export function fixDirectorySyntax(directory: string): string {
  return directory.endsWith('/') ? directory.slice(0, -1) : directory;
}

/**
 * Splits a path into its non-empty segments
 *
 * @param nodePath - the path
 * @returns the segments, in order
 */
export function pathSegments(nodePath: string): string[] {
  return nodePath.split('/').filter((segment) => segment.length > 0);
}

/**
 * Returns true if `childPath` is `parentPath` or lies below it. Comparison is done
 * segment by segment, so '/a/bc' does not descend from '/a/b'.
 *
 * @param childPath - normalized path of the child
 * @param parentPath - normalized path of the parent
 */
export function isDescendantPath(childPath: string, parentPath: string): boolean {
  const child = pathSegments(childPath);
  const parent = pathSegments(parentPath);
  return parent.length <= child.length && parent.every((segment, i) => child[i] === segment);
}

/**
 * Returns the prefix leading from a document at `nodePath` back to the root directory:
 * one '..' per segment, '.' for the root position.
 *
 * @param nodePath - normalized path of the document's directory
 * @returns e.g. '../..' for '/first_cat/first_coll'
 */
export function upPath(nodePath: string): string {
  const back = pathSegments(nodePath).map(() => '..');
  return back.length > 0 ? back.join('/') : '.';
}

/**
 * Returns the file name of a document href: the text after its last separator
 *
 * @param href - a relative href such as '../first_cat.json'
 */
export function hrefFilename(href: string): string {
  const parts = href.split('/');
  return parts[parts.length - 1];
}

/**
 * The file name of a node's document
 *
 * @param id - the node id
 */
export function documentName(id: string): string {
  return `${id}.json`;
}

/**
 * The href of the root link of a node
 *
 * @param nodePath - normalized path of the node
 * @param rootFilename - the file name of the root document
 * @returns e.g. '../../first_cat.json'
 */
export function rootHref(nodePath: string, rootFilename: string): string {
  return `${upPath(nodePath)}/${rootFilename}`;
}

/**
 * The href, relative to the parent's document, of a child's document
 *
 * @param childPath - normalized path of the child
 * @param parentPath - normalized path of the parent
 * @param childId - id of the child
 * @returns e.g. './first_cat/first_coll/first_coll.json'
 */
export function childHref(childPath: string, parentPath: string, childId: string): string {
  const relative = childPath.startsWith(parentPath) ? childPath.slice(parentPath.length) : childPath;
  return `.${relative}/${documentName(childId)}`;
}

/**
 * The href of a node's parent link
 *
 * @param parentId - id of the parent
 */
export function parentHref(parentId: string): string {
  return `../${documentName(parentId)}`;
}

/**
 * The location a node is written to
 *
 * @param rootDirectory - the root directory of the catalog, without trailing separator
 * @param nodePath - normalized path of the node
 * @param id - id of the node
 * @returns the file name
 */
export function documentLocation(rootDirectory: string, nodePath: string, id: string): string {
  return `${rootDirectory}${nodePath}/${documentName(id)}`;
}
