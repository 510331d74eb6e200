export { default as StacLibrary } from './stac-library';
export type { OutputStream, SaveOptions, StacLibraryOptions } from './stac-library';
export { default as StacCatalog } from './models/stac-catalog';
export type { CatalogOptions, SerializedCatalog } from './models/stac-catalog';
export { default as StacCollection } from './models/stac-collection';
export type { SerializedCollection } from './models/stac-collection';
export { default as StacItem } from './models/stac-item';
export type { ItemOptions, SerializedItem } from './models/stac-item';
export { default as Link } from './models/link';
export type { SerializedLink } from './models/link';
export { default as Asset } from './models/asset';
export type { SerializedAsset } from './models/asset';
export { default as Provider } from './models/provider';
export type { SerializedProvider } from './models/provider';
export { default as Extent, SpatialExtent, TemporalExtent } from './models/extent';
export type { SerializedExtent, TemporalBound } from './models/extent';
export { default as Range } from './models/range';
export type { RangeBound } from './models/range';
export { default as Properties } from './models/properties';
export type { SerializedProperties } from './models/properties';
export type { ContainerKind, NodeKind, ParentNode, PersistableNode } from './models/node';
export { GeoJsonGeometry, bboxToGeometry } from './util/geometry';
export type { Geometry } from './util/geometry';
export {
  StacError, InvalidConfigurationError, TypeMismatchError, UnknownVocabularyValueError,
  InternalConsistencyError, SaveError,
} from './util/errors';
export type { SaveFailure } from './util/errors';
export { StacEnv } from './util/env';
export type { StacConfig } from './util/env';
export { setLogLevel } from './util/log';
export * from './vocabulary';
