import Vocabulary, { loadTokens } from './vocabulary';
import type { Token } from './vocabulary';

/**
 * Media types of STAC documents. Catalogs and collections share the same wire value.
 */
export const MediaType = {
  STAC_ITEM: 'application/geo+json',
  STAC_CATALOG: 'application/json',
  STAC_COLLECTION: 'application/json',
} as const;

export type StacMediaType = typeof MediaType[keyof typeof MediaType];

/**
 * Media types commonly used for STAC assets. GeoTIFF and COG are community
 * conventions rather than registered types.
 */
export const AssetMediaType = {
  GEOTIFF: 'image/tiff; application=geotiff',
  CLOUD_OPTIMIZED_GEOTIFF: 'image/tiff; application=geotiff; profile=cloud-optimized',
  JPEG_2000: 'image/jp2',
  VISUAL_PNG: 'image/png',
  VISUAL_JPEG: 'image/jpeg',
  XML: 'text/xml',
  JSON: 'application/json',
  PLAIN_TEXT: 'text/plain',
  GEOJSON: 'application/geo+json',
  GEOPACKAGE: 'application/geopackage+sqlite3',
  HDF5: 'application/x-hdf5',
  HDF4: 'application/x-hdf',
} as const;

export type StacAssetMediaType = typeof AssetMediaType[keyof typeof AssetMediaType];

export type CommonMediaType = Token<'CommonMediaType'>;

export type LinkMediaType = StacMediaType | CommonMediaType;

export type AssetType = StacAssetMediaType | CommonMediaType;

export const STAC_MEDIA_TYPES = new Vocabulary<StacMediaType>('MediaType', Object.values(MediaType));

export const ASSET_MEDIA_TYPES = new Vocabulary<StacAssetMediaType>('MediaTypeAsset', Object.values(AssetMediaType));

export const COMMON_MEDIA_TYPES = new Vocabulary<CommonMediaType>('CommonMediaType', loadTokens('common-media-types.json'));

export const LINK_MEDIA_TYPES = new Vocabulary<LinkMediaType>(
  'LinkMediaType',
  [...STAC_MEDIA_TYPES.values(), ...COMMON_MEDIA_TYPES.values()],
);

export const ASSET_TYPES = new Vocabulary<AssetType>(
  'AssetType',
  [...ASSET_MEDIA_TYPES.values(), ...COMMON_MEDIA_TYPES.values()],
);
