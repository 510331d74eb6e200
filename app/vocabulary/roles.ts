import Vocabulary from './vocabulary';

/**
 * Roles of a provider of a collection
 */
export const ProviderRole = {
  // Grants licenses to the data
  LICENSOR: 'licensor',
  PRODUCER: 'producer',
  PROCESSOR: 'processor',
  HOST: 'host',
} as const;

export type StacProviderRole = typeof ProviderRole[keyof typeof ProviderRole];

/**
 * Semantic roles of an asset, similar to the rel of a link
 */
export const AssetRole = {
  THUMBNAIL: 'thumbnail',
  OVERVIEW: 'overview',
  DATA: 'data',
  METADATA: 'metadata',
  VISUAL: 'visual',
  DATE: 'date',
  GRAPHIC: 'graphic',
  DATA_MASK: 'data-mask',
  SNOW_ICE: 'snow-ice',
  LAND_WATER: 'land-water',
  WATER_MASK: 'water-mask',
  ISO_19115: 'iso-19115',
} as const;

export type StacAssetRole = typeof AssetRole[keyof typeof AssetRole];

export const PROVIDER_ROLES = new Vocabulary<StacProviderRole>('RoleType', Object.values(ProviderRole));

export const ASSET_ROLES = new Vocabulary<StacAssetRole>('RoleAsset', Object.values(AssetRole));
