import Vocabulary, { loadTokens } from './vocabulary';
import type { Token } from './vocabulary';

/**
 * Relation types defined by STAC for links between catalogs, collections and items
 */
export const RelationType = {
  SELF: 'self',
  ROOT: 'root',
  PARENT: 'parent',
  CHILD: 'child',
  ITEM: 'item',
  ALTERNATE: 'alternate',
  CANONICAL: 'canonical',
  VIA: 'via',
  PREV: 'prev',
  NEXT: 'next',
  PREVIEW: 'preview',
} as const;

export type StacRelationType = typeof RelationType[keyof typeof RelationType];

// Registered IANA link relations (https://www.iana.org/assignments/link-relations)
export type IanaRelationType = Token<'IANARelationTypes'>;

export type LinkRelationType = StacRelationType | IanaRelationType;

export const STAC_RELATION_TYPES = new Vocabulary<StacRelationType>('RelationTypes', Object.values(RelationType));

export const IANA_RELATION_TYPES = new Vocabulary<IanaRelationType>('IANARelationTypes', loadTokens('iana-relation-types.json'));

export const LINK_RELATION_TYPES = new Vocabulary<LinkRelationType>(
  'LinkRelationTypes',
  [...STAC_RELATION_TYPES.values(), ...IANA_RELATION_TYPES.values()],
);
