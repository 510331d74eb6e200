export { default as Vocabulary } from './vocabulary';
export type { Token } from './vocabulary';
export * from './relation-types';
export * from './media-types';
export * from './roles';
export * from './licenses';
