import Vocabulary, { loadTokens } from './vocabulary';
import type { Token } from './vocabulary';

// SPDX license identifier, or one of the STAC keywords `proprietary` and `various`
export type License = Token<'LicenseType'>;

export const LICENSES = new Vocabulary<License>('LicenseType', loadTokens('licenses.json'));
