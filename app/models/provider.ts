import { TypeMismatchError } from '../util/errors';
import { PROVIDER_ROLES } from '../vocabulary/roles';
import type { StacProviderRole } from '../vocabulary/roles';
import { assertOptionalString } from './link';

export interface SerializedProvider {
  name: string;
  description?: string;
  roles?: StacProviderRole[];
  url?: string;
}

/**
 * An organization capturing, processing or hosting the content of a Collection
 */
export default class Provider {
  private _name: string;

  private _description?: string;

  private _url?: string;

  // licensor, producer, processor or host
  readonly roles: StacProviderRole[] = [];

  /**
   * @param name - the name of the organization or the individual
   */
  constructor(name: string) {
    this._name = name;
    this.name = name;
  }

  get name(): string {
    return this._name;
  }

  set name(value: string) {
    if (typeof value !== 'string') {
      throw new TypeMismatchError(`name has type ${typeof value} but must have string type`);
    }
    this._name = value;
  }

  /**
   * Further provider information such as processing details or contact information.
   * CommonMark 0.29 syntax may be used.
   */
  get description(): string | undefined {
    return this._description;
  }

  set description(value: string | undefined) {
    assertOptionalString('description', value);
    this._description = value;
  }

  /**
   * Homepage on which the provider describes the dataset
   */
  get url(): string | undefined {
    return this._url;
  }

  set url(value: string | undefined) {
    assertOptionalString('url', value);
    this._url = value;
  }

  /**
   * Adds a role, looked up from its wire value
   *
   * @param role - the role, e.g. `producer`
   * @returns this provider
   */
  addRole(role: string): this {
    this.roles.push(PROVIDER_ROLES.find(role));
    return this;
  }

  toJSON(): SerializedProvider {
    const provider: SerializedProvider = { name: this._name };
    if (this._description !== undefined) {
      provider.description = this._description;
    }
    if (this.roles.length > 0) {
      provider.roles = [...this.roles];
    }
    if (this._url !== undefined) {
      provider.url = this._url;
    }
    return provider;
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
