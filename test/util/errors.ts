import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  asError, InternalConsistencyError, InvalidConfigurationError, SaveError, StacError, TypeMismatchError,
  UnknownVocabularyValueError,
} from '../../app/util/errors';

describe('util/errors', function () {
  it('gives every error a code and its class name', function () {
    const errors: [StacError, string, string][] = [
      [new InvalidConfigurationError(), 'stac.InvalidConfiguration', 'InvalidConfigurationError'],
      [new TypeMismatchError(), 'stac.TypeMismatch', 'TypeMismatchError'],
      [new UnknownVocabularyValueError('LicenseType', 'bad'), 'stac.UnknownVocabularyValue', 'UnknownVocabularyValueError'],
      [new InternalConsistencyError(), 'stac.InternalConsistency', 'InternalConsistencyError'],
      [new SaveError([]), 'stac.Save', 'SaveError'],
    ];
    for (const [error, code, name] of errors) {
      expect(error).to.be.an.instanceOf(StacError);
      expect(error).to.be.an.instanceOf(Error);
      expect(error.code).to.equal(code);
      expect(error.name).to.equal(name);
    }
  });

  it('prefixes vocabulary errors with the vocabulary name', function () {
    const error = new UnknownVocabularyValueError('RoleType', 'Unknown enum value for seller');
    expect(error.message).to.equal('RoleType: Unknown enum value for seller');
    expect(error.vocabulary).to.equal('RoleType');
  });

  it('lists the failed nodes in a save error', function () {
    const cause = new Error('EACCES');
    const error = new SaveError([
      { id: 'a', filename: '/tmp/a.json', cause },
      { id: 'b', filename: '/tmp/b.json', cause },
    ]);
    expect(error.message).to.equal('Failed to save 2 node(s): a, b');
    expect(error.failures.map((f) => f.id)).to.eql(['a', 'b']);
  });

  describe('#asError', function () {
    it('returns errors unchanged', function () {
      const error = new TypeMismatchError('bad type');
      expect(asError(error)).to.equal(error);
    });

    it('wraps other thrown values', function () {
      const error = asError('disk full');
      expect(error).to.be.an.instanceOf(Error);
      expect(error.message).to.equal('disk full');
    });
  });
});
