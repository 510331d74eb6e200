import { describe, it } from 'mocha';
import { expect } from 'chai';
import { promises as fs } from 'fs';
import * as path from 'path';
import { dir } from 'tmp-promise';
import env, { getValidationErrors, makeConfigVar, StacEnv } from '../../app/util/env';

describe('util/env', function () {
  describe('#makeConfigVar', function () {
    it('parses integers', function () {
      expect(makeConfigVar('4')).to.equal(4);
    });

    it('parses decimals', function () {
      expect(makeConfigVar('0.5')).to.equal(0.5);
    });

    it('parses booleans', function () {
      expect(makeConfigVar('TRUE')).to.equal(true);
      expect(makeConfigVar('false')).to.equal(false);
    });

    it('leaves other strings unchanged', function () {
      expect(makeConfigVar('1.0.0')).to.equal('1.0.0');
    });
  });

  describe('the default configuration', function () {
    it('passes validation', function () {
      expect(getValidationErrors(env)).to.eql([]);
    });

    it('indents documents with 4 spaces unless overridden', function () {
      const expected = process.env.JSON_INDENT ? parseInt(process.env.JSON_INDENT, 10) : 4;
      expect(env.jsonIndent).to.equal(expected);
    });

    it('parses TEXT_LOGGER as a boolean', function () {
      expect(env.textLogger).to.be.a('boolean');
    });
  });

  describe('when a .env file overrides the defaults', function () {
    let config: StacEnv;
    before(async function () {
      const tmp = await dir({ unsafeCleanup: true });
      const dotEnvPath = path.join(tmp.path, '.env');
      await fs.writeFile(dotEnvPath, 'JSON_INDENT=2\nSTAC_VERSION=1.1.0\n');
      const saved = { indent: process.env.JSON_INDENT, version: process.env.STAC_VERSION };
      delete process.env.JSON_INDENT;
      delete process.env.STAC_VERSION;
      try {
        config = new StacEnv(dotEnvPath);
      } finally {
        if (saved.indent !== undefined) process.env.JSON_INDENT = saved.indent;
        if (saved.version !== undefined) process.env.STAC_VERSION = saved.version;
        await tmp.cleanup();
      }
    });

    it('uses the values of the file', function () {
      expect(config.jsonIndent).to.equal(2);
      expect(config.stacVersion).to.equal('1.1.0');
    });

    it('keeps the defaults for the other values', function () {
      expect(getValidationErrors(config)).to.eql([]);
    });
  });

  describe('when LOG_LEVEL uses a library level name', function () {
    let config: StacEnv;
    before(async function () {
      const tmp = await dir({ unsafeCleanup: true });
      const dotEnvPath = path.join(tmp.path, '.env');
      await fs.writeFile(dotEnvPath, 'LOG_LEVEL=DEBUG\n');
      const saved = process.env.LOG_LEVEL;
      delete process.env.LOG_LEVEL;
      try {
        config = new StacEnv(dotEnvPath);
      } finally {
        if (saved !== undefined) process.env.LOG_LEVEL = saved;
        await tmp.cleanup();
      }
    });

    it('maps it to the winston level', function () {
      expect(config.logLevel).to.equal('debug');
    });

    it('passes validation', function () {
      expect(getValidationErrors(config)).to.eql([]);
    });
  });

  describe('when the configuration is invalid', function () {
    let config: StacEnv;
    let skipValidation: string | undefined;
    beforeEach(function () {
      config = new StacEnv();
      config.jsonIndent = 42;
      config.stacVersion = 'latest';
      skipValidation = process.env.SKIP_ENV_VALIDATION;
      delete process.env.SKIP_ENV_VALIDATION;
    });

    afterEach(function () {
      if (skipValidation === undefined) {
        delete process.env.SKIP_ENV_VALIDATION;
      } else {
        process.env.SKIP_ENV_VALIDATION = skipValidation;
      }
    });

    it('reports every violated constraint', function () {
      const properties = getValidationErrors(config).map((e) => e.property);
      expect(properties).to.have.members(['jsonIndent', 'stacVersion']);
    });

    it('refuses to validate', function () {
      expect(() => config.validate()).to.throw('BAD ENVIRONMENT');
    });

    it('skips validation when SKIP_ENV_VALIDATION is true', function () {
      process.env.SKIP_ENV_VALIDATION = 'true';
      expect(() => config.validate()).to.not.throw();
    });
  });
});
