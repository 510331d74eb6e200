import { describe, it } from 'mocha';
import { expect } from 'chai';
import StacCatalog from '../../app/models/stac-catalog';
import StacCollection from '../../app/models/stac-collection';
import StacItem from '../../app/models/stac-item';
import { InvalidConfigurationError } from '../../app/util/errors';
import { buildExtent, buildGeometry, buildProperties, MIT, ROOT_DIRECTORY } from '../helpers/stac';

const options = { stacVersion: '1.0.0' };

describe('StacCatalog', function () {
  describe('a root catalog', function () {
    const root = new StacCatalog(ROOT_DIRECTORY, 'first_cat', '/', 'My first catalog', options);

    it('is located at the root position', function () {
      expect(root.path).to.equal('');
      expect(root.parent).to.equal(undefined);
      expect(root.filename).to.equal('/tmp/stac/first_cat.json');
    });

    it('links to itself as the root and as self', function () {
      expect(root.toJSON().links).to.eql([
        { href: './first_cat.json', rel: 'root', type: 'application/json' },
        { href: 'first_cat.json', rel: 'self', type: 'application/json', title: 'first_cat' },
      ]);
    });

    it('serializes as a STAC catalog', function () {
      expect(root.toJSON()).to.eql({
        type: 'Catalog',
        stac_version: '1.0.0',
        id: 'first_cat',
        description: 'My first catalog',
        links: [
          { href: './first_cat.json', rel: 'root', type: 'application/json' },
          { href: 'first_cat.json', rel: 'self', type: 'application/json', title: 'first_cat' },
        ],
      });
    });

    it('describes itself by id', function () {
      expect(root.describe()).to.equal('StacCatalog[id=\'first_cat\']');
    });

    it('returns its JSON projection as a string', function () {
      expect(root.toString()).to.equal(JSON.stringify(root.toJSON()));
      expect(JSON.stringify(root)).to.equal(root.toString());
    });
  });

  describe('a catalog with children', function () {
    const root = new StacCatalog(ROOT_DIRECTORY, 'first_cat', '/', 'My first catalog', options);
    const collection = new StacCollection(
      ROOT_DIRECTORY, 'first_coll', '/first_cat/first_coll', 'My first collection', MIT, buildExtent(),
      { ...options, parent: root },
    );
    collection.title = 'First collection';
    const item = new StacItem(
      ROOT_DIRECTORY, '1st_item', '/first_cat', buildGeometry(), buildProperties(), {}, { ...options, parent: root },
    );

    it('has a child link to the collection and an item link to the item', function () {
      expect(root.toJSON().links).to.eql([
        { href: './first_cat.json', rel: 'root', type: 'application/json' },
        { href: 'first_cat.json', rel: 'self', type: 'application/json', title: 'first_cat' },
        {
          href: './first_cat/first_coll/first_coll.json', rel: 'child', type: 'application/json', title: 'First collection',
        },
        { href: './first_cat/1st_item.json', rel: 'item', type: 'application/geo+json', title: '1st_item' },
      ]);
    });

    it('is the parent of its children', function () {
      expect(collection.parent).to.equal(root);
      expect(item.parent).to.equal(root);
    });
  });

  describe('a deep tree', function () {
    const root = new StacCatalog(ROOT_DIRECTORY, 'root', '/', 'Root', options);
    const a = new StacCatalog(ROOT_DIRECTORY, 'a', '/a', 'A', { ...options, parent: root });
    const b = new StacCatalog(ROOT_DIRECTORY, 'b', '/a/b', 'B', { ...options, parent: a, title: 'Catalog B' });
    const c = new StacCatalog(ROOT_DIRECTORY, 'c', '/a/b/c', 'C', { ...options, parent: b });

    it('climbs one level per path segment to reach the root', function () {
      expect(a.links[0].href).to.equal('../root.json');
      expect(b.links[0].href).to.equal('../../root.json');
      expect(c.links[0].href).to.equal('../../../root.json');
    });

    it('links children relative to the parent path', function () {
      expect(a.links[3].toJSON()).to.eql({ href: './b/b.json', rel: 'child', type: 'application/json', title: 'Catalog B' });
      expect(b.links[3].toJSON()).to.eql({ href: './c/c.json', rel: 'child', type: 'application/json' });
    });

    it('links back to the parent document by id', function () {
      expect(c.links[2].toJSON()).to.eql({ href: '../b.json', rel: 'parent', type: 'application/json', title: 'Catalog B' });
    });

    it('writes each document in the directory of its path', function () {
      expect(c.filename).to.equal('/tmp/stac/a/b/c/c.json');
    });
  });

  describe('path normalization', function () {
    it('accepts paths without a leading separator or with a trailing one', function () {
      const root = new StacCatalog(ROOT_DIRECTORY, 'root', '', 'Root', options);
      const sub = new StacCatalog(`${ROOT_DIRECTORY}/`, 'sub', 'sub/', 'Sub', { ...options, parent: root });
      expect(sub.path).to.equal('/sub');
      expect(sub.rootDirectory).to.equal('/tmp/stac');
      expect(root.links[2].href).to.equal('./sub/sub.json');
    });
  });

  describe('title', function () {
    const root = new StacCatalog(ROOT_DIRECTORY, 'root', '/', 'Root', { ...options, title: 'The root' });
    const sub = new StacCatalog(ROOT_DIRECTORY, 'sub', '/sub', 'Sub', { ...options, parent: root });

    it('is the title of the self link', function () {
      expect(root.links[1].title).to.equal('The root');
    });

    it('is the title of the parent link of children', function () {
      expect(sub.links[2].title).to.equal('The root');
    });

    it('is serialized last', function () {
      expect(Object.keys(root.toJSON())).to.eql(['type', 'stac_version', 'id', 'description', 'links', 'title']);
    });

    it('updates the self link and the link in the parent when changed', function () {
      sub.title = 'Sub catalog';
      expect(sub.links[1].title).to.equal('Sub catalog');
      expect(root.links[2].title).to.equal('Sub catalog');
    });

    it('is removed from both the self link and the parent link when cleared', function () {
      sub.title = undefined;
      expect(sub.links[1].toJSON()).to.eql({ href: 'sub.json', rel: 'self', type: 'application/json' });
      expect(root.links[2].toJSON()).to.eql({ href: './sub/sub.json', rel: 'child', type: 'application/json' });
      expect(sub.toJSON()).to.not.have.property('title');
    });

    it('stays equal on the self link and the parent link after every change', function () {
      for (const title of ['T', undefined, 'Sub catalog', undefined]) {
        sub.title = title;
        expect(sub.links[1].title).to.equal(title);
        expect(root.links[2].title).to.equal(sub.links[1].title);
      }
    });
  });

  describe('description', function () {
    it('can be changed', function () {
      const root = new StacCatalog(ROOT_DIRECTORY, 'root', '/', 'Root', options);
      root.description = 'Updated';
      expect(root.toJSON().description).to.equal('Updated');
    });
  });

  describe('extensions', function () {
    const root = new StacCatalog(ROOT_DIRECTORY, 'root', '/', 'Root', options);
    root.addStacExtension('ssys', { 'ssys:targets': ['Mars'] });
    root.addStacExtension('ssys', { 'ssys:targets': ['Venus'] });
    root.title = 'Planets';

    it('lists each extension once', function () {
      expect(root.toJSON().stac_extensions).to.eql(['ssys']);
    });

    it('adds the extension properties to the document, last write winning', function () {
      expect(root.toJSON()['ssys:targets']).to.eql(['Venus']);
    });

    it('serializes extensions after the links and before the title', function () {
      expect(Object.keys(root.toJSON())).to.eql([
        'type', 'stac_version', 'id', 'description', 'links', 'stac_extensions', 'ssys:targets', 'title',
      ]);
    });
  });

  describe('configuration errors', function () {
    it('requires a root catalog to be at the root path', function () {
      expect(() => new StacCatalog(ROOT_DIRECTORY, 'root', '/first_cat', 'Root', options)).to.throw(
        InvalidConfigurationError, 'When no parent is set, path must be set to \'/\'',
      );
    });

    it('requires a child catalog to be below the root path', function () {
      const root = new StacCatalog(ROOT_DIRECTORY, 'root', '/', 'Root', options);
      expect(() => new StacCatalog(ROOT_DIRECTORY, 'sub', '/', 'Sub', { ...options, parent: root })).to.throw(
        InvalidConfigurationError, 'When a parent is set, path must not be the root path',
      );
    });

    it('requires a child path to descend from the parent path', function () {
      const root = new StacCatalog(ROOT_DIRECTORY, 'root', '/', 'Root', options);
      const a = new StacCatalog(ROOT_DIRECTORY, 'a', '/a', 'A', { ...options, parent: root });
      expect(() => new StacCatalog(ROOT_DIRECTORY, 'x', '/x', 'X', { ...options, parent: a })).to.throw(
        InvalidConfigurationError, 'path /x is not below the path /a of its parent a',
      );
    });
  });
});
