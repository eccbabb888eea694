import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  addContainer,
  addItem,
  containerFromElement,
  containerToElement,
  createContainer,
  createMusicAlbum,
  createMusicArtist,
  createMusicGenre,
  createPlaylistContainer,
  createStorageFolder,
  createStorageSystem,
  musicAlbumFromElement,
  musicAlbumToElement,
  playlistContainerToElement,
  storageFolderToElement,
  storageSystemFromElement,
  storageSystemToElement
} from '../../src/didl/containers.js';
import { createImageItem, createMusicTrack } from '../../src/didl/items.js';
import { getChildCount } from '../../src/didl/objects.js';
import { getAttribute, localName, parseXml, type XmlElement } from '../../src/utils/xml.js';
import { MissingRequiredAttributeError, MissingRequiredFieldError } from '../../src/errors/didl-errors.js';

const NS_DECLARATIONS =
  'xmlns="urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/" ' +
  'xmlns:dc="http://purl.org/dc/elements/1.1/" ' +
  'xmlns:upnp="urn:schemas-upnp-org:metadata-1-0/upnp/"';

function parseContainer(inner: string, attributes = 'id="A:ALBUM" parentID="A:" restricted="true"'): XmlElement {
  return parseXml(`<container ${NS_DECLARATIONS} ${attributes}>${inner}</container>`);
}

function childNames(element: XmlElement): string[] {
  return element.children.map(child => localName(child.tag));
}

const track = (objectId: string) => createMusicTrack({ objectId, parentId: 'elsewhere', title: objectId });

describe('DIDL Containers', () => {
  describe('child management', () => {
    it('should adopt items and set their parent', () => {
      const album = createMusicAlbum({ objectId: 'A:ALBUM/Record', parentId: 'A:ALBUM', title: 'Record' });
      const first = track('T1');

      assert(addItem(album, first));
      assert(addItem(album, first));
      assert.strictEqual(album.items.length, 1);
      assert.strictEqual(first.parentId, 'A:ALBUM/Record');
    });

    it('should restrict a music genre to audio items and music containers', () => {
      const genre = createMusicGenre({ objectId: 'A:GENRE/Rock', parentId: 'A:GENRE', title: 'Rock' });
      const image = createImageItem({ objectId: 'I1', parentId: 'x', title: 'Cover' });

      assert(addItem(genre, track('T1')));
      assert(!addItem(genre, image));
      assert.strictEqual(image.parentId, 'x');
      assert(addContainer(genre, createMusicArtist({ objectId: 'A:ARTIST/Band', parentId: 'A:ARTIST', title: 'Band' })));
      assert(!addContainer(genre, createPlaylistContainer({ objectId: 'SQ:1', parentId: 'SQ:', title: 'Mix' })));
      assert.strictEqual(genre.containers.length, 1);
    });

    it('should let a music artist hold albums but not genres', () => {
      const artist = createMusicArtist({ objectId: 'A:ARTIST/Band', parentId: 'A:ARTIST', title: 'Band' });

      assert(addContainer(artist, createMusicAlbum({ objectId: 'A:ALBUM/Record', parentId: 'A:ALBUM', title: 'Record' })));
      assert(!addContainer(artist, createMusicGenre({ objectId: 'A:GENRE/Rock', parentId: 'A:GENRE', title: 'Rock' })));
    });

    it('should prefer owned children over the explicit count', () => {
      const container = createContainer({ objectId: 'C', parentId: '0', title: 'C', childCount: 12 });
      assert.strictEqual(getChildCount(container), 12);

      addItem(container, track('T1'));
      addItem(container, track('T2'));
      assert.strictEqual(getChildCount(container), 2);
      assert.strictEqual(getAttribute(containerToElement(container), 'childCount'), '2');
    });
  });

  describe('serialization', () => {
    it('should write container attributes and search classes', () => {
      const container = createContainer({
        objectId: 'A:',
        parentId: '0',
        title: 'Library',
        childCount: 3,
        searchClasses: [{ className: 'object.item.audioItem', includeDerived: true, friendlyName: 'Audio' }],
        createClasses: [{ className: 'object.container', includeDerived: false, friendlyName: '' }]
      });
      const element = containerToElement(container);

      assert.deepStrictEqual(element.attributes, {
        id: 'A:',
        parentID: '0',
        restricted: 'true',
        childCount: '3',
        searchable: 'true'
      });
      assert.deepStrictEqual(childNames(element), ['title', 'class', 'writeStatus', 'searchClass', 'createClass']);
      assert.deepStrictEqual(element.children[3].attributes, { includeDerived: 'true', name: 'Audio' });
      assert.deepStrictEqual(element.children[4].attributes, { includeDerived: 'false' });
    });

    it('should write album fields after the container fields', () => {
      const album = createMusicAlbum({
        objectId: 'A:ALBUM/Record',
        parentId: 'A:ALBUM',
        title: 'Record',
        date: '2001',
        publishers: ['Label'],
        description: 'Debut',
        artists: ['Band'],
        albumArtUri: '/getaa?u=x'
      });

      assert.deepStrictEqual(childNames(musicAlbumToElement(album)), [
        'title', 'class', 'writeStatus', 'description', 'date', 'publisher', 'artist', 'albumArtURI'
      ]);
    });

    it('should write playlist container lists before single fields', () => {
      const playlist = createPlaylistContainer({
        objectId: 'SQ:1',
        parentId: 'SQ:',
        title: 'Mix',
        description: 'Friday',
        artists: ['Band'],
        languages: ['en']
      });
      assert.deepStrictEqual(childNames(playlistContainerToElement(playlist)), [
        'title', 'class', 'writeStatus', 'artist', 'language', 'description'
      ]);
    });

    it('should refuse to write storage without its capacity', () => {
      const folder = createStorageFolder({ objectId: 'S:', parentId: '0', title: 'Shares' });
      assert.throws(() => storageFolderToElement(folder), (error: unknown) => {
        assert(error instanceof MissingRequiredFieldError);
        assert.strictEqual(error.field, 'upnp:storageUsed');
        assert.strictEqual(error.className, 'StorageFolder');
        return true;
      });
    });
  });

  describe('parsing', () => {
    it('should read a music album', () => {
      const album = musicAlbumFromElement(parseContainer(
        '<dc:title>Record</dc:title>' +
        '<upnp:class>object.container.album.musicAlbum</upnp:class>' +
        '<upnp:artist>Band</upnp:artist>' +
        '<upnp:albumArtURI>/getaa?u=x</upnp:albumArtURI>' +
        '<dc:date>2001</dc:date>',
        'id="A:ALBUM/Record" parentID="A:ALBUM" restricted="true" childCount="11" searchable="true"'
      ));

      assert.strictEqual(album.kind, 'musicAlbum');
      assert.strictEqual(album.childCount, 11);
      assert.strictEqual(album.searchable, true);
      assert.deepStrictEqual(album.artists, ['Band']);
      assert.strictEqual(album.albumArtUri, '/getaa?u=x');
      assert.strictEqual(album.date, '2001');
      assert.deepStrictEqual(album.items, []);
    });

    it('should treat a missing searchable attribute as false', () => {
      const container = containerFromElement(parseContainer(
        '<dc:title>Library</dc:title><upnp:class>object.container</upnp:class>'
      ));
      assert.strictEqual(container.searchable, false);
      assert.strictEqual(container.childCount, 0);
    });

    it('should read search classes', () => {
      const container = containerFromElement(parseContainer(
        '<dc:title>Library</dc:title><upnp:class>object.container</upnp:class>' +
        '<upnp:searchClass includeDerived="1" name="Tracks">object.item.audioItem.musicTrack</upnp:searchClass>'
      ));
      assert.deepStrictEqual(container.searchClasses, [
        { className: 'object.item.audioItem.musicTrack', includeDerived: true, friendlyName: 'Tracks' }
      ]);
    });

    it('should require includeDerived on create classes', () => {
      assert.throws(
        () => containerFromElement(parseContainer(
          '<dc:title>Library</dc:title><upnp:class>object.container</upnp:class>' +
          '<upnp:createClass>object.item</upnp:createClass>'
        )),
        (error: unknown) => {
          assert(error instanceof MissingRequiredAttributeError);
          assert.strictEqual(error.element, 'upnp:createClass');
          return true;
        }
      );
    });

    it('should require every storage capacity field', () => {
      const element = parseContainer(
        '<dc:title>NAS</dc:title><upnp:class>object.container.storageSystem</upnp:class>' +
        '<upnp:storageTotal>100</upnp:storageTotal><upnp:storageUsed>40</upnp:storageUsed>' +
        '<upnp:storageFree>60</upnp:storageFree><upnp:storageMedium>HDD</upnp:storageMedium>'
      );
      assert.throws(() => storageSystemFromElement(element), {
        message: "Missing required field 'upnp:storageMaxPartition' for StorageSystem"
      });
    });

    it('should read back a written storage system', () => {
      const storage = createStorageSystem({
        objectId: 'S:NAS',
        parentId: 'S:',
        title: 'NAS',
        storageTotal: -1,
        storageUsed: 40,
        storageFree: -1,
        storageMaxPartition: 100,
        storageMedium: 'HDD'
      });
      assert.deepStrictEqual(storageSystemFromElement(storageSystemToElement(storage)), storage);
    });
  });
});
