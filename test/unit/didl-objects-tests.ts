import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  audioBroadcastFromElement,
  audioBroadcastToElement,
  createAudioBroadcast,
  createItem,
  createMusicTrack,
  createPlaylistItem,
  itemFromElement,
  itemToElement,
  musicTrackFromElement,
  musicTrackToElement,
  playlistItemToElement
} from '../../src/didl/items.js';
import { getItemUri } from '../../src/didl/objects.js';
import { createResource } from '../../src/didl/resource.js';
import { DUMMY_PROTOCOL_INFO } from '../../src/didl/quirks.js';
import { getAttribute, localName, parseXml, serializeXml, type XmlElement } from '../../src/utils/xml.js';
import { MissingRequiredFieldError } from '../../src/errors/didl-errors.js';

const DIDL_NS = 'urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/';
const DC_NS = 'http://purl.org/dc/elements/1.1/';
const UPNP_NS = 'urn:schemas-upnp-org:metadata-1-0/upnp/';
const NS_DECLARATIONS = `xmlns="${DIDL_NS}" xmlns:dc="${DC_NS}" xmlns:upnp="${UPNP_NS}"`;

function parseItem(inner: string, attributes = 'id="1" parentID="0" restricted="true"'): XmlElement {
  return parseXml(`<item ${NS_DECLARATIONS} ${attributes}>${inner}</item>`);
}

function childNames(element: XmlElement): string[] {
  return element.children.map(child => localName(child.tag));
}

describe('DIDL Items', () => {
  describe('constructors', () => {
    it('should fill in defaults for a music track', () => {
      const track = createMusicTrack({ objectId: 'S://nas/a.mp3', parentId: 'A:TRACKS', title: 'Song' });

      assert.strictEqual(track.kind, 'musicTrack');
      assert.strictEqual(track.upnpClass, 'object.item.audioItem.musicTrack');
      assert.strictEqual(track.restricted, true);
      assert.strictEqual(track.writeStatus, 'NOT_WRITABLE');
      assert.strictEqual(track.refId, '');
      assert.deepStrictEqual(track.resources, []);
      assert.deepStrictEqual(track.artists, []);
      assert.strictEqual(track.originalTrackNumber, undefined);
    });

    it('should keep the kind even when a class override is given', () => {
      const item = createItem({ objectId: '1', parentId: '0', title: 'T', upnpClass: 'object.item.#custom' });
      assert.strictEqual(item.kind, 'item');
      assert.strictEqual(item.upnpClass, 'object.item.#custom');
    });
  });

  describe('serialization', () => {
    it('should write a music track in field order', () => {
      const track = createMusicTrack({
        objectId: 'S://nas/a.mp3',
        parentId: 'A:TRACKS',
        title: 'Song',
        creator: 'Band',
        artists: ['Band'],
        albums: ['Record'],
        originalTrackNumber: 3,
        resources: [createResource('x-file-cifs://nas/a.mp3', 'x-file-cifs:*:audio/mpeg:*')]
      });

      assert.strictEqual(
        serializeXml(musicTrackToElement(track)),
        `<item ${NS_DECLARATIONS} id="S://nas/a.mp3" parentID="A:TRACKS" restricted="true">` +
        '<dc:title>Song</dc:title>' +
        '<upnp:class>object.item.audioItem.musicTrack</upnp:class>' +
        '<dc:creator>Band</dc:creator>' +
        '<upnp:writeStatus>NOT_WRITABLE</upnp:writeStatus>' +
        '<res protocolInfo="x-file-cifs:*:audio/mpeg:*">x-file-cifs://nas/a.mp3</res>' +
        '<upnp:artist>Band</upnp:artist>' +
        '<upnp:album>Record</upnp:album>' +
        '<upnp:originalTrackNumber>3</upnp:originalTrackNumber>' +
        '</item>'
      );
    });

    it('should write refID only for references', () => {
      const reference = createItem({ objectId: 'Q:0/1', parentId: 'Q:0', title: 'T', refId: 'S://nas/a.mp3' });
      assert.strictEqual(getAttribute(itemToElement(reference), 'refID'), 'S://nas/a.mp3');

      const plain = createItem({ objectId: 'Q:0/2', parentId: 'Q:0', title: 'T' });
      assert.strictEqual(getAttribute(itemToElement(plain), 'refID'), undefined);
    });

    it('should refuse to write an item without a title', () => {
      const item = createItem({ objectId: '1', parentId: '0', title: '' });
      assert.throws(() => itemToElement(item), (error: unknown) => {
        assert(error instanceof MissingRequiredFieldError);
        assert.strictEqual(error.field, 'dc:title');
        assert.strictEqual(error.className, 'Item');
        return true;
      });
    });

    it('should write playlist item fields in their fixed order', () => {
      const playlist = createPlaylistItem({
        objectId: 'SQ:1',
        parentId: 'SQ:',
        title: 'Mix',
        authors: ['Me'],
        date: '2020-01-01',
        rating: '5',
        rights: ['CC']
      });

      assert.deepStrictEqual(childNames(playlistItemToElement(playlist)), [
        'title', 'class', 'writeStatus', 'rating', 'date', 'author', 'rights'
      ]);
    });
  });

  describe('parsing', () => {
    it('should read a music track', () => {
      const track = musicTrackFromElement(parseItem(
        '<dc:title>Song</dc:title>' +
        '<upnp:class>object.item.audioItem.musicTrack</upnp:class>' +
        '<dc:creator>Band</dc:creator>' +
        '<upnp:artist>Band</upnp:artist><upnp:artist>Guest</upnp:artist>' +
        '<upnp:album>Record</upnp:album>' +
        '<upnp:originalTrackNumber>7</upnp:originalTrackNumber>' +
        '<upnp:genre>Rock</upnp:genre>' +
        '<res protocolInfo="http-get:*:audio/mpeg:*" duration="0:04:00">http://host/a.mp3</res>'
      ));

      assert.strictEqual(track.kind, 'musicTrack');
      assert.strictEqual(track.objectId, '1');
      assert.strictEqual(track.parentId, '0');
      assert.strictEqual(track.title, 'Song');
      assert.strictEqual(track.creator, 'Band');
      assert.deepStrictEqual(track.artists, ['Band', 'Guest']);
      assert.deepStrictEqual(track.albums, ['Record']);
      assert.deepStrictEqual(track.genres, ['Rock']);
      assert.strictEqual(track.originalTrackNumber, 7);
      assert.strictEqual(track.resources.length, 1);
      assert.strictEqual(track.resources[0].duration, '0:04:00');
      assert.strictEqual(getItemUri(track), 'http://host/a.mp3');
    });

    it('should accept the restricted spellings devices use', () => {
      const body = '<dc:title>T</dc:title><upnp:class>object.item</upnp:class>';
      assert.strictEqual(itemFromElement(parseItem(body, 'id="1" parentID="0" restricted="1"')).restricted, true);
      assert.strictEqual(itemFromElement(parseItem(body, 'id="1" parentID="0" restricted="True"')).restricted, true);
      assert.strictEqual(itemFromElement(parseItem(body, 'id="1" parentID="0" restricted="false"')).restricted, false);
    });

    it('should require the identifying attributes', () => {
      const body = '<dc:title>T</dc:title><upnp:class>object.item</upnp:class>';
      assert.throws(() => itemFromElement(parseItem(body, 'parentID="0" restricted="true"')), (error: unknown) => {
        assert(error instanceof MissingRequiredFieldError);
        assert.strictEqual(error.field, 'id');
        return true;
      });
    });

    it('should require a title', () => {
      assert.throws(
        () => musicTrackFromElement(parseItem('<upnp:class>object.item.audioItem.musicTrack</upnp:class>')),
        { message: "Missing required field 'dc:title' for MusicTrack" }
      );
    });

    it('should map an unrecognized writeStatus to UNKNOWN', () => {
      const item = itemFromElement(parseItem(
        '<dc:title>T</dc:title><upnp:class>object.item</upnp:class><upnp:writeStatus>BOGUS</upnp:writeStatus>'
      ));
      assert.strictEqual(item.writeStatus, 'UNKNOWN');
    });

    it('should keep a track number that is not an integer as text', () => {
      const track = musicTrackFromElement(parseItem(
        '<dc:title>T</dc:title><upnp:class>object.item.audioItem.musicTrack</upnp:class>' +
        '<upnp:originalTrackNumber>3/12</upnp:originalTrackNumber>'
      ));
      assert.strictEqual(track.originalTrackNumber, '3/12');
    });

    it('should repair resources that lack protocolInfo', () => {
      const item = itemFromElement(parseItem(
        '<dc:title>T</dc:title><upnp:class>object.item</upnp:class><res>http://host/stream</res>'
      ));
      assert.strictEqual(item.resources[0].protocolInfo, DUMMY_PROTOCOL_INFO);
      assert.strictEqual(item.resources[0].uri, 'http://host/stream');
    });

    it('should read the station id of a broadcast', () => {
      const broadcast = audioBroadcastFromElement(parseItem(
        '<dc:title>Radio</dc:title>' +
        '<upnp:class>object.item.audioItem.audioBroadcast</upnp:class>' +
        '<upnp:radioStationID>s12345</upnp:radioStationID>' +
        '<upnp:channelNr>4</upnp:channelNr>'
      ));
      assert.strictEqual(broadcast.radioStationId, 's12345');
      assert.strictEqual(broadcast.channelNr, 4);
    });
  });

  describe('round trip', () => {
    it('should read back a written music track', () => {
      const track = createMusicTrack({
        objectId: 'S://nas/b.flac',
        parentId: 'A:TRACKS',
        title: 'Other & Song',
        artists: ['A', 'B'],
        contributors: ['C'],
        date: '1999-12-31',
        originalTrackNumber: 12,
        resources: [createResource('x-file-cifs://nas/b.flac', 'x-file-cifs:*:audio/flac:*', { size: 2048 })]
      });
      assert.deepStrictEqual(musicTrackFromElement(musicTrackToElement(track)), track);
    });

    it('should read back a written broadcast', () => {
      const broadcast = createAudioBroadcast({
        objectId: 'R:0/0/1',
        parentId: 'R:0/0',
        title: 'Station',
        radioCallSign: 'KXYZ',
        radioStationId: 's1',
        restricted: false
      });
      assert.deepStrictEqual(audioBroadcastFromElement(audioBroadcastToElement(broadcast)), broadcast);
    });
  });
});
