import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AVT_NAMESPACE, decodeLastChange, LastChangeEvent } from '../../src/events/last-change-event.js';

const DIDL_NS = 'urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/';
const DC_NS = 'http://purl.org/dc/elements/1.1/';
const UPNP_NS = 'urn:schemas-upnp-org:metadata-1-0/upnp/';
const R_NS = 'urn:schemas-rinconnetworks-com:metadata-1-0/';

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function didl(itemBody: string, element = 'item'): string {
  return `<DIDL-Lite xmlns:dc="${DC_NS}" xmlns:upnp="${UPNP_NS}" xmlns:r="${R_NS}" xmlns="${DIDL_NS}">` +
    `<${element} id="-1" parentID="-1" restricted="true">${itemBody}</${element}>` +
    '</DIDL-Lite>';
}

function lastChange(instanceBody: string): string {
  return `<Event xmlns="${AVT_NAMESPACE}" xmlns:r="${R_NS}"><InstanceID val="0">${instanceBody}</InstanceID></Event>`;
}

const CURRENT_TRACK = didl(
  '<res protocolInfo="sonos.com-http:*:audio/mp4:*" duration="0:03:30">x-sonos-http:track%3a1.mp4?sid=2</res>' +
  '<upnp:albumArtURI>/getaa?s=1&amp;u=x</upnp:albumArtURI>' +
  '<dc:title>Rock &amp; Roll</dc:title>' +
  '<upnp:class>object.item.audioItem.musicTrack</upnp:class>' +
  '<dc:creator>Band</dc:creator>' +
  '<upnp:album>Record</upnp:album>' +
  '<upnp:originalTrackNumber>4</upnp:originalTrackNumber>' +
  '<r:albumArtist>Band</r:albumArtist>'
);

const NEXT_TRACK = didl(
  '<dc:title>Encore</dc:title>' +
  '<dc:creator>Band</dc:creator>' +
  '<upnp:album>Live</upnp:album>' +
  '<upnp:originalTrackNumber>five</upnp:originalTrackNumber>'
);

const ENQUEUED = didl('<dc:title>Evening Mix</dc:title>', 'container');

describe('LastChange Event', () => {
  it('should decode the transport state and current track title', () => {
    const event = LastChangeEvent.fromXml(lastChange(
      '<TransportState val="PLAYING"/>' +
      `<CurrentTrackMetaData val="${escapeAttribute(didl('<dc:title>Song</dc:title>'))}"/>`
    ));

    assert(event);
    assert.strictEqual(event.transportState, 'PLAYING');
    assert.strictEqual(event.title, 'Song');
  });

  it('should decode every known field', () => {
    const result = decodeLastChange(lastChange(
      '<TransportState val="PAUSED_PLAYBACK"/>' +
      '<CurrentPlayMode val="SHUFFLE"/>' +
      '<CurrentCrossfadeMode val="1"/>' +
      '<NumberOfTracks val="12"/>' +
      '<CurrentTrack val="3"/>' +
      '<CurrentSection val="0"/>' +
      '<CurrentTrackURI val="x-sonos-http:track%3a1.mp4?sid=2"/>' +
      '<CurrentTrackDuration val="0:03:30"/>' +
      `<CurrentTrackMetaData val="${escapeAttribute(CURRENT_TRACK)}"/>` +
      '<r:NextTrackURI val="x-sonos-http:track%3a2.mp4?sid=2"/>' +
      `<r:NextTrackMetaData val="${escapeAttribute(NEXT_TRACK)}"/>` +
      `<r:EnqueuedTransportURIMetaData val="${escapeAttribute(ENQUEUED)}"/>`
    ));

    assert(result.ok);
    const event = result.event;
    assert.strictEqual(event.transportState, 'PAUSED_PLAYBACK');
    assert.strictEqual(event.currentPlayMode, 'SHUFFLE');
    assert.strictEqual(event.currentCrossfadeMode, '1');
    assert.strictEqual(event.numberOfTracks, 12);
    assert.strictEqual(event.currentTrack, 3);
    assert.strictEqual(event.currentSection, 0);
    assert.strictEqual(event.currentTrackUri, 'x-sonos-http:track%3a1.mp4?sid=2');
    assert.strictEqual(event.currentTrackDuration, '0:03:30');
    assert.strictEqual(event.title, 'Rock & Roll');
    assert.strictEqual(event.creator, 'Band');
    assert.strictEqual(event.album, 'Record');
    assert.strictEqual(event.originalTrackNumber, 4);
    assert.strictEqual(event.albumArtUri, '/getaa?s=1&u=x');
    assert.strictEqual(event.albumArtist, 'Band');
    assert.strictEqual(event.radioShowMd, undefined);
    assert.strictEqual(event.nextTrackUri, 'x-sonos-http:track%3a2.mp4?sid=2');
    assert.strictEqual(event.nextTitle, 'Encore');
    assert.strictEqual(event.nextCreator, 'Band');
    assert.strictEqual(event.nextAlbum, 'Live');
    assert.strictEqual(event.nextOriginalTrackNumber, 'five');
    assert.strictEqual(event.transportTitle, 'Evening Mix');
  });

  it('should keep integer fields as text when they do not parse', () => {
    const event = LastChangeEvent.fromXml(lastChange('<NumberOfTracks val="NOT_IMPLEMENTED"/>'));
    assert(event);
    assert.strictEqual(event.numberOfTracks, 'NOT_IMPLEMENTED');
  });

  it('should treat unimplemented or empty metadata as absent', () => {
    const event = LastChangeEvent.fromXml(lastChange(
      '<TransportState val="STOPPED"/>' +
      '<CurrentTrackMetaData val="NOT_IMPLEMENTED"/>' +
      '<r:NextTrackMetaData val=""/>'
    ));

    assert(event);
    assert.strictEqual(event.title, undefined);
    assert.strictEqual(event.nextTitle, undefined);
    assert.deepStrictEqual(event.content, { transportState: 'STOPPED' });
  });

  it('should fail softly without an InstanceID', () => {
    const xml = `<Event xmlns="${AVT_NAMESPACE}"><TransportState val="PLAYING"/></Event>`;

    assert.strictEqual(LastChangeEvent.fromXml(xml), null);
    assert.deepStrictEqual(decodeLastChange(xml), { ok: false, reason: 'no InstanceID element' });
  });

  it('should fail softly when the embedded metadata is malformed', () => {
    const result = decodeLastChange(lastChange(
      '<TransportState val="PLAYING"/>' +
      `<CurrentTrackMetaData val="${escapeAttribute('<DIDL-Lite><item>')}"/>`
    ));

    assert.strictEqual(result.ok, false);
    assert(!result.ok && result.reason.startsWith(`invalid {${AVT_NAMESPACE}}CurrentTrackMetaData metadata: Malformed XML`));
  });

  it('should fail softly when the payload is not XML', () => {
    assert.strictEqual(LastChangeEvent.fromXml('<Event><InstanceID>'), null);
    assert.strictEqual(LastChangeEvent.fromXml(''), null);
  });

  it('should expose a frozen content mapping', () => {
    const event = LastChangeEvent.fromXml(lastChange('<TransportState val="PLAYING"/>'));
    assert(event);
    assert(Object.isFrozen(event.content));
  });
});
