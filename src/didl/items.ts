import type { XmlElement } from '../utils/xml.js';
import { readInteger, readText, readTextList, writeText, writeTextList } from './fields.js';
import { itemDefaults, itemElement, readItemFields, type Defaults, type Kinded } from './objects.js';
import type {
  AudioBook,
  AudioBookFields,
  AudioBroadcast,
  AudioBroadcastFields,
  AudioItem,
  AudioItemFields,
  DidlInit,
  DidlObjectKind,
  ImageItem,
  ImageItemFields,
  Item,
  MusicTrack,
  MusicTrackFields,
  PlaylistItem,
  PlaylistItemFields
} from './types.js';

// Each level reads its parent's fields first and appends its own elements
// after its parent's, in a fixed order.

// ---------------------------------------------------------------------------
// object.item
// ---------------------------------------------------------------------------

export function createItem(init: DidlInit<Item>): Item {
  return { ...itemDefaults('item'), ...init, kind: 'item' };
}

export function itemFromElement(element: XmlElement): Item {
  return { ...readItemFields(element, 'item'), kind: 'item' };
}

export function itemToElement(item: Item): XmlElement {
  return itemElement(item);
}

// ---------------------------------------------------------------------------
// object.item.audioItem
// ---------------------------------------------------------------------------

function audioItemDefaults(kind: DidlObjectKind): Defaults<AudioItemFields> {
  return {
    ...itemDefaults(kind),
    genres: [],
    relations: [],
    rights: [],
    publishers: [],
    longDescription: '',
    description: '',
    language: ''
  };
}

function readAudioItemFields(element: XmlElement, kind: DidlObjectKind): AudioItemFields {
  return {
    ...readItemFields(element, kind),
    genres: readTextList(element, 'upnp', 'genre'),
    relations: readTextList(element, 'dc', 'relation'),
    rights: readTextList(element, 'dc', 'rights'),
    publishers: readTextList(element, 'dc', 'publisher'),
    longDescription: readText(element, 'upnp', 'longDescription'),
    description: readText(element, 'dc', 'description'),
    language: readText(element, 'dc', 'language')
  };
}

function audioItemElement(item: Kinded<AudioItemFields>): XmlElement {
  const element = itemElement(item);
  writeTextList(element, 'upnp', 'genre', item.genres);
  writeTextList(element, 'dc', 'relation', item.relations);
  writeTextList(element, 'dc', 'rights', item.rights);
  writeTextList(element, 'dc', 'publisher', item.publishers);
  writeText(element, 'upnp', 'longDescription', item.longDescription);
  writeText(element, 'dc', 'description', item.description);
  writeText(element, 'dc', 'language', item.language);
  return element;
}

export function createAudioItem(init: DidlInit<AudioItem>): AudioItem {
  return { ...audioItemDefaults('audioItem'), ...init, kind: 'audioItem' };
}

export function audioItemFromElement(element: XmlElement): AudioItem {
  return { ...readAudioItemFields(element, 'audioItem'), kind: 'audioItem' };
}

export function audioItemToElement(item: AudioItem): XmlElement {
  return audioItemElement(item);
}

// ---------------------------------------------------------------------------
// object.item.audioItem.musicTrack
// ---------------------------------------------------------------------------

export function createMusicTrack(init: DidlInit<MusicTrack>): MusicTrack {
  return {
    ...audioItemDefaults('musicTrack'),
    artists: [],
    albums: [],
    playlists: [],
    contributors: [],
    originalTrackNumber: undefined,
    storageMedium: '',
    date: '',
    ...init,
    kind: 'musicTrack'
  };
}

export function musicTrackFromElement(element: XmlElement): MusicTrack {
  const fields: MusicTrackFields = {
    ...readAudioItemFields(element, 'musicTrack'),
    artists: readTextList(element, 'upnp', 'artist'),
    albums: readTextList(element, 'upnp', 'album'),
    playlists: readTextList(element, 'upnp', 'playlist'),
    contributors: readTextList(element, 'dc', 'contributor'),
    originalTrackNumber: readInteger(element, 'upnp', 'originalTrackNumber'),
    storageMedium: readText(element, 'upnp', 'storageMedium'),
    date: readText(element, 'dc', 'date')
  };
  return { ...fields, kind: 'musicTrack' };
}

export function musicTrackToElement(track: MusicTrack): XmlElement {
  const element = audioItemElement(track);
  writeTextList(element, 'upnp', 'artist', track.artists);
  writeTextList(element, 'upnp', 'album', track.albums);
  writeTextList(element, 'upnp', 'playlist', track.playlists);
  writeTextList(element, 'dc', 'contributor', track.contributors);
  writeText(element, 'upnp', 'originalTrackNumber', track.originalTrackNumber);
  writeText(element, 'upnp', 'storageMedium', track.storageMedium);
  writeText(element, 'dc', 'date', track.date);
  return element;
}

// ---------------------------------------------------------------------------
// object.item.audioItem.audioBroadcast
// ---------------------------------------------------------------------------

export function createAudioBroadcast(init: DidlInit<AudioBroadcast>): AudioBroadcast {
  return {
    ...audioItemDefaults('audioBroadcast'),
    region: '',
    radioCallSign: '',
    radioStationId: '',
    radioBand: '',
    channelNr: undefined,
    ...init,
    kind: 'audioBroadcast'
  };
}

export function audioBroadcastFromElement(element: XmlElement): AudioBroadcast {
  const fields: AudioBroadcastFields = {
    ...readAudioItemFields(element, 'audioBroadcast'),
    region: readText(element, 'upnp', 'region'),
    radioCallSign: readText(element, 'upnp', 'radioCallSign'),
    radioStationId: readText(element, 'upnp', 'radioStationID'),
    radioBand: readText(element, 'upnp', 'radioBand'),
    channelNr: readInteger(element, 'upnp', 'channelNr')
  };
  return { ...fields, kind: 'audioBroadcast' };
}

export function audioBroadcastToElement(broadcast: AudioBroadcast): XmlElement {
  const element = audioItemElement(broadcast);
  writeText(element, 'upnp', 'region', broadcast.region);
  writeText(element, 'upnp', 'radioCallSign', broadcast.radioCallSign);
  writeText(element, 'upnp', 'radioStationID', broadcast.radioStationId);
  writeText(element, 'upnp', 'radioBand', broadcast.radioBand);
  writeText(element, 'upnp', 'channelNr', broadcast.channelNr);
  return element;
}

// ---------------------------------------------------------------------------
// object.item.audioItem.audioBook
// ---------------------------------------------------------------------------

export function createAudioBook(init: DidlInit<AudioBook>): AudioBook {
  return {
    ...audioItemDefaults('audioBook'),
    storageMedium: '',
    producers: [],
    contributors: [],
    date: '',
    ...init,
    kind: 'audioBook'
  };
}

export function audioBookFromElement(element: XmlElement): AudioBook {
  const fields: AudioBookFields = {
    ...readAudioItemFields(element, 'audioBook'),
    storageMedium: readText(element, 'upnp', 'storageMedium'),
    producers: readTextList(element, 'upnp', 'producer'),
    contributors: readTextList(element, 'dc', 'contributor'),
    date: readText(element, 'dc', 'date')
  };
  return { ...fields, kind: 'audioBook' };
}

export function audioBookToElement(book: AudioBook): XmlElement {
  const element = audioItemElement(book);
  writeTextList(element, 'upnp', 'producer', book.producers);
  writeTextList(element, 'dc', 'contributor', book.contributors);
  writeText(element, 'dc', 'date', book.date);
  writeText(element, 'upnp', 'storageMedium', book.storageMedium);
  return element;
}

// ---------------------------------------------------------------------------
// object.item.imageItem
// ---------------------------------------------------------------------------

export function createImageItem(init: DidlInit<ImageItem>): ImageItem {
  return {
    ...itemDefaults('imageItem'),
    longDescription: '',
    storageMedium: '',
    rating: '',
    description: '',
    date: '',
    rights: [],
    ...init,
    kind: 'imageItem'
  };
}

export function imageItemFromElement(element: XmlElement): ImageItem {
  const fields: ImageItemFields = {
    ...readItemFields(element, 'imageItem'),
    longDescription: readText(element, 'upnp', 'longDescription'),
    storageMedium: readText(element, 'upnp', 'storageMedium'),
    rating: readText(element, 'upnp', 'rating'),
    description: readText(element, 'dc', 'description'),
    date: readText(element, 'dc', 'date'),
    rights: readTextList(element, 'dc', 'rights')
  };
  return { ...fields, kind: 'imageItem' };
}

export function imageItemToElement(image: ImageItem): XmlElement {
  const element = itemElement(image);
  writeText(element, 'upnp', 'longDescription', image.longDescription);
  writeText(element, 'upnp', 'storageMedium', image.storageMedium);
  writeText(element, 'upnp', 'rating', image.rating);
  writeText(element, 'dc', 'description', image.description);
  writeText(element, 'dc', 'date', image.date);
  writeTextList(element, 'dc', 'rights', image.rights);
  return element;
}

// ---------------------------------------------------------------------------
// object.item.playlistItem
// ---------------------------------------------------------------------------

export function createPlaylistItem(init: DidlInit<PlaylistItem>): PlaylistItem {
  return {
    ...itemDefaults('playlistItem'),
    authors: [],
    protection: '',
    longDescription: '',
    storageMedium: '',
    rating: '',
    description: '',
    publishers: [],
    contributors: [],
    date: '',
    relations: [],
    languages: [],
    rights: [],
    ...init,
    kind: 'playlistItem'
  };
}

export function playlistItemFromElement(element: XmlElement): PlaylistItem {
  const fields: PlaylistItemFields = {
    ...readItemFields(element, 'playlistItem'),
    authors: readTextList(element, 'upnp', 'author'),
    protection: readText(element, 'upnp', 'protection'),
    longDescription: readText(element, 'upnp', 'longDescription'),
    storageMedium: readText(element, 'upnp', 'storageMedium'),
    rating: readText(element, 'upnp', 'rating'),
    description: readText(element, 'dc', 'description'),
    publishers: readTextList(element, 'dc', 'publisher'),
    contributors: readTextList(element, 'dc', 'contributor'),
    date: readText(element, 'dc', 'date'),
    relations: readTextList(element, 'dc', 'relation'),
    languages: readTextList(element, 'dc', 'language'),
    rights: readTextList(element, 'dc', 'rights')
  };
  return { ...fields, kind: 'playlistItem' };
}

export function playlistItemToElement(playlist: PlaylistItem): XmlElement {
  const element = itemElement(playlist);
  writeText(element, 'upnp', 'protection', playlist.protection);
  writeText(element, 'upnp', 'storageMedium', playlist.storageMedium);
  writeText(element, 'upnp', 'longDescription', playlist.longDescription);
  writeText(element, 'upnp', 'rating', playlist.rating);
  writeText(element, 'dc', 'description', playlist.description);
  writeText(element, 'dc', 'date', playlist.date);
  writeTextList(element, 'upnp', 'author', playlist.authors);
  writeTextList(element, 'dc', 'publisher', playlist.publishers);
  writeTextList(element, 'dc', 'contributor', playlist.contributors);
  writeTextList(element, 'dc', 'relation', playlist.relations);
  writeTextList(element, 'dc', 'language', playlist.languages);
  writeTextList(element, 'dc', 'rights', playlist.rights);
  return element;
}
