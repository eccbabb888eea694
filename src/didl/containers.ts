import type { XmlElement } from '../utils/xml.js';
import { debugManager } from '../utils/debug-manager.js';
import {
  readRequiredInteger,
  readRequiredText,
  readText,
  readTextList,
  writeRequiredText,
  writeText,
  writeTextList
} from './fields.js';
import { ancestry, isKindOf, type DidlKind } from './hierarchy.js';
import {
  className,
  containerDefaults,
  containerElement,
  readContainerFields,
  type Defaults,
  type Kinded
} from './objects.js';
import type {
  Album,
  AlbumFields,
  Container,
  DidlContainer,
  DidlInit,
  DidlItem,
  DidlObjectKind,
  Genre,
  GenreFields,
  MusicAlbum,
  MusicAlbumFields,
  MusicArtist,
  MusicArtistFields,
  MusicGenre,
  Person,
  PersonFields,
  PlaylistContainer,
  PlaylistContainerFields,
  StorageFolder,
  StorageFolderFields,
  StorageSystem,
  StorageSystemFields,
  StorageVolume,
  StorageVolumeFields
} from './types.js';

// ---------------------------------------------------------------------------
// Child management
// ---------------------------------------------------------------------------

interface ChildRule {
  items: readonly DidlKind[];
  containers: readonly DidlKind[];
}

/**
 * Kinds that restrict their children. A rule applies to the kind and every
 * kind below it that has no rule of its own.
 */
const CHILD_RULES: Partial<Record<DidlKind, ChildRule>> = {
  musicGenre: { items: ['audioItem'], containers: ['musicArtist', 'musicAlbum', 'musicGenre'] },
  person: { items: ['item'], containers: ['album', 'playlistContainer'] }
};

function childRuleFor(kind: DidlKind): ChildRule | undefined {
  for (const candidate of ancestry(kind)) {
    const rule = CHILD_RULES[candidate];
    if (rule) return rule;
  }
  return undefined;
}

function accepts(allowed: readonly DidlKind[] | undefined, kind: DidlKind): boolean {
  return allowed === undefined || allowed.some(ancestor => isKindOf(kind, ancestor));
}

/**
 * Add an item to a container. Returns false, leaving the container
 * untouched, when the container does not take that kind of item.
 */
export function addItem(container: DidlContainer, item: DidlItem): boolean {
  if (!isKindOf(item.kind, 'item') || !accepts(childRuleFor(container.kind)?.items, item.kind)) {
    debugManager.debug('didl', `${className(container.kind)} ${container.objectId} does not accept ${className(item.kind)}`);
    return false;
  }
  if (!container.items.includes(item)) {
    container.items.push(item);
  }
  item.parentId = container.objectId;
  return true;
}

/**
 * Add a sub-container. Same acceptance rules as addItem.
 */
export function addContainer(container: DidlContainer, child: DidlContainer): boolean {
  if (!isKindOf(child.kind, 'container') || !accepts(childRuleFor(container.kind)?.containers, child.kind)) {
    debugManager.debug('didl', `${className(container.kind)} ${container.objectId} does not accept ${className(child.kind)}`);
    return false;
  }
  if (!container.containers.includes(child)) {
    container.containers.push(child);
  }
  child.parentId = container.objectId;
  return true;
}

// ---------------------------------------------------------------------------
// object.container
// ---------------------------------------------------------------------------

export function createContainer(init: DidlInit<Container>): Container {
  return { ...containerDefaults('container'), ...init, kind: 'container' };
}

export function containerFromElement(element: XmlElement): Container {
  return { ...readContainerFields(element, 'container'), kind: 'container' };
}

export function containerToElement(container: Container): XmlElement {
  return containerElement(container);
}

// ---------------------------------------------------------------------------
// object.container.album
// ---------------------------------------------------------------------------

function albumDefaults(kind: DidlObjectKind): Defaults<AlbumFields> {
  return {
    ...containerDefaults(kind),
    storageMedium: '',
    longDescription: '',
    description: '',
    publishers: [],
    contributors: [],
    date: '',
    relations: [],
    rights: []
  };
}

function readAlbumFields(element: XmlElement, kind: DidlObjectKind): AlbumFields {
  return {
    ...readContainerFields(element, kind),
    storageMedium: readText(element, 'upnp', 'storageMedium'),
    longDescription: readText(element, 'upnp', 'longDescription'),
    description: readText(element, 'dc', 'description'),
    publishers: readTextList(element, 'dc', 'publisher'),
    contributors: readTextList(element, 'dc', 'contributor'),
    date: readText(element, 'dc', 'date'),
    relations: readTextList(element, 'dc', 'relation'),
    rights: readTextList(element, 'dc', 'rights')
  };
}

function albumElement(album: Kinded<AlbumFields>): XmlElement {
  const element = containerElement(album);
  writeText(element, 'upnp', 'storageMedium', album.storageMedium);
  writeText(element, 'upnp', 'longDescription', album.longDescription);
  writeText(element, 'dc', 'description', album.description);
  writeText(element, 'dc', 'date', album.date);
  writeTextList(element, 'dc', 'publisher', album.publishers);
  writeTextList(element, 'dc', 'contributor', album.contributors);
  writeTextList(element, 'dc', 'relation', album.relations);
  writeTextList(element, 'dc', 'rights', album.rights);
  return element;
}

export function createAlbum(init: DidlInit<Album>): Album {
  return { ...albumDefaults('album'), ...init, kind: 'album' };
}

export function albumFromElement(element: XmlElement): Album {
  return { ...readAlbumFields(element, 'album'), kind: 'album' };
}

export function albumToElement(album: Album): XmlElement {
  return albumElement(album);
}

// ---------------------------------------------------------------------------
// object.container.album.musicAlbum
// ---------------------------------------------------------------------------

export function createMusicAlbum(init: DidlInit<MusicAlbum>): MusicAlbum {
  return {
    ...albumDefaults('musicAlbum'),
    artists: [],
    genres: [],
    producers: [],
    albumArtUri: '',
    toc: '',
    ...init,
    kind: 'musicAlbum'
  };
}

export function musicAlbumFromElement(element: XmlElement): MusicAlbum {
  const fields: MusicAlbumFields = {
    ...readAlbumFields(element, 'musicAlbum'),
    artists: readTextList(element, 'upnp', 'artist'),
    genres: readTextList(element, 'upnp', 'genre'),
    producers: readTextList(element, 'upnp', 'producer'),
    albumArtUri: readText(element, 'upnp', 'albumArtURI'),
    toc: readText(element, 'upnp', 'toc')
  };
  return { ...fields, kind: 'musicAlbum' };
}

export function musicAlbumToElement(album: MusicAlbum): XmlElement {
  const element = albumElement(album);
  writeTextList(element, 'upnp', 'artist', album.artists);
  writeTextList(element, 'upnp', 'genre', album.genres);
  writeTextList(element, 'upnp', 'producer', album.producers);
  writeText(element, 'upnp', 'albumArtURI', album.albumArtUri);
  writeText(element, 'upnp', 'toc', album.toc);
  return element;
}

// ---------------------------------------------------------------------------
// object.container.genre, object.container.genre.musicGenre
// ---------------------------------------------------------------------------

function genreDefaults(kind: DidlObjectKind): Defaults<GenreFields> {
  return { ...containerDefaults(kind), longDescription: '', description: '' };
}

function readGenreFields(element: XmlElement, kind: DidlObjectKind): GenreFields {
  return {
    ...readContainerFields(element, kind),
    longDescription: readText(element, 'upnp', 'longDescription'),
    description: readText(element, 'dc', 'description')
  };
}

function genreElement(genre: Kinded<GenreFields>): XmlElement {
  const element = containerElement(genre);
  writeText(element, 'upnp', 'longDescription', genre.longDescription);
  writeText(element, 'dc', 'description', genre.description);
  return element;
}

export function createGenre(init: DidlInit<Genre>): Genre {
  return { ...genreDefaults('genre'), ...init, kind: 'genre' };
}

export function genreFromElement(element: XmlElement): Genre {
  return { ...readGenreFields(element, 'genre'), kind: 'genre' };
}

export function genreToElement(genre: Genre): XmlElement {
  return genreElement(genre);
}

export function createMusicGenre(init: DidlInit<MusicGenre>): MusicGenre {
  return { ...genreDefaults('musicGenre'), ...init, kind: 'musicGenre' };
}

export function musicGenreFromElement(element: XmlElement): MusicGenre {
  return { ...readGenreFields(element, 'musicGenre'), kind: 'musicGenre' };
}

export function musicGenreToElement(genre: MusicGenre): XmlElement {
  return genreElement(genre);
}

// ---------------------------------------------------------------------------
// object.container.playlistContainer
// ---------------------------------------------------------------------------

export function createPlaylistContainer(init: DidlInit<PlaylistContainer>): PlaylistContainer {
  return {
    ...containerDefaults('playlistContainer'),
    artists: [],
    genres: [],
    longDescription: '',
    producers: [],
    storageMedium: '',
    description: '',
    contributors: [],
    date: '',
    languages: [],
    rights: [],
    ...init,
    kind: 'playlistContainer'
  };
}

export function playlistContainerFromElement(element: XmlElement): PlaylistContainer {
  const fields: PlaylistContainerFields = {
    ...readContainerFields(element, 'playlistContainer'),
    artists: readTextList(element, 'upnp', 'artist'),
    genres: readTextList(element, 'upnp', 'genre'),
    longDescription: readText(element, 'upnp', 'longDescription'),
    producers: readTextList(element, 'upnp', 'producer'),
    storageMedium: readText(element, 'upnp', 'storageMedium'),
    description: readText(element, 'dc', 'description'),
    contributors: readTextList(element, 'dc', 'contributor'),
    date: readText(element, 'dc', 'date'),
    languages: readTextList(element, 'dc', 'language'),
    rights: readTextList(element, 'dc', 'rights')
  };
  return { ...fields, kind: 'playlistContainer' };
}

export function playlistContainerToElement(playlist: PlaylistContainer): XmlElement {
  const element = containerElement(playlist);
  writeTextList(element, 'upnp', 'artist', playlist.artists);
  writeTextList(element, 'upnp', 'genre', playlist.genres);
  writeTextList(element, 'upnp', 'producer', playlist.producers);
  writeTextList(element, 'dc', 'contributor', playlist.contributors);
  writeTextList(element, 'dc', 'language', playlist.languages);
  writeTextList(element, 'dc', 'rights', playlist.rights);
  writeText(element, 'upnp', 'longDescription', playlist.longDescription);
  writeText(element, 'upnp', 'storageMedium', playlist.storageMedium);
  writeText(element, 'dc', 'description', playlist.description);
  writeText(element, 'dc', 'date', playlist.date);
  return element;
}

// ---------------------------------------------------------------------------
// object.container.person, object.container.person.musicArtist
// ---------------------------------------------------------------------------

function personDefaults(kind: DidlObjectKind): Defaults<PersonFields> {
  return { ...containerDefaults(kind), languages: [] };
}

function readPersonFields(element: XmlElement, kind: DidlObjectKind): PersonFields {
  return { ...readContainerFields(element, kind), languages: readTextList(element, 'dc', 'language') };
}

function personElement(person: Kinded<PersonFields>): XmlElement {
  const element = containerElement(person);
  writeTextList(element, 'dc', 'language', person.languages);
  return element;
}

export function createPerson(init: DidlInit<Person>): Person {
  return { ...personDefaults('person'), ...init, kind: 'person' };
}

export function personFromElement(element: XmlElement): Person {
  return { ...readPersonFields(element, 'person'), kind: 'person' };
}

export function personToElement(person: Person): XmlElement {
  return personElement(person);
}

export function createMusicArtist(init: DidlInit<MusicArtist>): MusicArtist {
  return { ...personDefaults('musicArtist'), genres: [], artistDiscographyUri: '', ...init, kind: 'musicArtist' };
}

export function musicArtistFromElement(element: XmlElement): MusicArtist {
  const fields: MusicArtistFields = {
    ...readPersonFields(element, 'musicArtist'),
    genres: readTextList(element, 'upnp', 'genre'),
    artistDiscographyUri: readText(element, 'upnp', 'artistDiscographyURI')
  };
  return { ...fields, kind: 'musicArtist' };
}

export function musicArtistToElement(artist: MusicArtist): XmlElement {
  const element = personElement(artist);
  writeTextList(element, 'upnp', 'genre', artist.genres);
  writeText(element, 'upnp', 'artistDiscographyURI', artist.artistDiscographyUri);
  return element;
}

// ---------------------------------------------------------------------------
// Storage containers. Capacity fields are mandatory in both directions;
// -1 is the conventional value for "unknown".
// ---------------------------------------------------------------------------

export function createStorageSystem(init: DidlInit<StorageSystem>): StorageSystem {
  return {
    ...containerDefaults('storageSystem'),
    storageTotal: undefined,
    storageUsed: undefined,
    storageFree: undefined,
    storageMaxPartition: undefined,
    storageMedium: '',
    ...init,
    kind: 'storageSystem'
  };
}

export function storageSystemFromElement(element: XmlElement): StorageSystem {
  const name = className('storageSystem');
  const fields: StorageSystemFields = {
    ...readContainerFields(element, 'storageSystem'),
    storageTotal: readRequiredInteger(element, 'upnp', 'storageTotal', name),
    storageUsed: readRequiredInteger(element, 'upnp', 'storageUsed', name),
    storageFree: readRequiredInteger(element, 'upnp', 'storageFree', name),
    storageMaxPartition: readRequiredInteger(element, 'upnp', 'storageMaxPartition', name),
    storageMedium: readRequiredText(element, 'upnp', 'storageMedium', name)
  };
  return { ...fields, kind: 'storageSystem' };
}

export function storageSystemToElement(storage: StorageSystem): XmlElement {
  const name = className(storage.kind);
  const element = containerElement(storage);
  writeRequiredText(element, 'upnp', 'storageTotal', storage.storageTotal, name);
  writeRequiredText(element, 'upnp', 'storageUsed', storage.storageUsed, name);
  writeRequiredText(element, 'upnp', 'storageFree', storage.storageFree, name);
  writeRequiredText(element, 'upnp', 'storageMaxPartition', storage.storageMaxPartition, name);
  writeRequiredText(element, 'upnp', 'storageMedium', storage.storageMedium, name);
  return element;
}

export function createStorageVolume(init: DidlInit<StorageVolume>): StorageVolume {
  return {
    ...containerDefaults('storageVolume'),
    storageTotal: undefined,
    storageUsed: undefined,
    storageFree: undefined,
    storageMedium: '',
    ...init,
    kind: 'storageVolume'
  };
}

export function storageVolumeFromElement(element: XmlElement): StorageVolume {
  const name = className('storageVolume');
  const fields: StorageVolumeFields = {
    ...readContainerFields(element, 'storageVolume'),
    storageTotal: readRequiredInteger(element, 'upnp', 'storageTotal', name),
    storageUsed: readRequiredInteger(element, 'upnp', 'storageUsed', name),
    storageFree: readRequiredInteger(element, 'upnp', 'storageFree', name),
    storageMedium: readRequiredText(element, 'upnp', 'storageMedium', name)
  };
  return { ...fields, kind: 'storageVolume' };
}

export function storageVolumeToElement(storage: StorageVolume): XmlElement {
  const name = className(storage.kind);
  const element = containerElement(storage);
  writeRequiredText(element, 'upnp', 'storageTotal', storage.storageTotal, name);
  writeRequiredText(element, 'upnp', 'storageUsed', storage.storageUsed, name);
  writeRequiredText(element, 'upnp', 'storageFree', storage.storageFree, name);
  writeRequiredText(element, 'upnp', 'storageMedium', storage.storageMedium, name);
  return element;
}

export function createStorageFolder(init: DidlInit<StorageFolder>): StorageFolder {
  return { ...containerDefaults('storageFolder'), storageUsed: undefined, ...init, kind: 'storageFolder' };
}

export function storageFolderFromElement(element: XmlElement): StorageFolder {
  const fields: StorageFolderFields = {
    ...readContainerFields(element, 'storageFolder'),
    storageUsed: readRequiredInteger(element, 'upnp', 'storageUsed', className('storageFolder'))
  };
  return { ...fields, kind: 'storageFolder' };
}

export function storageFolderToElement(storage: StorageFolder): XmlElement {
  const element = containerElement(storage);
  writeRequiredText(element, 'upnp', 'storageUsed', storage.storageUsed, className(storage.kind));
  return element;
}
