import { findChildText, nsTag, type XmlElement } from '../utils/xml.js';
import { debugManager } from '../utils/debug-manager.js';
import { MissingRequiredFieldError, UnknownDidlClassError } from '../errors/didl-errors.js';
import {
  albumFromElement,
  albumToElement,
  containerFromElement,
  containerToElement,
  genreFromElement,
  genreToElement,
  musicAlbumFromElement,
  musicAlbumToElement,
  musicArtistFromElement,
  musicArtistToElement,
  musicGenreFromElement,
  musicGenreToElement,
  personFromElement,
  personToElement,
  playlistContainerFromElement,
  playlistContainerToElement,
  storageFolderFromElement,
  storageFolderToElement,
  storageSystemFromElement,
  storageSystemToElement,
  storageVolumeFromElement,
  storageVolumeToElement
} from './containers.js';
import {
  audioBookFromElement,
  audioBookToElement,
  audioBroadcastFromElement,
  audioBroadcastToElement,
  audioItemFromElement,
  audioItemToElement,
  imageItemFromElement,
  imageItemToElement,
  itemFromElement,
  itemToElement,
  musicTrackFromElement,
  musicTrackToElement,
  playlistItemFromElement,
  playlistItemToElement
} from './items.js';
import { className } from './objects.js';
import type { DidlObject, DidlObjectKind, DidlObjectOfKind } from './types.js';

export interface DidlClassCodec<K extends DidlObjectKind> {
  fromElement(element: XmlElement): DidlObjectOfKind<K>;
  toElement(obj: DidlObjectOfKind<K>): XmlElement;
}

type DidlClassTable = { [K in DidlObjectKind]: DidlClassCodec<K> };

/**
 * Parser/serializer pair for every concrete kind
 */
const DIDL_CLASSES: DidlClassTable = {
  item: { fromElement: itemFromElement, toElement: itemToElement },
  audioItem: { fromElement: audioItemFromElement, toElement: audioItemToElement },
  musicTrack: { fromElement: musicTrackFromElement, toElement: musicTrackToElement },
  audioBroadcast: { fromElement: audioBroadcastFromElement, toElement: audioBroadcastToElement },
  audioBook: { fromElement: audioBookFromElement, toElement: audioBookToElement },
  imageItem: { fromElement: imageItemFromElement, toElement: imageItemToElement },
  playlistItem: { fromElement: playlistItemFromElement, toElement: playlistItemToElement },
  container: { fromElement: containerFromElement, toElement: containerToElement },
  album: { fromElement: albumFromElement, toElement: albumToElement },
  musicAlbum: { fromElement: musicAlbumFromElement, toElement: musicAlbumToElement },
  genre: { fromElement: genreFromElement, toElement: genreToElement },
  musicGenre: { fromElement: musicGenreFromElement, toElement: musicGenreToElement },
  playlistContainer: { fromElement: playlistContainerFromElement, toElement: playlistContainerToElement },
  person: { fromElement: personFromElement, toElement: personToElement },
  musicArtist: { fromElement: musicArtistFromElement, toElement: musicArtistToElement },
  storageSystem: { fromElement: storageSystemFromElement, toElement: storageSystemToElement },
  storageVolume: { fromElement: storageVolumeFromElement, toElement: storageVolumeToElement },
  storageFolder: { fromElement: storageFolderFromElement, toElement: storageFolderToElement }
};

export const DIDL_OBJECT_KINDS: readonly DidlObjectKind[] = [
  'item', 'audioItem', 'musicTrack', 'audioBroadcast', 'audioBook', 'imageItem', 'playlistItem',
  'container', 'album', 'musicAlbum', 'genre', 'musicGenre', 'playlistContainer', 'person', 'musicArtist',
  'storageSystem', 'storageVolume', 'storageFolder'
];

/** Class name (e.g. `MusicTrack`) to kind */
const KIND_BY_CLASS_NAME = new Map<string, DidlObjectKind>(DIDL_OBJECT_KINDS.map(kind => [className(kind), kind]));

const VENDOR_EXTENSION_MARKER = '.#';

/**
 * Drop a vendor extension such as `.#RecentlyPlayed` and everything after it
 */
export function stripVendorExtension(upnpClass: string): string {
  const marker = upnpClass.indexOf(VENDOR_EXTENSION_MARKER);
  return marker >= 0 ? upnpClass.slice(0, marker) : upnpClass;
}

/**
 * Class names to try, most specific first:
 * `object.item.audioItem` -> ['AudioItem', 'Item', 'Object']
 */
export function candidateClassNames(upnpClass: string): string[] {
  return stripVendorExtension(upnpClass.trim())
    .split('.')
    .filter(segment => segment.length > 0)
    .reverse()
    .map(segment => segment.charAt(0).toUpperCase() + segment.slice(1));
}

/**
 * Resolve a dotted `upnp:class` to the most specific known concrete kind
 */
export function resolveDidlClass(upnpClass: string): DidlObjectKind {
  const candidates = candidateClassNames(upnpClass);
  for (const candidate of candidates) {
    const kind = KIND_BY_CLASS_NAME.get(candidate);
    if (kind) {
      if (candidate !== candidates[0]) {
        debugManager.debug('didl', `Resolved '${upnpClass}' to ${candidate} by fallback`);
      }
      return kind;
    }
  }
  throw new UnknownDidlClassError(upnpClass, candidates);
}

export function getDidlClassCodec<K extends DidlObjectKind>(kind: K): DidlClassCodec<K> {
  return DIDL_CLASSES[kind];
}

/**
 * Parse an `<item>` or `<container>` element into the kind its
 * `upnp:class` resolves to
 */
export function didlObjectFromElement(element: XmlElement): DidlObject {
  const upnpClass = findChildText(element, nsTag('upnp', 'class'));
  if (!upnpClass) {
    throw new MissingRequiredFieldError('upnp:class', 'DidlObject');
  }
  return getDidlClassCodec(resolveDidlClass(upnpClass)).fromElement(element);
}

function toElementOfKind<K extends DidlObjectKind>(kind: K, obj: DidlObjectOfKind<K>): XmlElement {
  return getDidlClassCodec(kind).toElement(obj);
}

export function didlObjectToElement(obj: DidlObject): XmlElement {
  return toElementOfKind(obj.kind, obj);
}
