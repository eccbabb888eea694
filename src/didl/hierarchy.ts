/**
 * The DIDL-Lite class tree. Each kind names its parent; the dotted
 * `upnp:class` of a kind is the chain of kinds from the root down to it.
 */
const PARENTS = {
  object: null,
  item: 'object',
  audioItem: 'item',
  musicTrack: 'audioItem',
  audioBroadcast: 'audioItem',
  audioBook: 'audioItem',
  imageItem: 'item',
  playlistItem: 'item',
  container: 'object',
  album: 'container',
  musicAlbum: 'album',
  genre: 'container',
  musicGenre: 'genre',
  playlistContainer: 'container',
  person: 'container',
  musicArtist: 'person',
  storageSystem: 'container',
  storageVolume: 'container',
  storageFolder: 'container'
} as const;

export type DidlKind = keyof typeof PARENTS;

/** Kinds that can be instantiated; the root `object` is abstract. */
export type ConcreteDidlKind = Exclude<DidlKind, 'object'>;

export const DIDL_KINDS: readonly DidlKind[] = [
  'object', 'item', 'audioItem', 'musicTrack', 'audioBroadcast', 'audioBook', 'imageItem', 'playlistItem',
  'container', 'album', 'musicAlbum', 'genre', 'musicGenre', 'playlistContainer', 'person', 'musicArtist',
  'storageSystem', 'storageVolume', 'storageFolder'
];

export function parentKind(kind: DidlKind): DidlKind | null {
  return PARENTS[kind];
}

/**
 * The kind itself followed by its ancestors, up to the root
 */
export function ancestry(kind: DidlKind): DidlKind[] {
  const chain: DidlKind[] = [];
  let current: DidlKind | null = kind;
  while (current !== null) {
    chain.push(current);
    current = parentKind(current);
  }
  return chain;
}

export function isKindOf(kind: DidlKind, ancestor: DidlKind): boolean {
  return ancestry(kind).includes(ancestor);
}

/**
 * Canonical dotted class path, e.g. `object.item.audioItem.musicTrack`
 */
export function upnpClassFor(kind: DidlKind): string {
  return ancestry(kind).reverse().join('.');
}

export function isItemKind(kind: DidlKind): boolean {
  return isKindOf(kind, 'item');
}

export function isContainerKind(kind: DidlKind): boolean {
  return isKindOf(kind, 'container');
}
