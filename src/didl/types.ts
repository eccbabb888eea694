export type WriteStatus = 'NOT_WRITABLE' | 'WRITABLE' | 'PROTECTED' | 'UNKNOWN' | 'MIXED';

export const WRITE_STATUSES: readonly WriteStatus[] = ['NOT_WRITABLE', 'WRITABLE', 'PROTECTED', 'UNKNOWN', 'MIXED'];

/**
 * Integer field as read from a device. Text that is not an integer is kept
 * as sent.
 */
export type IntegerValue = number | string;

/**
 * A single playable representation of an object (`<res>`)
 */
export interface DidlResource {
  /** Resource URI, the element text */
  uri: string;
  /** `<protocol>:<network>:<contentFormat>:<additionalInfo>` */
  protocolInfo: string;
  importUri: string;
  /** Bytes */
  size: IntegerValue | undefined;
  /** `H+:MM:SS[.F+]` */
  duration: string;
  /** Bytes per second */
  bitrate: IntegerValue | undefined;
  /** Hz */
  sampleFrequency: IntegerValue | undefined;
  bitsPerSample: IntegerValue | undefined;
  nrAudioChannels: IntegerValue | undefined;
  /** `XxY` pixels, e.g. `640x480` */
  resolution: string;
  colorDepth: IntegerValue | undefined;
  protection: string;
}

export interface SearchClass {
  className: string;
  includeDerived: boolean;
  friendlyName: string;
}

// ---------------------------------------------------------------------------
// Field groups. Each level extends its parent; concrete variants add `kind`.
// ---------------------------------------------------------------------------

export interface DidlObjectFields {
  objectId: string;
  parentId: string;
  title: string;
  restricted: boolean;
  creator: string;
  writeStatus: WriteStatus;
  upnpClass: string;
  resources: DidlResource[];
}

export interface DidlItemFields extends DidlObjectFields {
  /** id of the item this one references, '' when it is not a reference */
  refId: string;
}

export interface AudioItemFields extends DidlItemFields {
  genres: string[];
  relations: string[];
  rights: string[];
  publishers: string[];
  longDescription: string;
  description: string;
  language: string;
}

export interface MusicTrackFields extends AudioItemFields {
  artists: string[];
  albums: string[];
  playlists: string[];
  contributors: string[];
  originalTrackNumber: IntegerValue | undefined;
  storageMedium: string;
  date: string;
}

export interface AudioBroadcastFields extends AudioItemFields {
  region: string;
  radioCallSign: string;
  radioStationId: string;
  radioBand: string;
  channelNr: IntegerValue | undefined;
}

export interface AudioBookFields extends AudioItemFields {
  storageMedium: string;
  producers: string[];
  contributors: string[];
  date: string;
}

export interface ImageItemFields extends DidlItemFields {
  longDescription: string;
  storageMedium: string;
  rating: string;
  description: string;
  date: string;
  rights: string[];
}

export interface PlaylistItemFields extends DidlItemFields {
  authors: string[];
  protection: string;
  longDescription: string;
  storageMedium: string;
  rating: string;
  description: string;
  publishers: string[];
  contributors: string[];
  date: string;
  relations: string[];
  languages: string[];
  rights: string[];
}

export interface DidlContainerFields extends DidlObjectFields {
  searchable: boolean;
  searchClasses: SearchClass[];
  createClasses: SearchClass[];
  /** Explicit counter; superseded by owned children, see getChildCount */
  childCount: number;
  items: DidlItem[];
  containers: DidlContainer[];
}

export interface AlbumFields extends DidlContainerFields {
  storageMedium: string;
  longDescription: string;
  description: string;
  publishers: string[];
  contributors: string[];
  date: string;
  relations: string[];
  rights: string[];
}

export interface MusicAlbumFields extends AlbumFields {
  artists: string[];
  genres: string[];
  producers: string[];
  albumArtUri: string;
  toc: string;
}

export interface GenreFields extends DidlContainerFields {
  longDescription: string;
  description: string;
}

export interface PlaylistContainerFields extends DidlContainerFields {
  artists: string[];
  genres: string[];
  longDescription: string;
  producers: string[];
  storageMedium: string;
  description: string;
  contributors: string[];
  date: string;
  languages: string[];
  rights: string[];
}

export interface PersonFields extends DidlContainerFields {
  languages: string[];
}

export interface MusicArtistFields extends PersonFields {
  genres: string[];
  artistDiscographyUri: string;
}

export interface StorageSystemFields extends DidlContainerFields {
  storageTotal: IntegerValue | undefined;
  storageUsed: IntegerValue | undefined;
  storageFree: IntegerValue | undefined;
  storageMaxPartition: IntegerValue | undefined;
  storageMedium: string;
}

export interface StorageVolumeFields extends DidlContainerFields {
  storageTotal: IntegerValue | undefined;
  storageUsed: IntegerValue | undefined;
  storageFree: IntegerValue | undefined;
  storageMedium: string;
}

export interface StorageFolderFields extends DidlContainerFields {
  storageUsed: IntegerValue | undefined;
}

// ---------------------------------------------------------------------------
// Concrete variants
// ---------------------------------------------------------------------------

export interface Item extends DidlItemFields { readonly kind: 'item' }
export interface AudioItem extends AudioItemFields { readonly kind: 'audioItem' }
export interface MusicTrack extends MusicTrackFields { readonly kind: 'musicTrack' }
export interface AudioBroadcast extends AudioBroadcastFields { readonly kind: 'audioBroadcast' }
export interface AudioBook extends AudioBookFields { readonly kind: 'audioBook' }
export interface ImageItem extends ImageItemFields { readonly kind: 'imageItem' }
export interface PlaylistItem extends PlaylistItemFields { readonly kind: 'playlistItem' }

export interface Container extends DidlContainerFields { readonly kind: 'container' }
export interface Album extends AlbumFields { readonly kind: 'album' }
export interface MusicAlbum extends MusicAlbumFields { readonly kind: 'musicAlbum' }
export interface Genre extends GenreFields { readonly kind: 'genre' }
export interface MusicGenre extends GenreFields { readonly kind: 'musicGenre' }
export interface PlaylistContainer extends PlaylistContainerFields { readonly kind: 'playlistContainer' }
export interface Person extends PersonFields { readonly kind: 'person' }
export interface MusicArtist extends MusicArtistFields { readonly kind: 'musicArtist' }
export interface StorageSystem extends StorageSystemFields { readonly kind: 'storageSystem' }
export interface StorageVolume extends StorageVolumeFields { readonly kind: 'storageVolume' }
export interface StorageFolder extends StorageFolderFields { readonly kind: 'storageFolder' }

export type DidlItem = Item | AudioItem | MusicTrack | AudioBroadcast | AudioBook | ImageItem | PlaylistItem;

export type DidlContainer =
  | Container
  | Album
  | MusicAlbum
  | Genre
  | MusicGenre
  | PlaylistContainer
  | Person
  | MusicArtist
  | StorageSystem
  | StorageVolume
  | StorageFolder;

export type DidlObject = DidlItem | DidlContainer;

export type DidlObjectKind = DidlObject['kind'];

export type DidlObjectOfKind<K extends DidlObjectKind> = Extract<DidlObject, { kind: K }>;

/**
 * Constructor input: identity and title are required, everything else defaults
 */
export type DidlInit<T extends DidlObjectFields> =
  Partial<Omit<T, 'kind' | 'objectId' | 'parentId' | 'title'>> & Pick<T, 'objectId' | 'parentId' | 'title'>;

