import {
  findChild,
  findChildText,
  getAttribute,
  nsTag,
  NAMESPACES,
  parseXml,
  type XmlElement
} from '../utils/xml.js';
import logger from '../utils/logger.js';
import { debugManager } from '../utils/debug-manager.js';
import { getErrorMessage } from '../utils/error-helper.js';

export const AVT_NAMESPACE = 'urn:schemas-upnp-org:metadata-1-0/AVT/';

const avt = (local: string): string => `{${AVT_NAMESPACE}}${local}`;
const rincon = (local: string): string => `{${NAMESPACES.r}}${local}`;

export type LastChangeField =
  | 'transportState'
  | 'currentPlayMode'
  | 'currentCrossfadeMode'
  | 'numberOfTracks'
  | 'currentTrack'
  | 'currentSection'
  | 'currentTrackUri'
  | 'currentTrackDuration'
  | 'nextTrackUri'
  | 'title'
  | 'creator'
  | 'album'
  | 'originalTrackNumber'
  | 'albumArtUri'
  | 'albumArtist'
  | 'radioShowMd'
  | 'nextTitle'
  | 'nextCreator'
  | 'nextAlbum'
  | 'nextOriginalTrackNumber'
  | 'nextAlbumArtist'
  | 'nextAlbumArtUri'
  | 'transportTitle';

export type LastChangeContent = Partial<Record<LastChangeField, string>>;

/** State variables carried in a `val` attribute */
const STATE_VARIABLES: ReadonlyArray<readonly [LastChangeField, string]> = [
  ['transportState', avt('TransportState')],
  ['currentPlayMode', avt('CurrentPlayMode')],
  ['currentCrossfadeMode', avt('CurrentCrossfadeMode')],
  ['numberOfTracks', avt('NumberOfTracks')],
  ['currentTrack', avt('CurrentTrack')],
  ['currentSection', avt('CurrentSection')],
  ['currentTrackUri', avt('CurrentTrackURI')],
  ['currentTrackDuration', avt('CurrentTrackDuration')],
  ['nextTrackUri', rincon('NextTrackURI')]
];

interface MetadataVariable {
  tag: string;
  fields: ReadonlyArray<readonly [LastChangeField, string]>;
}

/** State variables whose `val` is an embedded DIDL-Lite document */
const METADATA_VARIABLES: readonly MetadataVariable[] = [
  {
    tag: avt('CurrentTrackMetaData'),
    fields: [
      ['title', nsTag('dc', 'title')],
      ['creator', nsTag('dc', 'creator')],
      ['album', nsTag('upnp', 'album')],
      ['originalTrackNumber', nsTag('upnp', 'originalTrackNumber')],
      ['albumArtUri', nsTag('upnp', 'albumArtURI')],
      ['albumArtist', nsTag('r', 'albumArtist')],
      ['radioShowMd', nsTag('r', 'radioShowMd')]
    ]
  },
  {
    tag: rincon('NextTrackMetaData'),
    fields: [
      ['nextTitle', nsTag('dc', 'title')],
      ['nextCreator', nsTag('dc', 'creator')],
      ['nextAlbum', nsTag('upnp', 'album')],
      ['nextOriginalTrackNumber', nsTag('upnp', 'originalTrackNumber')],
      ['nextAlbumArtist', nsTag('r', 'albumArtist')],
      ['nextAlbumArtUri', nsTag('upnp', 'albumArtURI')]
    ]
  },
  {
    tag: rincon('EnqueuedTransportURIMetaData'),
    fields: [['transportTitle', nsTag('dc', 'title')]]
  }
];

// An empty val means no track is loaded; it reads as absent rather than as
// a malformed document.
const ABSENT_VALUES = new Set(['', 'NOT_IMPLEMENTED']);
const DIDL_OBJECT_TAGS = [nsTag('', 'item'), nsTag('', 'container')];

export type LastChangeDecodeResult =
  | { ok: true; event: LastChangeEvent }
  | { ok: false; reason: string };

/**
 * Integer-valued fields come back as numbers when they parse, otherwise as
 * the raw string
 */
function coerceInteger(value: string | undefined): number | string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return /^[+-]?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : value;
}

/**
 * Read fields of the first item (or container) of an embedded DIDL document.
 * Returns a failure reason when the document is not well-formed.
 */
function readEmbeddedMetadata(variable: MetadataVariable, didl: string, content: LastChangeContent): string | undefined {
  let root: XmlElement;
  try {
    root = parseXml(didl);
  } catch (error) {
    return `invalid ${variable.tag} metadata: ${getErrorMessage(error)}`;
  }

  const entry = root.children.find(child => DIDL_OBJECT_TAGS.includes(child.tag));
  if (!entry) {
    debugManager.debug('events', `No DIDL object in ${variable.tag}`);
    return undefined;
  }
  for (const [field, tag] of variable.fields) {
    const text = findChildText(entry, tag);
    if (text !== undefined) {
      content[field] = text;
    }
  }
  return undefined;
}

/**
 * A decoded AVTransport LastChange notification. Immutable once built.
 */
export class LastChangeEvent {
  private readonly fields: Readonly<LastChangeContent>;

  private constructor(fields: LastChangeContent) {
    this.fields = Object.freeze({ ...fields });
  }

  /**
   * Decode a LastChange payload. Malformed or unsupported payloads are
   * logged and reported as a failure result; nothing is thrown.
   */
  static decode(xml: string): LastChangeDecodeResult {
    const fail = (reason: string): LastChangeDecodeResult => {
      logger.warn(`Could not decode LastChange event: ${reason}`);
      debugManager.debug('events', 'Rejected LastChange payload', { xml });
      return { ok: false, reason };
    };

    let root: XmlElement;
    try {
      root = parseXml(xml);
    } catch (error) {
      return fail(getErrorMessage(error));
    }

    const instance = findChild(root, avt('InstanceID'));
    if (!instance) {
      return fail('no InstanceID element');
    }

    const content: LastChangeContent = {};
    for (const [field, tag] of STATE_VARIABLES) {
      const element = findChild(instance, tag);
      const value = element ? getAttribute(element, 'val') : undefined;
      if (value !== undefined) {
        content[field] = value;
      }
    }

    for (const variable of METADATA_VARIABLES) {
      const element = findChild(instance, variable.tag);
      const value = element ? getAttribute(element, 'val') : undefined;
      if (value === undefined || ABSENT_VALUES.has(value.trim())) {
        continue;
      }
      const failure = readEmbeddedMetadata(variable, value, content);
      if (failure) {
        return fail(failure);
      }
    }

    debugManager.debug('events', 'Decoded LastChange event', content);
    return { ok: true, event: new LastChangeEvent(content) };
  }

  /**
   * The decoded event, or null when the payload could not be decoded
   */
  static fromXml(xml: string): LastChangeEvent | null {
    const result = LastChangeEvent.decode(xml);
    return result.ok ? result.event : null;
  }

  get content(): Readonly<LastChangeContent> {
    return this.fields;
  }

  get transportState(): string | undefined {
    return this.fields.transportState;
  }

  get currentPlayMode(): string | undefined {
    return this.fields.currentPlayMode;
  }

  get currentCrossfadeMode(): string | undefined {
    return this.fields.currentCrossfadeMode;
  }

  get numberOfTracks(): number | string | undefined {
    return coerceInteger(this.fields.numberOfTracks);
  }

  get currentTrack(): number | string | undefined {
    return coerceInteger(this.fields.currentTrack);
  }

  get currentSection(): number | string | undefined {
    return coerceInteger(this.fields.currentSection);
  }

  get currentTrackUri(): string | undefined {
    return this.fields.currentTrackUri;
  }

  get currentTrackDuration(): string | undefined {
    return this.fields.currentTrackDuration;
  }

  get title(): string | undefined {
    return this.fields.title;
  }

  get creator(): string | undefined {
    return this.fields.creator;
  }

  get album(): string | undefined {
    return this.fields.album;
  }

  get originalTrackNumber(): number | string | undefined {
    return coerceInteger(this.fields.originalTrackNumber);
  }

  get albumArtUri(): string | undefined {
    return this.fields.albumArtUri;
  }

  get albumArtist(): string | undefined {
    return this.fields.albumArtist;
  }

  get radioShowMd(): string | undefined {
    return this.fields.radioShowMd;
  }

  get nextTrackUri(): string | undefined {
    return this.fields.nextTrackUri;
  }

  get nextTitle(): string | undefined {
    return this.fields.nextTitle;
  }

  get nextCreator(): string | undefined {
    return this.fields.nextCreator;
  }

  get nextAlbum(): string | undefined {
    return this.fields.nextAlbum;
  }

  get nextOriginalTrackNumber(): number | string | undefined {
    return coerceInteger(this.fields.nextOriginalTrackNumber);
  }

  get nextAlbumArtist(): string | undefined {
    return this.fields.nextAlbumArtist;
  }

  get nextAlbumArtUri(): string | undefined {
    return this.fields.nextAlbumArtUri;
  }

  get transportTitle(): string | undefined {
    return this.fields.transportTitle;
  }
}

export function decodeLastChange(xml: string): LastChangeDecodeResult {
  return LastChangeEvent.decode(xml);
}
