import { getAttribute, type XmlElement } from '../utils/xml.js';
import { debugManager } from '../utils/debug-manager.js';

export const DUMMY_PROTOCOL_INFO = 'DUMMY_ADDED_BY_QUIRK';
export const SPOTIFY_PROTOCOL_INFO = 'sonos.com-spotify:*:audio/x-spotify.*';

const SPOTIFY_URI_PREFIX = 'x-sonos-spotify';

/**
 * Fill in what some players leave out of `<res>`: the mandatory
 * protocolInfo attribute and the text. Returns a normalized copy.
 */
export function applyResourceQuirks(resource: XmlElement): XmlElement {
  if (getAttribute(resource, 'protocolInfo') !== undefined) {
    return resource;
  }

  const text = resource.text ?? '';
  const protocolInfo = text.startsWith(SPOTIFY_URI_PREFIX) ? SPOTIFY_PROTOCOL_INFO : DUMMY_PROTOCOL_INFO;
  debugManager.debug('quirks', `Resource had no protocolInfo, using '${protocolInfo}'`, { uri: text });

  return {
    ...resource,
    attributes: { ...resource.attributes, protocolInfo },
    text
  };
}
