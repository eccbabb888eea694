import { findChild, findChildren, getAttribute, localName, parseXml, type XmlElement } from '../utils/xml.js';
import { debugManager } from '../utils/debug-manager.js';
import { fromDidlString } from '../didl/didl-document.js';
import type { DidlObject } from '../didl/types.js';
import { AVT_NAMESPACE } from './last-change-event.js';

export const EVENT_NAMESPACE = 'urn:schemas-upnp-org:event-1-0';
export const RCS_NAMESPACE = 'urn:schemas-upnp-org:metadata-1-0/RCS/';

export type EventScalar = string | DidlObject;
export type EventValue = EventScalar | Record<string, EventScalar>;
export type EventVariables = Record<string, EventValue>;

const INSTANCE_TAGS = [`{${AVT_NAMESPACE}}InstanceID`, `{${RCS_NAMESPACE}}InstanceID`];

/**
 * `CurrentTrackURI` -> `currentTrackUri`, `TransportState` -> `transportState`
 */
export function toVariableName(tag: string): string {
  const snake = localName(tag)
    .replace(/(.)([A-Z][a-z]+)/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
  return snake.replace(/_+([a-z0-9])/g, (_match, next: string) => next.toUpperCase());
}

function variableValue(variable: XmlElement): EventScalar {
  const value = getAttribute(variable, 'val') ?? variable.text ?? '';
  if (!value.startsWith('<DIDL-Lite')) {
    return value;
  }
  const [first] = fromDidlString(value);
  return first ?? value;
}

function expandLastChange(lastChange: XmlElement, result: EventVariables): void {
  const tree = parseXml(lastChange.text ?? '');
  const instance = INSTANCE_TAGS.map(tag => findChild(tree, tag)).find(found => found !== undefined);
  if (!instance) {
    debugManager.debug('events', 'LastChange without an InstanceID element');
    return;
  }

  for (const variable of instance.children) {
    const name = toVariableName(variable.tag);
    const value = variableValue(variable);
    const channel = getAttribute(variable, 'channel');
    if (channel === undefined) {
      result[name] = value;
      continue;
    }
    const existing = result[name];
    const channels: Record<string, EventScalar> =
      typeof existing === 'object' && !('kind' in existing) ? existing : {};
    channels[channel] = value;
    result[name] = channels;
  }
}

/**
 * Decode the body of a UPnP event notification (`e:propertyset`) into its
 * evented variables. `LastChange` is expanded into the variables it carries;
 * per-channel values (e.g. Volume) become a record keyed by channel.
 */
export function parseEventXml(xml: string): EventVariables {
  const result: EventVariables = {};
  const tree = parseXml(xml);

  for (const property of findChildren(tree, `{${EVENT_NAMESPACE}}property`)) {
    for (const variable of property.children) {
      if (localName(variable.tag) === 'LastChange') {
        expandLastChange(variable, result);
      } else {
        result[toVariableName(variable.tag)] = variable.text ?? '';
      }
    }
  }

  debugManager.debug('events', `Parsed event with ${Object.keys(result).length} variables`);
  return result;
}
