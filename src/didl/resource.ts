import { createElement, getAttribute, nsTag, type XmlElement } from '../utils/xml.js';
import { MissingRequiredAttributeError } from '../errors/didl-errors.js';
import { parseInteger } from './fields.js';
import { applyResourceQuirks } from './quirks.js';
import type { DidlResource, IntegerValue } from './types.js';

export interface ResourceParseOptions {
  /** Normalize known vendor non-conformance before validating */
  applyQuirks?: boolean;
}

type ResourceInit = Partial<Omit<DidlResource, 'uri' | 'protocolInfo'>>;

export function createResource(uri: string, protocolInfo: string, init: ResourceInit = {}): DidlResource {
  return {
    uri,
    protocolInfo,
    importUri: '',
    size: undefined,
    duration: '',
    bitrate: undefined,
    sampleFrequency: undefined,
    bitsPerSample: undefined,
    nrAudioChannels: undefined,
    resolution: '',
    colorDepth: undefined,
    protection: '',
    ...init
  };
}

/**
 * Read a `<res>` element. A missing protocolInfo is rejected unless quirks
 * are applied first.
 */
export function resourceFromElement(element: XmlElement, options: ResourceParseOptions = {}): DidlResource {
  const res = options.applyQuirks ? applyResourceQuirks(element) : element;
  const protocolInfo = getAttribute(res, 'protocolInfo');
  if (protocolInfo === undefined) {
    throw new MissingRequiredAttributeError('protocolInfo', 'res');
  }

  const integer = (name: string): IntegerValue | undefined => parseInteger(getAttribute(res, name));

  return {
    uri: res.text ?? '',
    protocolInfo,
    importUri: getAttribute(res, 'importUri') ?? '',
    size: integer('size'),
    duration: getAttribute(res, 'duration') ?? '',
    bitrate: integer('bitrate'),
    sampleFrequency: integer('sampleFrequency'),
    bitsPerSample: integer('bitsPerSample'),
    nrAudioChannels: integer('nrAudioChannels'),
    resolution: getAttribute(res, 'resolution') ?? '',
    colorDepth: integer('colorDepth'),
    protection: getAttribute(res, 'protection') ?? ''
  };
}

export function resourceToElement(resource: DidlResource): XmlElement {
  if (!resource.protocolInfo) {
    throw new MissingRequiredAttributeError('protocolInfo', 'res');
  }

  const attributes: Record<string, string> = { protocolInfo: resource.protocolInfo };
  const optional: Array<[string, string | number | undefined]> = [
    ['importUri', resource.importUri],
    ['size', resource.size],
    ['duration', resource.duration],
    ['bitrate', resource.bitrate],
    ['sampleFrequency', resource.sampleFrequency],
    ['bitsPerSample', resource.bitsPerSample],
    ['nrAudioChannels', resource.nrAudioChannels],
    ['resolution', resource.resolution],
    ['colorDepth', resource.colorDepth],
    ['protection', resource.protection]
  ];
  for (const [name, value] of optional) {
    if (value !== undefined && value !== '') {
      attributes[name] = String(value);
    }
  }

  return createElement(nsTag('', 'res'), attributes, resource.uri);
}
