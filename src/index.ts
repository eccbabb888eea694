export * from './didl/types.js';
export * from './didl/hierarchy.js';
export * from './didl/resource.js';
export * from './didl/protocol-info.js';
export * from './didl/quirks.js';
export * from './didl/items.js';
export * from './didl/containers.js';
export { getItemUri, getChildCount } from './didl/objects.js';
export * from './didl/class-registry.js';
export * from './didl/didl-document.js';

export * from './events/last-change-event.js';
export * from './events/event-parser.js';

export * from './errors/didl-errors.js';
export { getErrorMessage, getErrorCode } from './utils/error-helper.js';

export {
  NAMESPACES,
  nsTag,
  localName,
  namespaceOf,
  registerNamespace,
  registeredPrefix,
  filterIllegalXmlChars,
  createElement,
  ensureNamespacesRegistered,
  appendChild,
  findChild,
  findChildren,
  findChildText,
  getAttribute,
  parseXml,
  serializeXml
} from './utils/xml.js';
export type { NamespaceId, XmlElement, SerializeOptions } from './utils/xml.js';

export { default as logger } from './utils/logger.js';
export { currentLoggerBackend } from './utils/logger.js';
export type { Logger, LoggerBackend } from './utils/logger.js';
export { debugManager, initializeDebugManager, configure } from './utils/debug-manager.js';
export type { DebugCategory, LogLevel } from './utils/debug-manager.js';
export { loadConfiguration, formatConfigInfo } from './utils/config-loader.js';
export type { ConfigLoadResult } from './utils/config-loader.js';
export type { Config } from './types/config.js';
