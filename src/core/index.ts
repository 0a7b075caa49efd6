export { DEFAULT_STYLE_CONFIG, resolveStyleConfig } from './config';
export type { StyleConfig } from './config';
export type { StyleContext } from './context';
export { createStyleDocument } from './document';
export type { StyleDocument, StyleDocumentOptions } from './document';
export { createStyleLogger, defaultStyleLogger, silentStyleLogger } from './logger';
export type { StyleLogger, ValueAdjustment } from './logger';
