/**
 * Export module: tabular, text and structured basket representations.
 */

export { toTabularRows, toCsv } from './tabular.js';
export { toReadableText } from './text.js';
export { toStructured, toJson, parseStructuredExport, basketKey } from './structured.js';
export { formatExport } from './format.js';
