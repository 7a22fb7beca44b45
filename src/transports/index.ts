/**
 * Transport layer module
 */

// Export base class
export { BaseTransport, isJSONObject } from './base.js';

// Export implementations
export { InProcessTransport } from './in-process.js';
export type { InProcessTransportConfig } from './in-process.js';

export { StdioTransport } from './stdio.js';
export type { StdioTransportConfig } from './stdio.js';

export { LineBuffer, decodeLine, encodeLine } from './line-buffer.js';
