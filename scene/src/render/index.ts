/**
 * Rendering capabilities and backends
 * @module render
 */

export type { ITexture, IRenderer, QuadDrawCall } from './types.js';
export { RecordingRenderer } from './RecordingRenderer.js';
export { CanvasRenderer, CanvasTexture, type Canvas2DLike, type ImageSourceLike } from './CanvasRenderer.js';
