export type { RenderOptions, RenderedExpressions } from './renderer.js';
export { ExpressionRenderer } from './renderer.js';
