import type { IRenderer, ITexture, QuadDrawCall } from './types.js';

/**
 * Renderer that keeps every submitted quad, in submission order.
 * Useful for inspecting a frame without a graphics backend.
 */
export class RecordingRenderer<T extends ITexture = ITexture> implements IRenderer<T> {
  private readonly recorded: QuadDrawCall<T>[] = [];

  drawQuad(call: QuadDrawCall<T>): void {
    this.recorded.push(call);
  }

  get calls(): readonly QuadDrawCall<T>[] {
    return this.recorded;
  }

  get count(): number {
    return this.recorded.length;
  }

  clear(): void {
    this.recorded.length = 0;
  }
}
