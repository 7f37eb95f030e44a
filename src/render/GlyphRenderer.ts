/**
 * WebGL2 rasterization backend for composed text batches.
 *
 * Renders into an offscreen RGBA8 texture, draws the batch once per subpixel
 * instance with alpha blending, and reads the pixels back.
 */

import type { RasterBackend, RasterBatch } from "../compositor/Compositor";
import type { Color } from "../types";
import { GpuMesh } from "./GpuMesh";
import { instanceWeights, MAX_INSTANCES, MAX_PALETTE_COLORS } from "./shaders/glyph";
import { createGlyphProgram, type GlyphUniforms } from "./shaders/program";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_TEXTURE_2D = 0x0de1;
const GL_RGBA = 0x1908;
const GL_RGBA8 = 0x8058;
const GL_UNSIGNED_BYTE = 0x1401;
const GL_FRAMEBUFFER = 0x8d40;
const GL_COLOR_ATTACHMENT0 = 0x8ce0;
const GL_FRAMEBUFFER_COMPLETE = 0x8cd5;
const GL_COLOR_BUFFER_BIT = 0x4000;
const GL_BLEND = 0x0be2;
const GL_SRC_ALPHA = 0x0302;
const GL_ONE_MINUS_SRC_ALPHA = 0x0303;

export interface GlyphRendererOptions {
  /** Background the target is cleared to (default: dark slate) */
  clearColor?: Color;
}

export const DEFAULT_CLEAR_COLOR: Color = [0.12, 0.16, 0.2, 1];

export class GlyphRenderer implements RasterBackend {
  readonly gl: WebGL2RenderingContext;
  readonly clearColor: Color;

  private program: WebGLProgram;
  private uniforms: GlyphUniforms;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, options: GlyphRendererOptions = {}) {
    this.gl = gl;
    this.clearColor = options.clearColor ?? DEFAULT_CLEAR_COLOR;
    const { program, uniforms } = createGlyphProgram(gl);
    this.program = program;
    this.uniforms = uniforms;
  }

  /**
   * Draw a batch and return its RGBA8 pixels (rows bottom to top).
   */
  draw(batch: RasterBatch): Uint8Array {
    if (this._destroyed) {
      throw new Error("Cannot draw with destroyed renderer");
    }
    const instanceCount = batch.instanceOffsets.length;
    if (instanceCount === 0 || instanceCount > MAX_INSTANCES) {
      throw new Error(`Instance count must be between 1 and ${MAX_INSTANCES}, got ${instanceCount}`);
    }
    if (batch.palette.length > MAX_PALETTE_COLORS) {
      throw new Error(`Palette has ${batch.palette.length} colors, at most ${MAX_PALETTE_COLORS} supported`);
    }

    const gl = this.gl;
    const [width, height] = batch.textureSize;
    const target = this.createTarget(width, height);
    let mesh: GpuMesh | null = null;

    try {
      mesh = new GpuMesh(gl, batch.mesh);
      gl.viewport(0, 0, width, height);
      gl.clearColor(...this.clearColor);
      gl.clear(GL_COLOR_BUFFER_BIT);

      gl.enable(GL_BLEND);
      gl.blendFunc(GL_SRC_ALPHA, GL_ONE_MINUS_SRC_ALPHA);

      gl.useProgram(this.program);
      // Pixel offsets to device space
      gl.uniform1fv(
        this.uniforms.instanceOffsets,
        padded(batch.instanceOffsets.map((px) => (px / width) * 2), MAX_INSTANCES)
      );
      gl.uniform1fv(
        this.uniforms.instanceWeights,
        padded(instanceWeights(instanceCount), MAX_INSTANCES)
      );
      gl.uniform1i(this.uniforms.usePalette, batch.mesh.paletteIndexed ? 1 : 0);
      gl.uniform4fv(this.uniforms.palette, flattenPalette(batch.palette));

      mesh.drawInstanced(instanceCount);

      const pixels = new Uint8Array(width * height * 4);
      gl.readPixels(0, 0, width, height, GL_RGBA, GL_UNSIGNED_BYTE, pixels);
      return pixels;
    } finally {
      mesh?.destroy();
      gl.bindFramebuffer(GL_FRAMEBUFFER, null);
      gl.deleteFramebuffer(target.framebuffer);
      gl.deleteTexture(target.texture);
    }
  }

  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteProgram(this.program);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private createTarget(
    width: number,
    height: number
  ): { texture: WebGLTexture; framebuffer: WebGLFramebuffer } {
    const gl = this.gl;
    const texture = gl.createTexture();
    if (!texture) {
      throw new Error("Failed to create render target texture");
    }
    gl.bindTexture(GL_TEXTURE_2D, texture);
    gl.texStorage2D(GL_TEXTURE_2D, 1, GL_RGBA8, width, height);

    const framebuffer = gl.createFramebuffer();
    if (!framebuffer) {
      gl.deleteTexture(texture);
      throw new Error("Failed to create framebuffer");
    }
    gl.bindFramebuffer(GL_FRAMEBUFFER, framebuffer);
    gl.framebufferTexture2D(GL_FRAMEBUFFER, GL_COLOR_ATTACHMENT0, GL_TEXTURE_2D, texture, 0);

    const status = gl.checkFramebufferStatus(GL_FRAMEBUFFER);
    if (status !== GL_FRAMEBUFFER_COMPLETE) {
      gl.bindFramebuffer(GL_FRAMEBUFFER, null);
      gl.deleteFramebuffer(framebuffer);
      gl.deleteTexture(texture);
      throw new Error(`Framebuffer incomplete: 0x${status.toString(16)}`);
    }

    return { texture, framebuffer };
  }
}

function padded(values: readonly number[], length: number): Float32Array {
  const out = new Float32Array(length);
  out.set(values.slice(0, length));
  return out;
}

function flattenPalette(palette: readonly Color[]): Float32Array {
  const out = new Float32Array(MAX_PALETTE_COLORS * 4);
  palette.forEach((color, i) => out.set(color, i * 4));
  return out;
}
