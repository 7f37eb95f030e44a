/**
 * GPU-resident text mesh: VAO, interleaved vertex buffer and index buffer
 */

import { VERTEX_ATTRIBUTES, VERTEX_STRIDE, type PackedTextMesh } from "./pack";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_ARRAY_BUFFER = 0x8892;
const GL_ELEMENT_ARRAY_BUFFER = 0x8893;
const GL_STATIC_DRAW = 0x88e4;
const GL_FLOAT = 0x1406;
const GL_TRIANGLES = 0x0004;
const GL_UNSIGNED_SHORT = 0x1403;
const GL_UNSIGNED_INT = 0x1405;

export class GpuMesh {
  readonly gl: WebGL2RenderingContext;
  readonly vao: WebGLVertexArrayObject;
  readonly vertexBuffer: WebGLBuffer;
  readonly indexBuffer: WebGLBuffer;
  readonly vertexCount: number;
  readonly indexCount: number;
  readonly indexType: GLenum;

  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, mesh: PackedTextMesh) {
    this.gl = gl;

    let maxIndex = -1;
    for (const index of mesh.indices) {
      if (index > maxIndex) maxIndex = index;
    }
    if (maxIndex >= mesh.vertexCount) {
      console.error(
        `[GpuMesh] Invalid indices: maxIndex=${maxIndex} >= vertexCount=${mesh.vertexCount}, indexCount=${mesh.indices.length}`
      );
      throw new Error(
        `Invalid mesh: indices reference vertices beyond buffer (maxIndex=${maxIndex}, vertexCount=${mesh.vertexCount})`
      );
    }

    const vao = gl.createVertexArray();
    if (!vao) {
      throw new Error("Failed to create VAO");
    }
    const vertexBuffer = gl.createBuffer();
    const indexBuffer = gl.createBuffer();
    if (!vertexBuffer || !indexBuffer) {
      gl.deleteVertexArray(vao);
      if (vertexBuffer) gl.deleteBuffer(vertexBuffer);
      if (indexBuffer) gl.deleteBuffer(indexBuffer);
      throw new Error("Failed to create WebGL buffer");
    }
    this.vao = vao;
    this.vertexBuffer = vertexBuffer;
    this.indexBuffer = indexBuffer;
    this.vertexCount = mesh.vertexCount;
    this.indexCount = mesh.indices.length;
    this.indexType = mesh.indices instanceof Uint32Array ? GL_UNSIGNED_INT : GL_UNSIGNED_SHORT;

    gl.bindVertexArray(vao);

    gl.bindBuffer(GL_ARRAY_BUFFER, vertexBuffer);
    gl.bufferData(GL_ARRAY_BUFFER, mesh.vertices, GL_STATIC_DRAW);
    for (const attr of VERTEX_ATTRIBUTES) {
      gl.enableVertexAttribArray(attr.location);
      gl.vertexAttribPointer(attr.location, attr.size, GL_FLOAT, false, VERTEX_STRIDE, attr.offset);
    }

    gl.bindBuffer(GL_ELEMENT_ARRAY_BUFFER, indexBuffer);
    gl.bufferData(GL_ELEMENT_ARRAY_BUFFER, mesh.indices, GL_STATIC_DRAW);

    gl.bindVertexArray(null);
  }

  /** Draw the mesh once per instance */
  drawInstanced(instanceCount: number): void {
    if (this._destroyed) {
      throw new Error("Cannot draw destroyed mesh");
    }
    if (this.indexCount === 0) return;

    this.gl.bindVertexArray(this.vao);
    this.gl.drawElementsInstanced(GL_TRIANGLES, this.indexCount, this.indexType, 0, instanceCount);
    this.gl.bindVertexArray(null);
  }

  /** Delete all buffers and the VAO */
  destroy(): void {
    if (this._destroyed) return;

    this.gl.deleteBuffer(this.vertexBuffer);
    this.gl.deleteBuffer(this.indexBuffer);
    this.gl.deleteVertexArray(this.vao);

    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
