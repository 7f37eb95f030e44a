/**
 * Glyph program: compiles the glyph shaders and resolves the uniforms the
 * renderer writes each draw.
 */

import { glyphFragmentShader, glyphVertexShader } from "./glyph";

export interface GlyphUniforms {
  instanceOffsets: WebGLUniformLocation;
  instanceWeights: WebGLUniformLocation;
  usePalette: WebGLUniformLocation;
  palette: WebGLUniformLocation;
}

export interface GlyphProgram {
  program: WebGLProgram;
  uniforms: GlyphUniforms;
}

export interface GlyphShaderSources {
  vertex: string;
  fragment: string;
}

const GLYPH_SOURCES: GlyphShaderSources = {
  vertex: glyphVertexShader,
  fragment: glyphFragmentShader,
};

/**
 * Build the glyph program.
 * @throws Error naming the failing stage, the link step or a missing uniform
 */
export function createGlyphProgram(
  gl: WebGL2RenderingContext,
  sources: GlyphShaderSources = GLYPH_SOURCES
): GlyphProgram {
  const program = gl.createProgram();
  if (!program) {
    throw new Error("Failed to create glyph program");
  }

  const stages: WebGLShader[] = [];
  try {
    stages.push(compileStage(gl, gl.VERTEX_SHADER, "vertex", sources.vertex));
    stages.push(compileStage(gl, gl.FRAGMENT_SHADER, "fragment", sources.fragment));
    for (const shader of stages) {
      gl.attachShader(program, shader);
    }
    gl.linkProgram(program);
    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      throw new Error(`Glyph program failed to link: ${gl.getProgramInfoLog(program)}`);
    }

    const uniform = (name: string): WebGLUniformLocation => {
      const location = gl.getUniformLocation(program, name);
      if (!location) {
        throw new Error(`Glyph program is missing uniform ${name}`);
      }
      return location;
    };

    return {
      program,
      uniforms: {
        instanceOffsets: uniform("u_instanceOffsets"),
        instanceWeights: uniform("u_instanceWeights"),
        usePalette: uniform("u_usePalette"),
        palette: uniform("u_palette"),
      },
    };
  } catch (err) {
    gl.deleteProgram(program);
    throw err;
  } finally {
    // The linked program keeps what it needs
    for (const shader of stages) {
      gl.deleteShader(shader);
    }
  }
}

function compileStage(
  gl: WebGL2RenderingContext,
  type: GLenum,
  label: string,
  source: string
): WebGLShader {
  const shader = gl.createShader(type);
  if (!shader) {
    throw new Error(`Failed to create glyph ${label} shader`);
  }
  gl.shaderSource(shader, source);
  gl.compileShader(shader);
  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader);
    gl.deleteShader(shader);
    throw new Error(`Glyph ${label} shader failed to compile: ${log}`);
  }
  return shader;
}
