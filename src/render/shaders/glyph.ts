/**
 * Glyph mesh shaders.
 *
 * Flat triangles fill as-is. Curve triangles (metadata bit 1) carry UVs
 * (0,0), (0.5,0), (1,1) so that `u² - v` is negative inside the quadratic
 * segment: convex curves discard outside, concave curves (bit 0) discard
 * inside.
 */

/** Upper bound of the palette uniform array */
export const MAX_PALETTE_COLORS = 64;

/** Upper bound of the instance offset uniform array */
export const MAX_INSTANCES = 4;

export const glyphVertexShader = `#version 300 es
precision highp float;

layout(location = 0) in vec3 a_position;
layout(location = 1) in vec2 a_uv;
layout(location = 2) in float a_metadata;
layout(location = 3) in vec4 a_color;

uniform float u_instanceOffsets[${MAX_INSTANCES}];
uniform float u_instanceWeights[${MAX_INSTANCES}];
uniform bool u_usePalette;
uniform vec4 u_palette[${MAX_PALETTE_COLORS}];

out vec2 v_uv;
flat out int v_metadata;
out vec4 v_color;
flat out float v_weight;

void main() {
  float offset = u_instanceOffsets[gl_InstanceID];
  gl_Position = vec4(a_position.x + offset, a_position.y, a_position.z, 1.0);
  v_uv = a_uv;
  v_metadata = int(a_metadata + 0.5);
  v_color = u_usePalette ? u_palette[int(a_color.x + 0.5)] : a_color;
  v_weight = u_instanceWeights[gl_InstanceID];
}
`;

export const glyphFragmentShader = `#version 300 es
precision mediump float;

in vec2 v_uv;
flat in int v_metadata;
in vec4 v_color;
flat in float v_weight;

out vec4 fragColor;

void main() {
  if ((v_metadata & 2) != 0) {
    float f = v_uv.x * v_uv.x - v_uv.y;
    bool concave = (v_metadata & 1) != 0;
    if (concave ? f < 0.0 : f > 0.0) {
      discard;
    }
  }
  fragColor = vec4(v_color.rgb, v_color.a * v_weight);
}
`;

/**
 * Alpha of each instance in draw order. Instance i covers 1 / (count - i) of
 * what is already there, so full coverage blends to the mean of all instances.
 */
export function instanceWeights(count: number): number[] {
  return Array.from({ length: count }, (_, i) => 1 / (count - i));
}
