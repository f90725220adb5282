// src/core/rendering/softwareRenderer.ts
import { mat4, vec2, vec3, vec4 } from "wgpu-matrix";
import {
  AlphaMode,
  type CameraUniform,
  type LightList,
  type MaterialBindings,
  type Mesh,
  type TextureSampler,
} from "@/core/types/gpu";
import type { ShapeMode } from "@/core/types/ui";
import { DEFAULT_SHADING_CONFIG, type ShadingConfig } from "@/core/config";
import { litFragment, litVertex } from "@/core/programs/litProgram";
import { uiFragment, uiVertex } from "@/core/programs/uiProgram";
import { resolveAlphaMode } from "@/core/shading/materialEvaluator";
import { UI_QUAD } from "@/core/ui/uiLayout";
import { Profiler } from "@/core/utils/profiler";
import type { Framebuffer } from "./framebuffer";
import { readLitInstance, readUIInstance } from "./instanceBufferManager";
import {
  BlendMode,
  rasterizeTriangle,
  type ClipVertex,
  type FragmentShader,
  type RasterState,
} from "./rasterizer";

/** UI quads are laid out directly in normalized device coordinates. */
const UI_CAMERA: CameraUniform = {
  viewPosition: vec4.create(0, 0, 0, 1),
  viewProjection: mat4.identity(),
};

const UI_RASTER_STATE: Readonly<RasterState> = Object.freeze({
  depthTest: false,
  depthWrite: false,
  blend: BlendMode.Alpha,
});

function validateMesh(mesh: Mesh): void {
  if (mesh.indices.length % 3 !== 0) {
    throw new Error(
      `[SoftwareRenderer] Mesh index count ${mesh.indices.length} is not a multiple of 3`,
    );
  }
  for (const index of mesh.indices) {
    if (!Number.isInteger(index) || index < 0 || index >= mesh.vertices.length) {
      throw new Error(
        `[SoftwareRenderer] Mesh index ${index} out of range (${mesh.vertices.length} vertices)`,
      );
    }
  }
}

/**
 * Runs the shading programs over packed instance buffers into a
 * {@link Framebuffer}, the way the GPU pipelines would.
 */
export class SoftwareRenderer {
  constructor(
    public readonly target: Framebuffer,
    private readonly config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
  ) {}

  private drawTriangles(
    mesh: Mesh,
    clipVertices: readonly ClipVertex[],
    shade: FragmentShader,
    state: Readonly<RasterState>,
  ): number {
    let written = 0;
    for (let i = 0; i < mesh.indices.length; i += 3) {
      written += rasterizeTriangle(
        this.target,
        [
          clipVertices[mesh.indices[i]],
          clipVertices[mesh.indices[i + 1]],
          clipVertices[mesh.indices[i + 2]],
        ],
        shade,
        state,
      );
    }
    return written;
  }

  /**
   * Draws `count` UI instances from a buffer written by
   * `InstanceBufferManager.packUIInstances`, alpha blended in buffer order.
   *
   * @returns The number of fragments written.
   */
  public drawUI(
    instances: Float32Array,
    count: number,
    mode: ShapeMode,
    texture?: TextureSampler,
  ): number {
    return Profiler.measure("SoftwareRenderer.drawUI", () => {
      let written = 0;
      for (let i = 0; i < count; i++) {
        const instance = readUIInstance(instances, i);
        const clipVertices = UI_QUAD.vertices.map((vertex): ClipVertex => {
          const out = uiVertex(vertex, UI_CAMERA, instance);
          return {
            clipPosition: out.clipPosition,
            varyings: [out.texCoords[0], out.texCoords[1]],
          };
        });
        written += this.drawTriangles(
          UI_QUAD,
          clipVertices,
          (v) => uiFragment(vec2.fromValues(v[0], v[1]), instance, mode, texture, this.config),
          UI_RASTER_STATE,
        );
      }
      return written;
    });
  }

  /**
   * Draws `count` instances of a lit mesh from a buffer written by
   * `InstanceBufferManager.packLitInstances`.
   *
   * @remarks
   * Depth tested. Blend-mode materials are alpha blended without depth
   * writes; every other material replaces the destination.
   *
   * @returns The number of fragments written.
   * @throws Error if the mesh indices are malformed.
   */
  public drawLitMesh(
    mesh: Mesh,
    instances: Float32Array,
    count: number,
    camera: CameraUniform,
    lights: LightList,
    material: MaterialBindings,
  ): number {
    validateMesh(mesh);
    const blended = resolveAlphaMode(material.metadata.alphaMode) === AlphaMode.Blend;
    const state: RasterState = {
      depthTest: true,
      depthWrite: !blended,
      blend: blended ? BlendMode.Alpha : BlendMode.Replace,
    };

    return Profiler.measure("SoftwareRenderer.drawLitMesh", () => {
      let written = 0;
      for (let i = 0; i < count; i++) {
        const instance = readLitInstance(instances, i);
        const clipVertices = mesh.vertices.map((vertex): ClipVertex => {
          const out = litVertex(vertex, camera, instance);
          return {
            clipPosition: out.clipPosition,
            varyings: [
              out.texCoords[0],
              out.texCoords[1],
              out.worldPosition[0],
              out.worldPosition[1],
              out.worldPosition[2],
              out.worldNormal[0],
              out.worldNormal[1],
              out.worldNormal[2],
            ],
          };
        });
        written += this.drawTriangles(
          mesh,
          clipVertices,
          (v) =>
            litFragment(
              {
                texCoords: vec2.fromValues(v[0], v[1]),
                worldPosition: vec3.fromValues(v[2], v[3], v[4]),
                worldNormal: vec3.fromValues(v[5], v[6], v[7]),
              },
              camera,
              lights,
              material,
              this.config,
            ),
          state,
        );
      }
      return written;
    });
  }
}
