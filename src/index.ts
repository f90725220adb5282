// src/index.ts
export * from "./core/types/gpu";
export * from "./core/types/ui";
export * from "./core/config";
export * from "./core/shading/builtins";
export * from "./core/shading/geometryTransformer";
export * from "./core/shading/illumination";
export * from "./core/shading/materialEvaluator";
export * from "./core/shading/roundedRect";
export * from "./core/programs/litProgram";
export * from "./core/programs/uiProgram";
export * from "./core/rendering/uniformManager";
export * from "./core/rendering/instanceBufferManager";
export * from "./core/rendering/framebuffer";
export * from "./core/rendering/rasterizer";
export * from "./core/rendering/softwareRenderer";
export * from "./core/lights/lightFactory";
export * from "./core/lights/lightRegistry";
export * from "./core/ui/uiLayout";
export * from "./core/utils/profiler";
export * from "./shared/io/lightRigIO";
