
export { default as ArrayBufferSlice } from "./ArrayBufferSlice.js";
export * from "./PMX/Errors.js";
export * from "./PMX/PMX.js";
export * from "./PMX/Scene.js";
export * from "./PMX/SceneBuilder.js";
export * from "./PMX/Importer.js";
export * from "./PMX/MemoryScene.js";
export { computeBoneCreationOrder, enforceMinimumBoneLength, validateBoneHierarchy } from "./PMX/Bones.js";
export { Stream, TextEncoding, type IndexWidth } from "./PMX/Stream.js";
