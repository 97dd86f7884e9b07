export * from "./types.js";
export { importAsset, importAssetSchema } from "./ImportAssetTool.js";
export { instantiatePrefab, instantiatePrefabSchema } from "./InstantiatePrefabTool.js";
export { createPrefab, createPrefabSchema } from "./CreatePrefabTool.js";
export { applyPrefab, applyPrefabSchema } from "./ApplyPrefabTool.js";
export { setMaterial, setMaterialSchema } from "./SetMaterialTool.js";
export { createAdvancedMaterial, createAdvancedMaterialSchema } from "./CreateAdvancedMaterialTool.js";
export { setMaterialProperties, setMaterialPropertiesSchema } from "./SetMaterialPropertiesTool.js";
export { setMaterialTexture, setMaterialTextureSchema } from "./SetMaterialTextureTool.js";
export { createMaterialFromTemplate, createMaterialFromTemplateSchema } from "./CreateMaterialFromTemplateTool.js";
export { importRemoteAsset, importRemoteAssetSchema } from "./ImportRemoteAssetTool.js";
export { batchImportRemoteAssets, batchImportRemoteAssetsSchema } from "./BatchImportRemoteAssetsTool.js";
