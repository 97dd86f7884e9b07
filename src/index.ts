#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { UnityConnection } from "./communication/UnityConnection.js";
import { CONFIG } from "./config.js";
import { RemoteAssetImporter } from "./remote/RemoteAssetImporter.js";
import {
  applyPrefab,
  applyPrefabSchema,
  batchImportRemoteAssets,
  batchImportRemoteAssetsSchema,
  createAdvancedMaterial,
  createAdvancedMaterialSchema,
  createMaterialFromTemplate,
  createMaterialFromTemplateSchema,
  createPrefab,
  createPrefabSchema,
  importAsset,
  importAssetSchema,
  importRemoteAsset,
  importRemoteAssetSchema,
  instantiatePrefab,
  instantiatePrefabSchema,
  setMaterial,
  setMaterialProperties,
  setMaterialPropertiesSchema,
  setMaterialSchema,
  setMaterialTexture,
  setMaterialTextureSchema,
} from "./tools/index.js";

const TOOL_NAMES = [
  "import_asset",
  "instantiate_prefab",
  "create_prefab",
  "apply_prefab",
  "import_remote_asset",
  "batch_import_remote_assets",
  "set_material",
  "create_advanced_material",
  "set_material_properties",
  "set_material_texture",
  "create_material_from_template",
];

class UnityAssetMCPServer {
  private server: McpServer;
  private unityConnection: UnityConnection;
  private importer: RemoteAssetImporter;
  private initialized = false;

  constructor() {
    this.server = new McpServer({
      name: CONFIG.APP_NAME,
      version: CONFIG.APP_VERSION,
    });

    // WebSocket server the Unity Editor plugin connects to
    this.unityConnection = new UnityConnection({ features: TOOL_NAMES });

    this.importer = new RemoteAssetImporter({
      unity: this.unityConnection,
      cacheRoot: CONFIG.DOWNLOAD_CACHE_DIR,
    });

    process.on("SIGINT", () => {
      this.cleanup()
        .catch((error) => console.error("[Unity MCP] Error during shutdown:", error))
        .finally(() => process.exit(0));
    });
  }

  initialize() {
    if (this.initialized) return;
    this.setupAssetTools();
    this.setupMaterialTools();
    this.setupRemoteAssetTools();
    this.initialized = true;
  }

  private setupAssetTools() {
    const unityConnection = this.unityConnection;

    this.server.tool(
      "import_asset",
      "Import an asset (e.g. 3D model, texture) from local disk into the Unity project.",
      importAssetSchema,
      async (args) => importAsset(args, unityConnection)
    );

    this.server.tool(
      "instantiate_prefab",
      "Instantiate a prefab into the current scene at a specified position and rotation.",
      instantiatePrefabSchema,
      async (args) => instantiatePrefab(args, unityConnection)
    );

    this.server.tool(
      "create_prefab",
      "Create a new prefab asset from a GameObject in the scene.",
      createPrefabSchema,
      async (args) => createPrefab(args, unityConnection)
    );

    this.server.tool(
      "apply_prefab",
      "Apply changes made to a prefab instance back to the original prefab asset.",
      applyPrefabSchema,
      async (args) => applyPrefab(args, unityConnection)
    );
  }

  private setupMaterialTools() {
    const unityConnection = this.unityConnection;

    this.server.tool(
      "set_material",
      "Apply or create a material for a GameObject. When material_name is provided the material is saved as a shared asset in the Materials folder.",
      setMaterialSchema,
      async (args) => setMaterial(args, unityConnection)
    );

    this.server.tool(
      "create_advanced_material",
      "Create a material with a specific shader and render mode.",
      createAdvancedMaterialSchema,
      async (args) => createAdvancedMaterial(args, unityConnection)
    );

    this.server.tool(
      "set_material_properties",
      "Set physical properties (color, metallic, smoothness, normal, occlusion, height, emission) of a material.",
      setMaterialPropertiesSchema,
      async (args) => setMaterialProperties(args, unityConnection)
    );

    this.server.tool(
      "set_material_texture",
      "Assign a texture to a material slot, with optional tiling and offset.",
      setMaterialTextureSchema,
      async (args) => setMaterialTexture(args, unityConnection)
    );

    this.server.tool(
      "create_material_from_template",
      "Create a material from a predefined template (metal, plastic, wood, glass, emissive, fabric, skin).",
      createMaterialFromTemplateSchema,
      async (args) => createMaterialFromTemplate(args, unityConnection)
    );
  }

  private setupRemoteAssetTools() {
    const importer = this.importer;

    this.server.tool(
      "import_remote_asset",
      "Download an asset from a URL and import it into the Unity project.",
      importRemoteAssetSchema,
      async (args) => importRemoteAsset(args, importer)
    );

    this.server.tool(
      "batch_import_remote_assets",
      "Download and import several assets from a list of URLs, one after another.",
      batchImportRemoteAssetsSchema,
      async (args) => batchImportRemoteAssets(args, importer)
    );
  }

  private async cleanup() {
    this.unityConnection.close();
    await this.server.close();
  }

  async run() {
    this.initialize();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error("[Unity MCP] Unity asset MCP server running on stdio");
  }
}

const server = new UnityAssetMCPServer();
server.run().catch((error) => {
  console.error("[Unity MCP] Fatal error:", error);
  process.exit(1);
});
