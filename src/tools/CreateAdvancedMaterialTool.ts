import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { sendAndDescribe } from "./passThrough.js";
import { MATERIALS_FOLDER } from "./SetMaterialTool.js";
import { ToolResponse } from "./types.js";

export const createAdvancedMaterialSchema = {
  material_name: z.string().min(1).describe("Material name"),
  shader_type: z.string().default("Standard").describe("Shader to use (Standard, Transparent, Unlit, etc.)"),
  render_mode: z.enum(["Opaque", "Transparent", "Cutout"]).default("Opaque").describe("Render mode"),
  save_path: z.string().default(MATERIALS_FOLDER).describe("Folder to save the material in"),
  create_if_missing: z.boolean().default(true).describe("Whether to create the material if it doesn't exist"),
};

interface CreateAdvancedMaterialArgs {
  material_name: string;
  shader_type?: string;
  render_mode?: "Opaque" | "Transparent" | "Cutout";
  save_path?: string;
  create_if_missing?: boolean;
}

export function createAdvancedMaterial(
  args: CreateAdvancedMaterialArgs,
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  return sendAndDescribe(
    unityConnection,
    "CREATE_ADVANCED_MATERIAL",
    {
      material_name: args.material_name,
      shader_type: args.shader_type ?? "Standard",
      render_mode: args.render_mode ?? "Opaque",
      save_path: args.save_path ?? MATERIALS_FOLDER,
      create_if_missing: args.create_if_missing ?? true,
    },
    "creating material",
    "Material created successfully"
  );
}
