import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { sendAndDescribe } from "./passThrough.js";
import { MATERIALS_FOLDER } from "./SetMaterialTool.js";
import { ToolResponse } from "./types.js";

export const createMaterialFromTemplateSchema = {
  material_name: z.string().min(1).describe("Name for the new material"),
  template: z.string().min(1).describe("Template to use (metal, plastic, wood, glass, emissive, fabric, skin)"),
  save_path: z.string().default(MATERIALS_FOLDER).describe("Folder to save the material in"),
};

export function createMaterialFromTemplate(
  args: { material_name: string; template: string; save_path?: string },
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  return sendAndDescribe(
    unityConnection,
    "CREATE_MATERIAL_FROM_TEMPLATE",
    {
      material_name: args.material_name,
      template: args.template,
      save_path: args.save_path ?? MATERIALS_FOLDER,
    },
    "creating material from template",
    "Material created successfully"
  );
}
