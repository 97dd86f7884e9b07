import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { definedParams, sendAndDescribe } from "./passThrough.js";
import { ToolResponse } from "./types.js";

const pair = z.array(z.number()).length(2);

export const setMaterialTextureSchema = {
  material_path: z.string().min(1).describe("Path to the material"),
  texture_type: z.string().min(1).describe("Texture slot (albedo, normal, metallic, smoothness, occlusion, height, emission)"),
  texture_path: z.string().min(1).describe("Path to the texture asset"),
  tiling: pair.optional().describe("[x, y] tiling values"),
  offset: pair.optional().describe("[x, y] offset values"),
};

interface SetMaterialTextureArgs {
  material_path: string;
  texture_type: string;
  texture_path: string;
  tiling?: number[];
  offset?: number[];
}

export function setMaterialTexture(
  args: SetMaterialTextureArgs,
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  return sendAndDescribe(
    unityConnection,
    "SET_MATERIAL_TEXTURE",
    definedParams({ ...args }),
    "setting material texture",
    "Material texture set successfully"
  );
}
