import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { definedParams, sendAndDescribe } from "./passThrough.js";
import { ToolResponse } from "./types.js";

const unit = z.number().min(0).max(1);

export const setMaterialPropertiesSchema = {
  material_path: z.string().min(1).describe("Path to the material"),
  color: z.array(unit).min(3).max(4).optional().describe("[r, g, b] or [r, g, b, a] in 0.0-1.0"),
  metallic: unit.optional().describe("Metallic value (0.0-1.0)"),
  smoothness: unit.optional().describe("Smoothness/glossiness value (0.0-1.0)"),
  normal_scale: z.number().optional().describe("Normal map intensity"),
  occlusion_strength: unit.optional().describe("Ambient occlusion strength (0.0-1.0)"),
  height_scale: z.number().optional().describe("Height/parallax map scale"),
  emission_color: z.array(unit).min(3).max(4).optional().describe("[r, g, b] emission color in 0.0-1.0"),
  emission_intensity: z.number().optional().describe("Emission intensity multiplier"),
};

interface SetMaterialPropertiesArgs {
  material_path: string;
  color?: number[];
  metallic?: number;
  smoothness?: number;
  normal_scale?: number;
  occlusion_strength?: number;
  height_scale?: number;
  emission_color?: number[];
  emission_intensity?: number;
}

export function setMaterialProperties(
  args: SetMaterialPropertiesArgs,
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  return sendAndDescribe(
    unityConnection,
    "SET_MATERIAL_PROPERTIES",
    definedParams({ ...args }),
    "setting material properties",
    "Material properties updated successfully"
  );
}
