import { UnityCommandParams, UnityCommandSender } from "../communication/types.js";
import { errorMessage, getBoolean, getString } from "./responseFields.js";
import { textResponse, ToolResponse } from "./types.js";

/**
 * Send one command and report Unity's message, or `Error <action>: ...` when
 * the command fails or the link throws.
 */
export async function sendAndDescribe(
  unityConnection: UnityCommandSender,
  command: string,
  params: UnityCommandParams,
  action: string,
  successText: string
): Promise<ToolResponse> {
  try {
    const response = await unityConnection.sendCommand(command, params);
    if (getBoolean(response, "success") === false) {
      return textResponse(`Error ${action}: ${getString(response, "error") ?? "Unknown error"}`, true);
    }
    return textResponse(getString(response, "message") ?? successText);
  } catch (error) {
    return textResponse(`Error ${action}: ${errorMessage(error)}`, true);
  }
}

/** Copy only the keys whose value was supplied. */
export function definedParams(values: Record<string, unknown>): UnityCommandParams {
  const params: UnityCommandParams = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== null) params[key] = value;
  }
  return params;
}
