import { vi } from "vitest";
import { UnityCommandParams, UnityResponse } from "./communication/types.js";

export type CommandHandler = (command: string, params: UnityCommandParams) => UnityResponse;

/** A stand-in for the Unity Editor link that answers from `handler`. */
export function createMockUnityConnection(handler: CommandHandler = () => ({ success: true })) {
  return {
    sendCommand: vi.fn(
      async (command: string, params: UnityCommandParams, _timeoutMs?: number): Promise<UnityResponse> =>
        handler(command, params)
    ),
  };
}

export type MockUnityConnection = ReturnType<typeof createMockUnityConnection>;

export function commandNames(mock: MockUnityConnection): string[] {
  return mock.sendCommand.mock.calls.map(([command]) => command);
}
