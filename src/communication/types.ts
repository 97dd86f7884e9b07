/** JSON object returned by the Unity Editor for a single command. */
export type UnityResponse = Record<string, unknown>;

export type UnityCommandParams = Record<string, unknown>;

/**
 * The one call every tool makes against the Unity Editor: a named command
 * plus a parameter mapping, answered by a single response.
 */
export interface UnityCommandSender {
  sendCommand(
    command: string,
    params: UnityCommandParams,
    timeoutMs?: number
  ): Promise<UnityResponse>;
}

export type UnityCommandFailure = "not_connected" | "timeout" | "disconnected";

export class UnityCommandError extends Error {
  public readonly reason: UnityCommandFailure;
  public readonly command: string;

  constructor(message: string, reason: UnityCommandFailure, command: string) {
    super(message);
    this.name = "UnityCommandError";
    this.reason = reason;
    this.command = command;
  }
}

export interface UnityHello {
  unityVersion?: string;
  platform?: string;
}
