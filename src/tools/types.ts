export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export function textResponse(text: string, isError = false): ToolResponse {
  return isError
    ? { content: [{ type: "text" as const, text }], isError: true }
    : { content: [{ type: "text" as const, text }] };
}
