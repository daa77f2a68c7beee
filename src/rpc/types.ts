/**
 * Wire types of the snippet server protocol: newline-delimited JSON over TCP
 */

export interface SnippetHandshakeRequest {
  cmd: "initiate";
  uid: number;
}

export interface SnippetHandshakeResponse {
  status: boolean;
  uid: number;
}

export interface SnippetRequest {
  id: number;
  method: string;
  params: unknown[];
}

export interface SnippetResponse {
  id: number;
  result?: unknown;
  error?: string | null;
  callback?: string | null;
}

export function isSnippetResponse(value: unknown): value is SnippetResponse {
  return typeof value === "object" && value !== null && "id" in value && typeof value.id === "number";
}

export function isHandshakeResponse(value: unknown): value is SnippetHandshakeResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    typeof value.status === "boolean" &&
    "uid" in value &&
    typeof value.uid === "number"
  );
}
