import { randomUUID } from "crypto";

export const SESSION_HEADER = "X-Session-Id";

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Error bodies are always `{ detail }`
 */
export function errorResponse(status: number, detail: string): Response {
  return jsonResponse({ detail }, status);
}

export function resolveSessionId(request: Request): string {
  const header = request.headers.get(SESSION_HEADER)?.trim();
  return header ? header : randomUUID();
}

/**
 * Read a multipart upload and pick the audio part (`audio`, or `file`).
 * Returns null when the body is not multipart form data.
 */
export async function readAudioUpload(
  request: Request
): Promise<{ audio: Blob | null; filename: string; form: FormData } | null> {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    return null;
  }

  const part = form.get("audio") ?? form.get("file");
  if (part === null || typeof part === "string") {
    return { audio: null, filename: "audio.webm", form };
  }
  return { audio: part, filename: part.name || "audio.webm", form };
}
