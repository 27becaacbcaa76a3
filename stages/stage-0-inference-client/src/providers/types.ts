import type {
  ProviderName,
  ProviderRequest,
  ProviderResult,
} from "../types.js";

export interface LLMProvider {
  name: ProviderName;
  chat(request: ProviderRequest): Promise<ProviderResult>;
}

export function generateCallId(): string {
  return `call_${crypto.randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

/** The provider's id, unless it is missing, empty or already used in this response. */
export function uniqueCallId(
  id: string | undefined,
  seen: Set<string>
): string {
  const callId = id && !seen.has(id) ? id : generateCallId();
  seen.add(callId);
  return callId;
}

/**
 * Read an error body once and pull out `error.message` / `error.code` when
 * the body is JSON; otherwise use the text itself.
 */
export async function parseErrorMessage(
  response: Response
): Promise<{ message: string; code?: string }> {
  const text = await response.text();
  const fallback = text || `Request failed with status ${response.status}`;
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return { message: fallback };
  }
  if (payload && typeof payload === "object" && "error" in payload) {
    const error = payload.error;
    if (error && typeof error === "object") {
      const message =
        "message" in error && typeof error.message === "string"
          ? error.message
          : fallback;
      const rawCode =
        ("code" in error ? error.code : undefined) ??
        ("status" in error ? error.status : undefined) ??
        ("type" in error ? error.type : undefined);
      const code =
        typeof rawCode === "string" || typeof rawCode === "number"
          ? String(rawCode)
          : undefined;
      return { message, code };
    }
  }
  return { message: fallback };
}
