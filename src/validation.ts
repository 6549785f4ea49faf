export type ExtractResult = { ok: true; message: string } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extractMessage(rawBody: string): ExtractResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: "request body is not a JSON object" };
  }
  if (!("data" in parsed)) {
    return { ok: false, reason: "request body has no data field" };
  }
  const { data } = parsed;
  if (typeof data !== "string") {
    return { ok: false, reason: `data field must be a string, got ${data === null ? "null" : typeof data}` };
  }
  return { ok: true, message: data };
}
