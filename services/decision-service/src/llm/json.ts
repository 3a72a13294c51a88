function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pulls a JSON object out of model output that may carry markdown fences or
 * surrounding prose. Returns undefined when nothing parses.
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const candidates = [text.trim()];

  const unfenced = text.replace(/```json\s*/gi, "").replace(/```\s*/g, "").trim();
  candidates.push(unfenced);

  const braces = unfenced.match(/\{[\s\S]*\}/);
  if (braces) {
    candidates.push(braces[0]);
  }

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  }
  return undefined;
}
