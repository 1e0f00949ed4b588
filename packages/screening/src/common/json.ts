/**
 * Parse a JSON document produced by the model. Models occasionally wrap the document in a Markdown code fence
 * even when the JSON response format is requested, so the fence is removed first.
 * @throws SyntaxError when the text is not valid JSON
 */
export function parseJsonResponse(text: string): unknown {
  let cleaned = text.trim();
  const fenced = cleaned.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced != null) {
    cleaned = fenced[1];
  }
  return JSON.parse(cleaned);
}

export function isBlank(value: string | null | undefined): boolean {
  return value == null || value.trim().length === 0;
}
