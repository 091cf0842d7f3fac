/** Pulls the JSON payload out of a model answer: fenced block first, then the outermost braces. */
export function extractJson(text: string): string {
  const trimmed = text.trim();

  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(trimmed);
  if (fenced?.[1] !== undefined) return fenced[1].trim();

  const braced = /\{[\s\S]*\}/.exec(trimmed);
  if (braced) return braced[0];

  return trimmed;
}
