const FENCE_PATTERN = /```[\w+-]*[ \t]*\r?\n([\s\S]*?)```/;

/**
 * Returns the body of the first markdown code fence in `text`, or the trimmed
 * text itself when it contains no complete fence.
 */
export function stripCodeFence(text: string): string {
  const match = FENCE_PATTERN.exec(text);
  return (match ? match[1] : text).trim();
}

function sliceAndParse(
  text: string,
  open: string,
  close: string,
  kind: string,
  context?: string,
): unknown {
  const first = text.indexOf(open);
  const last = text.lastIndexOf(close);

  if (first === -1 || last === -1 || last <= first) {
    const contextStr = context ? ` in ${context} response` : '';
    throw new Error(`No JSON ${kind} found${contextStr}.`);
  }

  const jsonText = text.slice(first, last + 1);

  try {
    const value: unknown = JSON.parse(jsonText);
    return value;
  } catch (e) {
    const contextStr = context ? ` from ${context} response` : '';
    throw new Error(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}

/**
 * Extracts a JSON object from text that may contain other content.
 * Finds the first '{' and last '}' and parses the content between them.
 *
 * @param context - Optional context for error messages (e.g., 'reviewer')
 * @throws Error if no valid JSON object is found
 */
export function extractJsonObject(text: string, context?: string): unknown {
  return sliceAndParse(text, '{', '}', 'object', context);
}

/**
 * Extracts a JSON array from text that may contain other content.
 * Finds the first '[' and last ']' and parses the content between them.
 *
 * @throws Error if no valid JSON array is found
 */
export function extractJsonArray(text: string, context?: string): unknown {
  return sliceAndParse(text, '[', ']', 'array', context);
}
