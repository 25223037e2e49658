export interface ConsumedJsonLines {
  messages: unknown[];
  /** Trailing text after the last newline, to be prefixed to the next chunk. */
  remainder: string;
}

/**
 * Splits newline-delimited JSON. Blank lines are skipped and lines that do not
 * decode are dropped; neither affects the lines around them.
 */
export function consumeJsonLines(text: string): ConsumedJsonLines {
  const lines = text.split('\n');
  const remainder = lines.pop() ?? '';
  const messages: unknown[] = [];

  for (const raw of lines) {
    const line = raw.trim();
    if (line.length === 0) continue;
    try {
      messages.push(JSON.parse(line));
    } catch {
      continue;
    }
  }

  return { messages, remainder };
}
