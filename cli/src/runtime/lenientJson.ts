const NON_FINITE_TOKENS: ReadonlyArray<readonly [string, number]> = [
  ["-Infinity", Number.NEGATIVE_INFINITY],
  ["Infinity", Number.POSITIVE_INFINITY],
  ["NaN", Number.NaN]
];

const MARKER = "\u0000non-finite:";

/**
 * JSON.parse that also accepts bare NaN, Infinity and -Infinity literals, as
 * written by encoders that do not enforce strict JSON. They decode to the
 * matching non-finite numbers.
 */
export function parseLenientJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const rewritten = markNonFiniteTokens(text);
    if (rewritten === text) {
      throw error;
    }
    return JSON.parse(rewritten, (_key, value: unknown) => {
      if (typeof value !== "string" || !value.startsWith(MARKER)) {
        return value;
      }
      const token = value.slice(MARKER.length);
      return NON_FINITE_TOKENS.find(([literal]) => literal === token)?.[1] ?? value;
    });
  }
}

function markNonFiniteTokens(text: string): string {
  let output = "";
  let inString = false;
  let i = 0;
  while (i < text.length) {
    const char = text[i];
    if (inString) {
      output += char;
      if (char === "\\") {
        output += text[i + 1] ?? "";
        i += 2;
        continue;
      }
      if (char === '"') {
        inString = false;
      }
      i += 1;
      continue;
    }
    if (char === '"') {
      inString = true;
      output += char;
      i += 1;
      continue;
    }
    const token = NON_FINITE_TOKENS.find(([literal]) => text.startsWith(literal, i));
    if (token && !/[A-Za-z0-9_]/.test(text[i - 1] ?? "")) {
      output += JSON.stringify(MARKER + token[0]);
      i += token[0].length;
      continue;
    }
    output += char;
    i += 1;
  }
  return output;
}
