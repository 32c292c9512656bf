/**
 * Yields every balanced JSON array or object embedded in model output, in order of
 * where it starts. Nested values are yielded after their parent.
 */
export function* jsonCandidates(raw: string): Generator<unknown> {
  for (let start = 0; start < raw.length; start++) {
    const open = raw[start];
    if (open !== "{" && open !== "[") {
      continue;
    }
    const end = findClosingBracket(raw, start);
    if (end === -1) {
      continue;
    }
    const parsed = tryParseJson(raw.slice(start, end + 1));
    if (parsed.ok) {
      yield parsed.value;
    }
  }
}

function findClosingBracket(text: string, start: number): number {
  const expected: string[] = [];
  let inString = false;
  for (let idx = start; idx < text.length; idx++) {
    const char = text[idx];
    if (inString) {
      if (char === "\\") {
        idx++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      expected.push("}");
    } else if (char === "[") {
      expected.push("]");
    } else if (char === "}" || char === "]") {
      if (expected.pop() !== char) {
        return -1;
      }
      if (!expected.length) {
        return idx;
      }
    }
  }
  return -1;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}
