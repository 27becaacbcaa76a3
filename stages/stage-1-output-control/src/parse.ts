/**
 * Extract JSON from raw LLM content (handles markdown code blocks and
 * prose before or after the JSON value).
 */

export type ExtractResult =
  | { found: true; json: string }
  | { found: false; reason: string };

const CODE_BLOCK_REGEX = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;

/**
 * Index of the bracket closing the one at `startIndex`, or -1.
 * Brackets inside string literals do not count.
 */
function findMatchingBracketEnd(text: string, startIndex: number): number {
  const open = text[startIndex];
  const close = open === "{" ? "}" : "]";
  let depth = 0;
  let inString = false;

  for (let i = startIndex; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (c === "\\") {
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }
    if (c === '"') {
      inString = true;
    } else if (c === open) {
      depth++;
    } else if (c === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function stripMarkdownCodeBlock(content: string): string {
  const trimmed = content.trim();
  const match = CODE_BLOCK_REGEX.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

function parses(json: string): boolean {
  try {
    JSON.parse(json);
    return true;
  } catch {
    return false;
  }
}

/**
 * First bracketed span that parses as JSON. Bracketed prose such as
 * "[1-5 scale]" is skipped; when nothing parses, the first balanced span
 * is returned so the caller can report the parse error.
 */
function extractFirstJson(text: string): ExtractResult {
  let firstBalanced: string | undefined;
  let sawBracket = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c !== "{" && c !== "[") {
      continue;
    }
    sawBracket = true;
    const endIndex = findMatchingBracketEnd(text, i);
    if (endIndex < 0) {
      continue;
    }
    const candidate = text.slice(i, endIndex + 1);
    if (parses(candidate)) {
      return { found: true, json: candidate };
    }
    if (firstBalanced === undefined) {
      firstBalanced = candidate;
    }
  }

  if (firstBalanced !== undefined) {
    return { found: true, json: firstBalanced };
  }
  return sawBracket
    ? { found: false, reason: "Unclosed JSON bracket" }
    : { found: false, reason: "No JSON object or array found in content" };
}

export function extractJson(
  content: string,
  stripMarkdown: boolean = true
): ExtractResult {
  const text = stripMarkdown ? stripMarkdownCodeBlock(content) : content.trim();
  if (!text) {
    return { found: false, reason: "Empty content after strip" };
  }
  return extractFirstJson(text);
}
