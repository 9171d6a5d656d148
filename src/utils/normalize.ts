import { EmptyResponseError, ParseError } from "../errors";
import { JsonValue } from "../types";

const FENCE = "```";

// Drops the opening fence line and cuts at the last closing fence (commentary may follow it)
export function stripCodeFence(text: string): string {
  const raw = text.trim();
  if (!raw.startsWith(FENCE)) return raw;

  const newlineIdx = raw.indexOf("\n");
  if (newlineIdx === -1) return raw;

  let trimmed = raw.slice(newlineIdx + 1);
  const closingIdx = trimmed.lastIndexOf(FENCE);
  if (closingIdx !== -1) {
    trimmed = trimmed.slice(0, closingIdx);
  }
  return trimmed.trim();
}

function controlEscape(ch: string): string {
  switch (ch) {
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    case "\b":
      return "\\b";
    case "\f":
      return "\\f";
    default:
      return `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
  }
}

// Escapes raw U+0000..U+001F inside string literals only
export function escapeControlCharacters(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      } else if (ch < " ") {
        out += controlEscape(ch);
        continue;
      }
    } else if (ch === '"') {
      inString = true;
    }
    out += ch;
  }
  return out;
}

function parseStrict(candidate: string): JsonValue | undefined {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

function parseLenient(candidate: string): JsonValue | undefined {
  return parseStrict(escapeControlCharacters(candidate));
}

// Longest candidate first, from the first [ or {; strict parse, then lenient
export function extractJson(text: string): JsonValue | undefined {
  const start = text.search(/[[{]/);
  if (start === -1) return undefined;

  for (let end = text.length; end > start; end--) {
    // an array or object can only end on a closing bracket
    const last = text[end - 1];
    if (last !== "]" && last !== "}") continue;

    const candidate = text.slice(start, end);
    const parsed = parseStrict(candidate) ?? parseLenient(candidate);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

// Returns the parsed value as-is; throws ParseError (EmptyResponseError for blank text)
export function normalizeIdeas(rawText: string): JsonValue {
  if (!rawText.trim()) {
    throw new EmptyResponseError(rawText);
  }

  const text = stripCodeFence(rawText);

  const direct = parseStrict(text);
  if (direct !== undefined && direct !== null) return direct;

  const recovered = extractJson(text);
  if (recovered !== undefined) return recovered;

  throw new ParseError(text);
}
