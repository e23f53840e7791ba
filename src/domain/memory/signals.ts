/**
 * Rule-based extraction of durable skincare attributes from a message.
 *
 * Understands Persian and English phrasing. Text is normalized first:
 * Persian/Arabic-Indic digits become ASCII, Arabic ي/ك become ی/ک, the
 * zero-width non-joiner becomes a space, and everything is lower-cased.
 */
import lexicon from "@config/skinSignals.json";
import { FACT_KEYS } from "@domain/memory/types";

type TermTable = Record<string, string[]>;

const SKIN_MARKERS: readonly string[] = lexicon.skinMarkers;
const SKIN_TYPES: TermTable = lexicon.skinTypes;
const CONCERNS: TermTable = lexicon.concerns;

const MIN_AGE = 10;
const MAX_AGE = 99;

export function normalizeText(text: string): string {
  return text
    .replace(/[۰-۹]/g, (d) => String(d.charCodeAt(0) - 0x06f0))
    .replace(/[٠-٩]/g, (d) => String(d.charCodeAt(0) - 0x0660))
    .replace(/ي/g, "ی")
    .replace(/ك/g, "ک")
    .replace(/\u200c/g, " ")
    .toLowerCase();
}

export function tokenize(normalized: string): string[] {
  return normalized
    .split(/[\s.,;:!?؟،؛()"'«»\-_/]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Single words match the start of a token (so inflected forms like "پوستم" or
 * "pimples" count); multi-word terms match as a phrase.
 */
function findTerm(normalized: string, tokens: readonly string[], term: string): number {
  const needle = normalizeText(term);

  if (needle.includes(" ")) {
    return normalized.indexOf(needle);
  }

  let offset = 0;
  for (const token of tokens) {
    const at = normalized.indexOf(token, offset);
    offset = at + token.length;
    if (token.startsWith(needle)) {
      return at;
    }
  }
  return -1;
}

function firstPosition(normalized: string, tokens: readonly string[], terms: readonly string[]): number {
  let best = -1;
  for (const term of terms) {
    const at = findTerm(normalized, tokens, term);
    if (at >= 0 && (best < 0 || at < best)) {
      best = at;
    }
  }
  return best;
}

function detectSkinType(normalized: string, tokens: readonly string[]): string | null {
  if (firstPosition(normalized, tokens, SKIN_MARKERS) < 0) {
    return null;
  }

  const found: { type: string; at: number }[] = [];
  for (const [type, terms] of Object.entries(SKIN_TYPES)) {
    const at = firstPosition(normalized, tokens, terms);
    if (at >= 0) {
      found.push({ type, at });
    }
  }

  if (found.length === 0) {
    return null;
  }

  const types = new Set(found.map((f) => f.type));
  if (types.has("oily") && types.has("dry")) {
    return "combination";
  }

  found.sort((a, b) => a.at - b.at);
  return found[0]?.type ?? null;
}

function detectConcerns(normalized: string, tokens: readonly string[]): string[] {
  return Object.entries(CONCERNS)
    .filter(([, terms]) => firstPosition(normalized, tokens, terms) >= 0)
    .map(([concern]) => concern);
}

const AGE_PATTERNS: readonly RegExp[] = [
  /\b(\d{1,2})\s*(?:years?\s*old|yrs?\s*old|y\/o)\b/,
  /\b(?:i am|i'm|im|age)\s*(?:is\s*)?(\d{1,2})\b/,
  /(\d{1,2})\s*سال/,
  /سن(?:م)?\s*(\d{1,2})/,
];

function detectAge(normalized: string): number | null {
  for (const pattern of AGE_PATTERNS) {
    const match = normalized.match(pattern);
    const value = match?.[1] ? Number(match[1]) : NaN;
    if (Number.isInteger(value) && value >= MIN_AGE && value <= MAX_AGE) {
      return value;
    }
  }
  return null;
}

/**
 * Facts stated in `text`, keyed by fact name. Empty when nothing is detected.
 */
export function extractFacts(text: string): Record<string, string> {
  const normalized = normalizeText(text);
  const tokens = tokenize(normalized);
  const facts: Record<string, string> = {};

  const skinType = detectSkinType(normalized, tokens);
  if (skinType) {
    facts[FACT_KEYS.skinType] = skinType;
  }

  for (const concern of detectConcerns(normalized, tokens)) {
    facts[`${FACT_KEYS.concernPrefix}${concern}`] = "mentioned";
  }

  const age = detectAge(normalized);
  if (age !== null) {
    facts[FACT_KEYS.age] = String(age);
  }

  return facts;
}
