/**
 * Name normalization for cross-source matching.
 *
 * Providers disagree on case, accents, punctuation and generational suffixes
 * ("Luka Dončić" / "Luka Doncic", "P.J. Tucker" / "PJ Tucker",
 * "Tim Hardaway Jr." / "Tim Hardaway Jr"). Everything here is pure.
 */

export type NameSuffix = "jr" | "sr" | "ii" | "iii" | "iv" | "v";

const SUFFIXES: ReadonlySet<string> = new Set<NameSuffix>(["jr", "sr", "ii", "iii", "iv", "v"]);

// Letters NFD does not decompose into base + combining mark
const TRANSLITERATIONS: Record<string, string> = {
  "ø": "o",
  "æ": "ae",
  "œ": "oe",
  "ß": "ss",
  "đ": "d",
  "ł": "l",
  "ı": "i",
  "þ": "th",
};

export interface NormalizedName {
  /** Lowercased, accent-free, punctuation-free name without its suffix */
  normalized: string;
  suffix: NameSuffix | null;
  /** normalized + suffix; the form stored as an alias */
  key: string;
}

function isSuffix(token: string): token is NameSuffix {
  return SUFFIXES.has(token);
}

function foldText(raw: string): string {
  return raw
    .normalize("NFD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/[øæœßđłıþ]/g, (ch) => TRANSLITERATIONS[ch] ?? ch)
    .replace(/[.'’`]/g, "")
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Normalize a person name and pull off a trailing generational suffix.
 *
 * @example
 * normalizeName("Tim Hardaway Jr.") // { normalized: "tim hardaway", suffix: "jr", key: "tim hardaway jr" }
 */
export function normalizeName(raw: string): NormalizedName {
  const folded = foldText(raw ?? "");
  if (!folded) {
    return { normalized: "", suffix: null, key: "" };
  }

  const tokens = folded.split(" ");
  const last = tokens[tokens.length - 1];
  if (tokens.length > 1 && isSuffix(last)) {
    const normalized = tokens.slice(0, -1).join(" ");
    return { normalized, suffix: last, key: `${normalized} ${last}` };
  }

  return { normalized: folded, suffix: null, key: folded };
}

/** Narrow a stored suffix column back to a NameSuffix. */
export function asNameSuffix(value: string | null | undefined): NameSuffix | null {
  return value && isSuffix(value) ? value : null;
}

/** Team names: same folding, a leading "the" dropped, "&" spelled out. */
export function normalizeTeamName(raw: string): string {
  return foldText((raw ?? "").replace(/&/g, " and ")).replace(/^the /, "");
}

/**
 * Two suffixes conflict only when both are present and differ.
 * A missing suffix is compatible with anything.
 */
export function suffixesConflict(a: NameSuffix | null, b: NameSuffix | null): boolean {
  return a !== null && b !== null && a !== b;
}
