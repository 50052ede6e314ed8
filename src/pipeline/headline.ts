// pattern: Functional Core
import * as cheerio from "cheerio";

type StyledTag = "em" | "strong" | "sub" | "sup";

// Unicode mathematical sans-serif italic and bold letters.
const LETTER_BASES: Record<"em" | "strong", { lower: number; upper: number }> = {
  em: { lower: 0x1d622, upper: 0x1d608 },
  strong: { lower: 0x1d5ee, upper: 0x1d5d4 },
};

const DIGITS: Record<"sub" | "sup", string> = {
  sub: "₀₁₂₃₄₅₆₇₈₉",
  sup: "⁰¹²³⁴⁵⁶⁷⁸⁹",
};

const STYLED_TAG_RE = /<(em|strong|sub|sup)>(.*?)<\/\1>/gis;
const PLURALISTIC_RE = /^Pluralistic: +(.*?) +\(\d+ \w+ \d+\)$/;

export const MAX_HEADLINE_BYTES = 200;

function isStyledTag(tag: string): tag is StyledTag {
  return tag === "em" || tag === "strong" || tag === "sub" || tag === "sup";
}

function styleChar(char: string, tag: StyledTag): string {
  if (tag === "em" || tag === "strong") {
    const bases = LETTER_BASES[tag];
    if (char >= "a" && char <= "z") {
      return String.fromCodePoint(bases.lower + char.charCodeAt(0) - 97);
    }
    if (char >= "A" && char <= "Z") {
      return String.fromCodePoint(bases.upper + char.charCodeAt(0) - 65);
    }
    return char;
  }

  if (char >= "0" && char <= "9") {
    return DIGITS[tag].charAt(char.charCodeAt(0) - 48);
  }
  return char;
}

/** Plain text of an HTML fragment: tags dropped, entities decoded. */
export function htmlToText(html: string): string {
  return cheerio.load(html, null, false).root().text();
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;");
}

/**
 * Turns a raw feed title into the headline that gets posted: inline
 * emphasis and sub/superscript rendered with Unicode look-alikes, remaining
 * markup removed, entities decoded, ` | Site Name` suffixes and the
 * Pluralistic date wrapper dropped, whitespace collapsed.
 */
export function normalizeTitle(raw: string): string {
  let text = raw.replace(/\n/g, " ");

  text = text.replace(STYLED_TAG_RE, (match, tag: string, inner: string) => {
    const lowered = tag.toLowerCase();
    if (!isStyledTag(lowered)) return match;
    const styled = Array.from(htmlToText(inner), (c) => styleChar(c, lowered)).join("");
    return escapeHtml(styled);
  });

  text = htmlToText(text);
  text = text.replace(/ *\|.*/s, "");
  text = text.replace(/\s+/g, " ").trim();
  text = text.replace(PLURALISTIC_RE, "$1");

  return text;
}

/**
 * Shortens a headline to at most `maxBytes` UTF-8 bytes, cutting back to the
 * last whole word and appending "...".
 */
export function trimHeadline(
  headline: string,
  maxBytes: number = MAX_HEADLINE_BYTES,
): string {
  if (Buffer.byteLength(headline, "utf8") <= maxBytes) return headline;

  let trimmed = "";
  let byteCount = 0;
  for (const char of headline) {
    const charBytes = Buffer.byteLength(char, "utf8");
    if (byteCount + charBytes > maxBytes - 3) break;
    trimmed += char;
    byteCount += charBytes;
  }

  const lastSpace = trimmed.trimEnd().search(/\s\S*$/);
  const wholeWords = lastSpace > 0 ? trimmed.slice(0, lastSpace).trimEnd() : trimmed.trimEnd();

  return `${wholeWords}...`;
}
