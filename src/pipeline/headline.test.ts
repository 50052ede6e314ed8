import { describe, it, expect } from "vitest";
import { htmlToText, normalizeTitle, trimHeadline } from "./headline";

describe("normalizeTitle", () => {
  it("should leave a plain title alone", () => {
    expect(normalizeTitle("Kernel 7.1 released")).toBe("Kernel 7.1 released");
  });

  it("should decode entities and strip markup", () => {
    expect(normalizeTitle("Tom &amp; Jerry <b>return</b>")).toBe(
      "Tom & Jerry return",
    );
  });

  it("should collapse whitespace and newlines", () => {
    expect(normalizeTitle("  Two\nlines   of\ttext ")).toBe("Two lines of text");
  });

  it("should render emphasis with sans-serif italic letters", () => {
    // W, o, r, l, d in MATHEMATICAL SANS-SERIF ITALIC
    const world = String.fromCodePoint(0x1d61e, 0x1d630, 0x1d633, 0x1d62d, 0x1d625);
    expect(normalizeTitle("Hello <em>World</em>")).toBe(`Hello ${world}`);
  });

  it("should render strong text with sans-serif bold letters and keep punctuation", () => {
    // Q and A in MATHEMATICAL SANS-SERIF BOLD
    const qa = `${String.fromCodePoint(0x1d5e4)}&${String.fromCodePoint(0x1d5d4)}`;
    expect(normalizeTitle("<strong>Q&amp;A</strong> session")).toBe(`${qa} session`);
  });

  it("should render sub and superscript digits", () => {
    expect(normalizeTitle("H<sub>2</sub>O and E = mc<sup>2</sup>")).toBe(
      "H₂O and E = mc²",
    );
  });

  it("should drop a trailing site name after a pipe", () => {
    expect(normalizeTitle("Rust 1.80 released | The Rust Blog")).toBe(
      "Rust 1.80 released",
    );
  });

  it("should unwrap Pluralistic titles", () => {
    expect(normalizeTitle("Pluralistic: Some essay title (12 Mar 2026)")).toBe(
      "Some essay title",
    );
  });

  it("should return an empty string for markup-only titles", () => {
    expect(normalizeTitle("<br/>  ")).toBe("");
  });
});

describe("trimHeadline", () => {
  it("should return headlines within the limit unchanged", () => {
    const exact = "a".repeat(200);
    expect(trimHeadline(exact)).toBe(exact);
  });

  it("should cut back to the last whole word and add an ellipsis", () => {
    const headline = Array(50).fill("word").join(" ");

    const result = trimHeadline(headline);

    expect(result).toBe(`${Array(39).fill("word").join(" ")}...`);
    expect(Buffer.byteLength(result, "utf8")).toBe(197);
  });

  it("should count UTF-8 bytes rather than characters", () => {
    const headline = "é".repeat(150);

    const result = trimHeadline(headline);

    expect(result).toBe(`${"é".repeat(98)}...`);
    expect(Buffer.byteLength(result, "utf8")).toBeLessThanOrEqual(200);
  });

  it("should honour a custom byte limit", () => {
    expect(trimHeadline("alpha beta gamma delta", 15)).toBe("alpha beta...");
  });
});

describe("htmlToText", () => {
  it("should return the text content of a fragment", () => {
    expect(htmlToText("<p>One <i>two</i> &lt;three&gt;</p>")).toBe("One two <three>");
  });
});
