import { describe, expect, test } from "vitest";
import { charWidth, clipToWidth, displayWidth, fitToWidth, takeWidth, toPrintable } from "../string-width";

describe("displayWidth", () => {
  test("counts ASCII one column per character", () => {
    expect(displayWidth("filter> ")).toBe(8);
  });

  test("counts CJK as two columns", () => {
    expect(displayWidth("日本")).toBe(4);
  });
});

describe("charWidth", () => {
  test("fullwidth forms and Hangul are wide, Latin and box drawing are not", () => {
    expect(charWidth("Ａ")).toBe(2);
    expect(charWidth("한")).toBe(2);
    expect(charWidth("é")).toBe(1);
    expect(charWidth("─")).toBe(1);
  });
});

describe("takeWidth", () => {
  test("never splits a wide character", () => {
    expect(takeWidth("日本語", 3)).toBe("日");
  });
});

describe("fitToWidth", () => {
  test("pads short strings with spaces", () => {
    expect(fitToWidth("abc", 6)).toBe("abc   ");
  });

  test("leaves exact fits alone", () => {
    expect(fitToWidth("abcdef", 6)).toBe("abcdef");
  });

  test("cuts long strings and ends with an ellipsis", () => {
    expect(fitToWidth("abcdefgh", 6)).toBe("abcde…");
  });

  test("keeps the result at full width after a wide character", () => {
    // "日本" takes 4 columns; a third wide char would overflow the 5 available
    expect(fitToWidth("日本語です", 6)).toBe("日本 …");
  });
});

describe("clipToWidth", () => {
  test("cuts without padding or ellipsis", () => {
    expect(clipToWidth("abcdef", 4)).toBe("abcd");
    expect(clipToWidth("ab", 4)).toBe("ab");
  });
});

describe("toPrintable", () => {
  test("expands tabs to the next multiple of eight columns", () => {
    expect(toPrintable("a\tb")).toBe("a       b");
    expect(toPrintable("\tx")).toBe("        x");
  });

  test("shows escape sequences and other control characters in caret notation", () => {
    expect(toPrintable("\x1b[31mred\x1b[0m")).toBe("^[[31mred^[[0m");
    expect(toPrintable("10%\r20%")).toBe("10%^M20%");
    expect(toPrintable("del\x7f")).toBe("del^?");
  });

  test("counts caret notation when placing the next tab stop", () => {
    expect(toPrintable("\x01\tz")).toBe("^A      z");
  });
});
