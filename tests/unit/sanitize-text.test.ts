import { formatApiDate, sanitizeCount, sanitizeText } from "../../src/core/records/sanitizeText";

describe("sanitizeText", () => {
  it.each([
    ["Hello 👋 world", "Hello world"],
    ["🚀🚀 launch", "launch"],
    ["family 👨‍👩‍👧 trip", "family trip"],
    ["thumbs 👍🏽 up", "thumbs up"],
    ["flag 🇧🇷 here", "flag here"],
    ["keycap 1️⃣ one", "keycap 1 one"],
    ["heart ❤️ love", "heart love"],
    ["line one\nline two\r\n\tend", "line one line two end"],
    ["bell\u0007 and nul\u0000 chars", "bell and nul chars"],
    ["zero\u200Bwidth", "zerowidth"],
    ["  padded   value  ", "padded value"],
    ["São Paulo – Ação", "São Paulo – Ação"],
    ["東京の開発者", "東京の開発者"]
  ])("cleans %j", (input, expected) => {
    expect(sanitizeText(input)).toBe(expected);
  });

  it("renders scalars and blanks everything else", () => {
    expect(sanitizeText(null)).toBe("");
    expect(sanitizeText(undefined)).toBe("");
    expect(sanitizeText(42)).toBe("42");
    expect(sanitizeText(Number.NaN)).toBe("");
    expect(sanitizeText(false)).toBe("false");
    expect(sanitizeText({ nested: true })).toBe("");
  });

  it("never returns pictographs or a string longer than the input", () => {
    const inputs = ["🎉 party 🎉", "a\u200D\uFE0Fb", "plain", "  ", "tab\there", "mixed 🔥 text\n"];
    for (const input of inputs) {
      const output = sanitizeText(input);
      expect(output.length).toBeLessThanOrEqual(input.length);
      expect(/\p{Extended_Pictographic}/u.test(output)).toBe(false);
    }
  });
});

describe("sanitizeCount", () => {
  it("renders finite numbers in decimal and blanks the rest", () => {
    expect(sanitizeCount(1500)).toBe("1500");
    expect(sanitizeCount(0)).toBe("0");
    expect(sanitizeCount("12")).toBe("");
    expect(sanitizeCount(null)).toBe("");
    expect(sanitizeCount(Number.POSITIVE_INFINITY)).toBe("");
  });
});

describe("formatApiDate", () => {
  it("renders ISO timestamps as DD/MM/YYYY in UTC", () => {
    expect(formatApiDate("2011-01-25T18:44:36Z")).toBe("25/01/2011");
    expect(formatApiDate("2020-12-31T23:59:59Z")).toBe("31/12/2020");
  });

  it("keeps values that are not ISO timestamps", () => {
    expect(formatApiDate("yesterday")).toBe("yesterday");
    expect(formatApiDate("2020-13-45T00:00:00Z")).toBe("2020-13-45T00:00:00Z");
    expect(formatApiDate(null)).toBe("");
  });
});
