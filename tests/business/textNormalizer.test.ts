import { describe, it, expect } from "vitest";
import { createNormalizer, normalizeText } from "../../src/services/business/textNormalizer.js";

describe("normalizeText", () => {
  it("lower-cases, drops punctuation and collapses whitespace", () => {
    expect(normalizeText("Hello, World!  It's   GOOD.")).toBe("hello world its good");
  });

  it("folds compatibility characters and keeps accented letters", () => {
    expect(normalizeText("ＬＯＲＤ")).toBe("lord");
    expect(normalizeText("Café Noël")).toBe("café noël");
  });

  it("returns an empty string for punctuation only", () => {
    expect(normalizeText("... !!! --")).toBe("");
  });
});

describe("createNormalizer", () => {
  const normalize = createNormalizer({ stopwords: ["um", "uh"], collapseRepeats: true });

  it("removes stop-words and immediate repeats", () => {
    expect(normalize("The, um, the Lord uh be with you you")).toBe("the lord be with you");
  });

  it("keeps repeats when collapsing is off", () => {
    expect(createNormalizer({ stopwords: ["um"] })("the um the lord")).toBe("the the lord");
  });

  it("ignores stop-word entries that span several words", () => {
    expect(createNormalizer({ stopwords: ["you know"] })("you know")).toBe("you know");
  });

  it("makes texts differing only in fillers equal", () => {
    expect(normalize("Um, brothers and sisters, uh, today")).toBe(normalize("Brothers and sisters today"));
  });

  it("is idempotent", () => {
    const samples = [
      "The Gospel of the Lord.",
      "Um, the the Lord's  prayer, uh...",
      "Ｆｕｌｌｗｉｄｔｈ and café",
      "",
    ];
    for (const sample of samples) {
      const once = normalize(sample);
      expect(normalize(once)).toBe(once);
    }
  });
});
