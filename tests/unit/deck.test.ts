import { describe, expect, it } from "vitest";

import {
  cardIcon,
  deckCards,
  deckDisplayName,
  deckTypes,
  isDeckType,
  isNumericCard,
  isValidCard,
  numericValue,
} from "../../src/domain/entities/Deck.js";

describe("Deck", () => {
  it("lists the fibonacci deck with its special cards trailing", () => {
    expect(deckCards("fibonacci")).toEqual([
      "0", "1", "2", "3", "5", "8", "13", "21", "34", "∞", "?", "coffee", "bug",
    ]);
  });

  it("lists the t-shirt deck", () => {
    expect(deckCards("tshirt")).toEqual([
      "XS", "S", "M", "L", "XL", "XXL", "∞", "?", "coffee", "bug",
    ]);
  });

  it("validates cards against the deck they belong to", () => {
    expect(isValidCard("fibonacci", "13")).toBe(true);
    expect(isValidCard("fibonacci", "M")).toBe(false);
    expect(isValidCard("tshirt", "5")).toBe(false);
    expect(isValidCard("tshirt", "?")).toBe(true);
    expect(isValidCard("fibonacci", "4")).toBe(false);
  });

  it("assigns numeric values to fibonacci numbers only", () => {
    expect(numericValue("0")).toBe(0);
    expect(numericValue("34")).toBe(34);
    expect(numericValue("?")).toBeUndefined();
    expect(numericValue("XL")).toBeUndefined();
    expect(isNumericCard("8")).toBe(true);
    expect(isNumericCard("∞")).toBe(false);
  });

  it("maps special cards to icons", () => {
    expect(cardIcon("∞")).toBe("infinity");
    expect(cardIcon("?")).toBe("question-mark-circle");
    expect(cardIcon("coffee")).toBe("pause-circle");
    expect(cardIcon("bug")).toBe("bug-ant");
    expect(cardIcon("5")).toBeUndefined();
  });

  it("knows the supported deck types", () => {
    expect(deckTypes()).toEqual(["fibonacci", "tshirt"]);
    expect(isDeckType("tshirt")).toBe(true);
    expect(isDeckType("planets")).toBe(false);
    expect(isDeckType(undefined)).toBe(false);
    expect(deckDisplayName("fibonacci")).toBe("Fibonacci");
    expect(deckDisplayName("tshirt")).toBe("T-Shirt Sizes");
  });
});
