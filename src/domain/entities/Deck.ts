import type { Card, DeckType } from "../typedefs.js";

const DECK_CARDS: Readonly<Record<DeckType, readonly Card[]>> = {
  fibonacci: ["0", "1", "2", "3", "5", "8", "13", "21", "34", "∞", "?", "coffee", "bug"],
  tshirt: ["XS", "S", "M", "L", "XL", "XXL", "∞", "?", "coffee", "bug"],
};

const DECK_DISPLAY_NAMES: Readonly<Record<DeckType, string>> = {
  fibonacci: "Fibonacci",
  tshirt: "T-Shirt Sizes",
};

const NUMERIC_VALUES: ReadonlyMap<Card, number> = new Map([
  ["0", 0],
  ["1", 1],
  ["2", 2],
  ["3", 3],
  ["5", 5],
  ["8", 8],
  ["13", 13],
  ["21", 21],
  ["34", 34],
]);

/** Icon keys of the special cards: unbounded, unsure, needs a break, blocker */
export type CardIcon = "infinity" | "question-mark-circle" | "pause-circle" | "bug-ant";

const CARD_ICONS: ReadonlyMap<Card, CardIcon> = new Map([
  ["∞", "infinity"],
  ["?", "question-mark-circle"],
  ["coffee", "pause-circle"],
  ["bug", "bug-ant"],
]);

export function deckTypes(): readonly DeckType[] {
  return ["fibonacci", "tshirt"];
}

export function isDeckType(value: unknown): value is DeckType {
  return value === "fibonacci" || value === "tshirt";
}

export function deckCards(deckType: DeckType): readonly Card[] {
  return DECK_CARDS[deckType];
}

export function isValidCard(deckType: DeckType, card: Card): boolean {
  return DECK_CARDS[deckType].includes(card);
}

/**
 * Numeric value of a card for averaging, or `undefined` for special cards and
 * relative sizes.
 */
export function numericValue(card: Card): number | undefined {
  return NUMERIC_VALUES.get(card);
}

export function isNumericCard(card: Card): boolean {
  return NUMERIC_VALUES.has(card);
}

export function deckDisplayName(deckType: DeckType): string {
  return DECK_DISPLAY_NAMES[deckType];
}

export function cardIcon(card: Card): CardIcon | undefined {
  return CARD_ICONS.get(card);
}
