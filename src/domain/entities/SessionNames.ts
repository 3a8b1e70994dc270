import { readFileSync } from "node:fs";

interface NameLists {
  readonly adjectives: readonly string[];
  readonly nouns: readonly string[];
}

export type RandomSource = () => number;

const NAMES_FILE = new URL("../../../data/names.json", import.meta.url);

let cachedLists: NameLists | undefined;

function loadNameLists(): NameLists {
  if (cachedLists) return cachedLists;

  const parsed: unknown = JSON.parse(readFileSync(NAMES_FILE, "utf8"));
  if (!isNameLists(parsed)) {
    throw new Error(`Malformed name lists in ${NAMES_FILE.pathname}`);
  }
  cachedLists = parsed;
  return parsed;
}

function isNameLists(value: unknown): value is NameLists {
  if (typeof value !== "object" || value === null) return false;
  if (!("adjectives" in value) || !("nouns" in value)) return false;
  return isNonEmptyStringArray(value.adjectives) && isNonEmptyStringArray(value.nouns);
}

function isNonEmptyStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((entry) => typeof entry === "string")
  );
}

/** Small deterministic PRNG; tests seed it to get stable names. */
export function mulberry32(seed: number): RandomSource {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick(words: readonly string[], rng: RandomSource): string {
  const index = Math.min(words.length - 1, Math.floor(rng() * words.length));
  return words[index] ?? "";
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** "Swift Falcon 42": used when a session is created without a name. */
export function generateSessionName(rng: RandomSource = Math.random): string {
  const { adjectives, nouns } = loadNameLists();
  const adjective = capitalize(pick(adjectives, rng));
  const noun = capitalize(pick(nouns, rng));
  const number = Math.floor(rng() * 99) + 1;
  return `${adjective} ${noun} ${number}`;
}

/** "Clever Otter": used when a participant joins with a blank name. */
export function generatePlayerName(rng: RandomSource = Math.random): string {
  const { adjectives, nouns } = loadNameLists();
  return `${capitalize(pick(adjectives, rng))} ${capitalize(pick(nouns, rng))}`;
}
