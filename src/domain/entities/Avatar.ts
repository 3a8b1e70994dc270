import type { AvatarId } from "../typedefs.js";

/** Visual preset of a robot avatar */
export interface Avatar {
  readonly id: AvatarId;
  readonly name: string;
  readonly color: string;
  readonly eyes: string;
  readonly mouth: string;
  readonly sides: string;
  readonly top: string;
}

const AVATARS: readonly Avatar[] = [
  { id: 1, name: "Sunny", color: "ffb300", eyes: "happy", mouth: "smile01", sides: "antenna01", top: "bulb01" },
  { id: 2, name: "Ocean", color: "1e88e5", eyes: "eva", mouth: "square01", sides: "cables01", top: "radar" },
  { id: 3, name: "Forest", color: "43a047", eyes: "glow", mouth: "grill01", sides: "round", top: "horns" },
  { id: 4, name: "Sunset", color: "f4511e", eyes: "bulging", mouth: "bite", sides: "squareAssymetric", top: "antenna" },
  { id: 5, name: "Royal", color: "8e24aa", eyes: "hearts", mouth: "smile02", sides: "square", top: "pyramid" },
  { id: 6, name: "Steel", color: "546e7a", eyes: "robocop", mouth: "diagram", sides: "antenna02", top: "lights" },
  { id: 7, name: "Ruby", color: "e53935", eyes: "sensor", mouth: "grill02", sides: "cables02", top: "glowingBulb01" },
];

const AVATAR_BASE_URL = "https://api.dicebear.com/9.x/bottts/svg";

export function avatarIds(): readonly AvatarId[] {
  return AVATARS.map((avatar) => avatar.id);
}

export function allAvatars(): readonly Avatar[] {
  return AVATARS;
}

export function isAvatarId(value: unknown): value is AvatarId {
  return AVATARS.some((avatar) => avatar.id === value);
}

export function getAvatar(id: number): Avatar | undefined {
  return AVATARS.find((avatar) => avatar.id === id);
}

/** Dicebear URL rendering the preset, or `undefined` for an unknown id. */
export function avatarUrl(id: number): string | undefined {
  const avatar = getAvatar(id);
  if (!avatar) return undefined;

  const query = new URLSearchParams({
    baseColor: avatar.color,
    eyes: avatar.eyes,
    mouth: avatar.mouth,
    sides: avatar.sides,
    top: avatar.top,
  });
  return `${AVATAR_BASE_URL}?${query.toString()}`;
}
