// src/lov/random.ts

/** "Choose one of N": returns an integer in [0, n). */
export type RandomSource = {
  choose: (n: number) => number;
};

/** Process-wide source backed by Math.random (seeded once by the runtime). */
export const mathRandom: RandomSource = {
  choose: (n) => Math.floor(Math.random() * n),
};

/** Deterministic source cycling through a fixed sequence of picks (mod n). */
export const sequenceRandom = (picks: readonly number[]): RandomSource => {
  let i = 0;
  return {
    choose: (n) => {
      const pick = picks.length > 0 ? picks[i++ % picks.length] : 0;
      return ((pick % n) + n) % n;
    },
  };
};

/** Fisher-Yates shuffle into a new array. */
export const shuffle = <T>(items: readonly T[], random: RandomSource): T[] => {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = random.choose(i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
};
