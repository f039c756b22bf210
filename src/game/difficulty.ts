export type Difficulty = {
  size: number;
  label: string;
};

export const DIFFICULTIES: readonly Difficulty[] = [
  { size: 3, label: "Easy (3×3)" },
  { size: 4, label: "Medium (4×4)" },
  { size: 5, label: "Hard (5×5)" },
  { size: 6, label: "Expert (6×6)" },
];

export const DEFAULT_SIZE = DIFFICULTIES[0].size;

export const difficultyLabel = (size: number) =>
  DIFFICULTIES.find((entry) => entry.size === size)?.label ?? `${size}×${size}`;
