/** One decimal place; zero when there are no ratings. */
export function roundRating(average: string | number | null | undefined): number {
  if (average === null || average === undefined) return 0;
  const value = Number(average);
  if (!Number.isFinite(value)) return 0;
  return Math.round(value * 10) / 10;
}

export const REVIEW_AUTHOR_COLUMNS = {
  id: true,
  firstName: true,
  lastName: true,
  profilePictureUrl: true,
} as const;
