/**
 * Length in Unicode code points, so an astral-plane character (emoji) counts once.
 * This matches how Postgres measures VARCHAR(n).
 */
export function characterLength(text: string): number {
  return [...text].length;
}
