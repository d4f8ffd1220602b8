// Unit classification shared by range validation and score normalization.

const PERCENT_WORD = /\b(percent|percentage|pct)\b/;

/** `%`, `% of revenue`, `Percentage`, `pct` */
export function isPercentUnit(unit: string | null | undefined): boolean {
  const u = (unit ?? '').trim().toLowerCase();
  return u.includes('%') || PERCENT_WORD.test(u);
}
