import * as path from "path";

export const REGION_ALIASES: Record<string, string> = {
  EU: "Europe",
  JP: "Japan",
  JPN: "Japan",
  AUS: "Australia",
  KR: "Korea",
  BR: "Brazil",
  CN: "China",
  FR: "France",
  DE: "Germany",
  HK: "Hong Kong",
  IT: "Italy",
  NL: "Netherlands",
  ES: "Spain",
  SE: "Sweden",
  CA: "Canada",
};

export function resolveRegions(raw: string[]): string[] {
  return raw
    .map((r) => r.trim())
    .filter((r) => r.length > 0)
    .map((r) => REGION_ALIASES[r.toUpperCase()] ?? r);
}

/**
 * Release names carry their region in the first parenthesised group, e.g.
 * "Game (USA, Europe) (Rev 1).zip". Names without one never match.
 */
export function matchesRegion(fileName: string, regions: string[]): boolean {
  const match = /\(([^)]+)\)/.exec(fileName);
  if (!match) return false;
  const tag = match[1].toLowerCase();
  return regions.some((r) => tag.includes(r.toLowerCase()));
}

export function regionFilter(regions: string[]): (relativePath: string) => boolean {
  if (regions.length === 0) return () => true;
  return (relativePath) => matchesRegion(path.posix.basename(relativePath), regions);
}
