export type SectorCategory = "GROWTH" | "DEFENSIVE";

export interface Sector {
  name: string;
  symbol: string;
  category: SectorCategory;
}
