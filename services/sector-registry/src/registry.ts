export type SectorId = "solar" | "consulting";

export type ContractVersion = "SOLAR_V1" | "CONSULTING_V1";

export interface SectorEntry {
  sector: SectorId;
  label: string;
  contractVersion: ContractVersion;
  schemaFile: string;
  engineVersion: string;
}

export const SECTOR_REGISTRY: ReadonlyMap<SectorId, SectorEntry> = new Map<SectorId, SectorEntry>([
  [
    "solar",
    {
      sector: "solar",
      label: "Utility-scale solar PV",
      contractVersion: "SOLAR_V1",
      schemaFile: "solar_v1.schema.json",
      engineVersion: "0.1.0",
    },
  ],
  [
    "consulting",
    {
      sector: "consulting",
      label: "Professional services firm",
      contractVersion: "CONSULTING_V1",
      schemaFile: "consulting_v1.schema.json",
      engineVersion: "0.1.0",
    },
  ],
]);

export function getSector(sector: SectorId): SectorEntry {
  const entry = SECTOR_REGISTRY.get(sector);
  if (!entry) {
    throw new Error(`Sector ${sector} is not registered`);
  }
  return entry;
}

export function getSectorByContractVersion(contractVersion: string): SectorEntry | undefined {
  return Array.from(SECTOR_REGISTRY.values()).find((s) => s.contractVersion === contractVersion);
}

export function listSectors(): SectorEntry[] {
  return Array.from(SECTOR_REGISTRY.values());
}
