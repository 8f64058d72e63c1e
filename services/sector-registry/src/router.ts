import type { SectorEntry, SectorId } from "./registry.js";
import { getSectorByContractVersion } from "./registry.js";

export function routeByContractVersion(
  contractVersion: string,
): { sector: SectorId; entry: SectorEntry } | null {
  const entry = getSectorByContractVersion(contractVersion);
  if (!entry) {
    return null;
  }
  return { sector: entry.sector, entry };
}

export function selectSector(request: { contract?: { contract_version?: string } }): SectorId | null {
  const contractVersion = request.contract?.contract_version;
  if (contractVersion === undefined) {
    return null;
  }
  return routeByContractVersion(contractVersion)?.sector ?? null;
}
