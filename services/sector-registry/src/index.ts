export { SECTOR_REGISTRY, getSector, getSectorByContractVersion, listSectors } from "./registry.js";
export type { ContractVersion, SectorEntry, SectorId } from "./registry.js";
export { routeByContractVersion, selectSector } from "./router.js";
