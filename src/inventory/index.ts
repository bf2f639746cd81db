// ============================================================================
// Inventory Module: Barrel Export
// ============================================================================

export { buildInventory, formatInventory } from './inventory.js';
export type { Inventory, InventoryOptions, ObservationGroup } from './inventory.js';
