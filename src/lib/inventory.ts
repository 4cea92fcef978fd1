import { z } from 'zod';
import type { InventoryDecision, InventoryState } from './types';
import { nonNegativeNumber, parseOrThrow, positiveNumber } from './validation';

export const inventoryStateSchema = z.object({
  currentStock: nonNegativeNumber,
  reorderPoint: nonNegativeNumber,
  economicOrderQty: positiveNumber,
  safetyStock: nonNegativeNumber,
});

/**
 * Reorder policy:
 * - reorder when stock is at or below the reorder point (inclusive)
 * - the recommended quantity is always the configured EOQ, however deep the deficit
 */
export function evaluateInventory(state: InventoryState): InventoryDecision {
  const s = parseOrThrow(inventoryStateSchema, state, 'inventory');

  return {
    needsReorder: s.currentStock <= s.reorderPoint,
    recommendedOrderQty: s.economicOrderQty,
    belowSafetyStock: s.currentStock < s.safetyStock,
  };
}

export function inventoryAlertMessage(state: InventoryState, decision: InventoryDecision, unit = 'kg'): string {
  if (!decision.needsReorder) return 'Inventory Level: Healthy';
  return `ALERT: Stock hit ROP (${state.reorderPoint} ${unit}). Order ${decision.recommendedOrderQty} ${unit} immediately!`;
}
