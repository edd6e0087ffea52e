/**
 * Book Inventory Entity
 * Catalog row plus the copy counters owned by the InventoryLedger.
 */

export interface BookInventory {
  id: number;
  title: string;
  author: string;
  isbn: string;
  categoryId: number | null;
  totalCopies: number;
  availableCopies: number;
}
