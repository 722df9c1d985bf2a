export const SLOT_COUNT = 8;

export interface Slot {
  id: number;
  label: string;
  filename: string | null;
  icon: string | null;
}

export interface MappingDocument {
  slots: Slot[];
}

/**
 * Partial slot update. An omitted field is left as it is; `null` clears it
 * (for `label`, back to the slot's default label).
 */
export interface SlotPatch {
  filename?: string | null;
  label?: string | null;
  icon?: string | null;
}
