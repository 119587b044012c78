import type { SlotRaceRecord } from '../types/race';

/**
 * Slot records in first-sighting order, unique by slot. Map iteration order is insertion
 * order, so the first key is always the oldest record.
 */
export class RaceLedger {
  private readonly records = new Map<bigint, SlotRaceRecord>();

  get length(): number {
    return this.records.size;
  }

  get(slot: bigint): SlotRaceRecord | undefined {
    return this.records.get(slot);
  }

  append(record: SlotRaceRecord): void {
    if (this.records.has(record.slot.value)) {
      throw new Error(`${record.slot.toString()} is already tracked`);
    }
    this.records.set(record.slot.value, record);
  }

  evictOldest(): SlotRaceRecord | undefined {
    const oldest = this.records.values().next();
    if (oldest.done) {
      return undefined;
    }
    this.records.delete(oldest.value.slot.value);
    return oldest.value;
  }

  values(): IterableIterator<SlotRaceRecord> {
    return this.records.values();
  }
}
