export const MAX_U64 = BigInt('18446744073709551615');

export class Slot {
  private constructor(private readonly _value: bigint) {}

  get value(): bigint {
    return this._value;
  }

  static create(value: bigint): Slot {
    if (value < 0n) {
      throw new Error('Slot value cannot be negative');
    }
    if (value > MAX_U64) {
      throw new Error('Slot value exceeds u64 range');
    }
    return new Slot(value);
  }

  /**
   * Parses a slot as it arrives on the wire (protobuf u64 fields come through as decimal strings).
   */
  static fromWire(raw: string | number | bigint): Slot {
    if (typeof raw === 'bigint') {
      return Slot.create(raw);
    }
    if (typeof raw === 'number') {
      if (!Number.isSafeInteger(raw)) {
        throw new Error(`Slot value is not a safe integer: ${raw}`);
      }
      return Slot.create(BigInt(raw));
    }
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new Error(`Slot value is not numeric: "${raw}"`);
    }
    return Slot.create(BigInt(trimmed));
  }

  equals(other: Slot): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return `Slot ${this._value.toString()}`;
  }
}
