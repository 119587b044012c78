/**
 * Stable identity of a configured feed. Assigned once from the stream list at load time and
 * compared by `id`; display names are for humans only.
 */
export class StreamIdentity {
  private constructor(
    private readonly _id: number,
    private readonly _name: string,
    private readonly _endpoint: string,
  ) {}

  get id(): number {
    return this._id;
  }

  get name(): string {
    return this._name;
  }

  get endpoint(): string {
    return this._endpoint;
  }

  static create(id: number, name: string, endpoint: string): StreamIdentity {
    if (!Number.isInteger(id) || id < 0) {
      throw new Error(`Stream id must be a non-negative integer, got ${id}`);
    }
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new Error('Stream name cannot be empty');
    }
    return new StreamIdentity(id, trimmed, endpoint);
  }

  equals(other: StreamIdentity): boolean {
    return this._id === other._id;
  }

  toString(): string {
    return this._name;
  }
}
