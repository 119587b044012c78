import { describeUpdate } from '@race/bench/application/use-cases/log-updates/passthrough-logger';
import { Slot } from '@race/domain';
import { describe, expect, it } from 'vitest';

describe('describeUpdate', () => {
  it('formats account balances in SOL', () => {
    expect(
      describeUpdate({ kind: 'account', slot: Slot.create(5n), pubkey: 'test-account', lamports: 1_500_000_000n }),
    ).toBe('account test-account @ slot 5, balance 1.500000000 SOL');
  });

  it('formats transactions with status and compute units', () => {
    expect(
      describeUpdate({
        kind: 'transaction',
        slot: Slot.create(6n),
        signature: 'test-signature',
        accountCount: 3,
        instructionCount: 2,
        failed: true,
        computeUnits: 4200n,
      }),
    ).toBe('tx test-signature @ slot 6, 3 accounts, 2 instructions, status failed, 4200 CU');

    expect(
      describeUpdate({
        kind: 'transaction',
        slot: Slot.create(6n),
        signature: null,
        accountCount: 0,
        instructionCount: 0,
        failed: null,
        computeUnits: null,
      }),
    ).toBe('tx <no signature> @ slot 6, 0 accounts, 0 instructions, status unknown, n/a');
  });

  it('formats blocks', () => {
    expect(describeUpdate({ kind: 'block', slot: Slot.create(7n), blockhash: 'test-hash' })).toBe(
      'block test-hash @ slot 7',
    );
  });
});
