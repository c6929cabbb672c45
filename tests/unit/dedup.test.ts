import { DedupLedger } from '../../src/services/dedup.service';

describe('DedupLedger', () => {
  it('should admit an id once', () => {
    const ledger = new DedupLedger('inbound', 10);

    expect(ledger.admitIfAbsent('msg-1')).toBe(true);
    expect(ledger.admitIfAbsent('msg-1')).toBe(false);
    expect(ledger.seen('msg-1')).toBe(true);
    expect(ledger.size).toBe(1);
  });

  it('should not grow when the same id is admitted repeatedly', () => {
    const ledger = new DedupLedger('outbound', 3);
    ledger.admit('a');
    ledger.admit('a');
    ledger.admit('a');

    expect(ledger.size).toBe(1);
  });

  it('should evict the oldest id when admitting at capacity', () => {
    const ledger = new DedupLedger('inbound', 3);
    ['a', 'b', 'c'].forEach((id) => ledger.admit(id));

    ledger.admit('d');

    expect(ledger.size).toBe(3);
    expect(ledger.seen('a')).toBe(false);
    expect(ledger.seen('b')).toBe(true);
    expect(ledger.seen('c')).toBe(true);
    expect(ledger.seen('d')).toBe(true);
  });

  it('should never exceed capacity across many admissions', () => {
    const ledger = new DedupLedger('crm', 50);
    for (let i = 0; i < 500; i++) {
      ledger.admit(`id-${i}`);
      expect(ledger.size).toBeLessThanOrEqual(50);
    }

    expect(ledger.seen('id-449')).toBe(false);
    expect(ledger.seen('id-450')).toBe(true);
    expect(ledger.seen('id-499')).toBe(true);
  });

  it('should treat an evicted id as new again', () => {
    const ledger = new DedupLedger('inbound', 2);
    ledger.admit('x');
    ledger.admit('y');
    ledger.admit('z');

    expect(ledger.admitIfAbsent('x')).toBe(true);
    expect(ledger.seen('y')).toBe(false);
  });

  it('should keep insertion order when a duplicate is re-admitted', () => {
    const ledger = new DedupLedger('inbound', 2);
    ledger.admit('first');
    ledger.admit('second');
    ledger.admit('first');
    ledger.admit('third');

    expect(ledger.seen('first')).toBe(false);
    expect(ledger.seen('second')).toBe(true);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new DedupLedger('inbound', 0)).toThrow('Ledger capacity must be a positive integer, got 0');
  });

  it('should admit exactly once when many handlers race on the same id', async () => {
    const ledger = new DedupLedger('inbound', 100);
    const results = await Promise.all(
      Array.from({ length: 20 }, async () => {
        await Promise.resolve();
        return ledger.admitIfAbsent('shared-id');
      })
    );

    expect(results.filter(Boolean)).toHaveLength(1);
  });
});
