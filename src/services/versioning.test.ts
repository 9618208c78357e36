import { describe, it, expect } from 'vitest';
import { CASError, NotFoundError, ValidationError } from '../utils/errors';
import { createTestLedger, testCid, testPi } from '../test-helpers';

const PI = testPi(1);

async function seeded() {
  const ledger = createTestLedger();
  const metadata = await testCid('metadata');
  const scan = await testCid('scan');
  const created = await ledger.appender.create({
    pi: PI,
    components: { metadata, scan },
    children_pi: [testPi(10), testPi(11)],
    parent_pi: testPi(99),
  });
  return { ledger, created, metadata, scan };
}

describe('VersionAppender.create', () => {
  it('writes version 1 and creates the tip', async () => {
    const { ledger, created } = await seeded();
    expect(created.ver).toBe(1);
    expect(created.previous).toBeNull();
    expect(await ledger.tips.readTip(PI)).toBe(created.tip);
  });

  it('refuses a PI that already exists', async () => {
    const { ledger, created } = await seeded();
    const error = await ledger.appender
      .create({ pi: PI, components: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CASError);
    if (error instanceof CASError) {
      expect(error.cas).toEqual({ actual: created.tip, expect: null });
    }
  });
});

describe('VersionAppender.append', () => {
  it('merges components and applies set operations on children', async () => {
    const { ledger, metadata } = await seeded();
    const ocr = await testCid('ocr');

    const result = await ledger.appender.append(PI, {
      components: { ocr },
      components_remove: ['scan'],
      children_pi_add: [testPi(11), testPi(12)],
      children_pi_remove: [testPi(10), testPi(13)],
      note: 'OCR pass',
    });

    expect(result.ver).toBe(2);
    expect(result.manifest.components).toEqual({ metadata: { '/': metadata }, ocr: { '/': ocr } });
    expect(result.manifest.children_pi).toEqual([testPi(11), testPi(12)]);
    expect(result.manifest.parent_pi).toBe(testPi(99));
    expect(result.manifest.note).toBe('OCR pass');
    expect(result.manifest.prev).toEqual({ '/': result.previous });
  });

  it('clears the parent with null and keeps it when omitted', async () => {
    const { ledger } = await seeded();
    const kept = await ledger.appender.append(PI, { note: 'touch' });
    expect(kept.manifest.parent_pi).toBe(testPi(99));

    const cleared = await ledger.appender.append(PI, { parent_pi: null });
    expect(cleared.manifest.parent_pi).toBeUndefined();
  });

  it('fails a stale expected tip before writing anything', async () => {
    const { ledger, created } = await seeded();
    await ledger.appender.append(PI, { note: 'v2' });
    await ledger.tasks.settle();
    const current = await ledger.tips.readTip(PI);
    const documents = ledger.memory.documentCount;

    const error = await ledger.appender
      .append(PI, { note: 'late' }, { expectTip: created.tip })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CASError);
    if (error instanceof CASError) {
      expect(error.cas).toEqual({ actual: current, expect: created.tip });
      expect(error.statusCode).toBe(409);
    }
    expect(ledger.memory.documentCount).toBe(documents);
    expect(await ledger.tips.readTip(PI)).toBe(current);
  });

  it('lets exactly one of two racing appends win', async () => {
    const { ledger, created } = await seeded();

    const results = await Promise.allSettled([
      ledger.appender.append(PI, { note: 'writer A' }, { expectTip: created.tip }),
      ledger.appender.append(PI, { note: 'writer B' }, { expectTip: created.tip }),
    ]);

    const winners = results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []));
    const losers = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(winners).toHaveLength(1);
    expect(losers).toHaveLength(1);
    expect(losers[0]).toBeInstanceOf(CASError);
    if (losers[0] instanceof CASError) {
      expect(losers[0].actual).toBe(winners[0].tip);
    }
    expect(await ledger.tips.readTip(PI)).toBe(winners[0].tip);
  });

  it('accepts the loser once it rebases onto the actual tip', async () => {
    const { ledger, created } = await seeded();
    await ledger.appender.append(PI, { note: 'winner' }, { expectTip: created.tip });

    const error = await ledger.appender
      .append(PI, { note: 'loser' }, { expectTip: created.tip })
      .catch((e: unknown) => e);
    if (!(error instanceof CASError) || error.actual === null) {
      throw new Error('expected a CAS failure carrying the actual tip');
    }

    const rebased = await ledger.appender.append(PI, { note: 'loser' }, { expectTip: error.actual });
    expect(rebased.ver).toBe(3);

    const versions: number[] = [];
    for await (const { manifest } of ledger.chain.walk(rebased.tip)) {
      versions.push(manifest.ver);
    }
    expect(versions).toEqual([3, 2, 1]);
  });

  it('skips the write when nothing changes and skipIfUnchanged is set', async () => {
    const { ledger, created } = await seeded();
    const result = await ledger.appender.append(
      PI,
      { children_pi_add: [testPi(10)] },
      { skipIfUnchanged: true }
    );

    expect(result.changed).toBe(false);
    expect(result.tip).toBe(created.tip);
    expect(result.ver).toBe(1);
  });

  it('rejects a label that is both set and removed', async () => {
    const { ledger, metadata } = await seeded();
    await expect(
      ledger.appender.append(PI, { components: { scan: metadata }, components_remove: ['scan'] })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('throws NotFoundError for unknown entities', async () => {
    const { ledger } = await seeded();
    await expect(ledger.appender.append(testPi(2), { note: 'x' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('notifies the index after the tip moves', async () => {
    const { ledger } = await seeded();
    const result = await ledger.appender.append(PI, { note: 'indexed' });
    await ledger.tasks.settle();

    const listing = await ledger.index.list({ limit: 10 });
    expect(listing.entities).toEqual([{ pi: PI, tip: result.tip }]);
  });
});
