import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { IconDirEntry } from '../../src/models/ico-dir';
import { PendingEntries } from '../../src/models/locator';

function entry(index: number, imageOffset: number): IconDirEntry {
  return {
    index,
    width: 16,
    height: 16,
    colorCount: 0,
    reserved: 0,
    planes: 1,
    bitCount: 32,
    bytesInResource: 100,
    imageOffset,
  };
}

void test('PendingEntries hands out each entry once, by offset', () => {
  const pending = new PendingEntries([entry(0, 138), entry(1, 38), entry(2, 238)]);
  assert.equal(pending.size, 3);
  assert.equal(pending.claim(38)?.index, 1);
  assert.equal(pending.claim(38), undefined);
  assert.equal(pending.claim(138)?.index, 0);
  assert.equal(pending.size, 1);
});

void test('PendingEntries returns undefined for an offset no entry claims', () => {
  const pending = new PendingEntries([entry(0, 38)]);
  assert.equal(pending.claim(40), undefined);
  assert.equal(pending.size, 1);
});

void test('PendingEntries resolves entries sharing an offset in directory order', () => {
  const pending = new PendingEntries([entry(0, 38), entry(1, 38)]);
  assert.equal(pending.claim(38)?.index, 0);
  assert.equal(pending.claim(38)?.index, 1);
  assert.equal(pending.size, 0);
});

void test('PendingEntries does not modify the array it was built from', () => {
  const entries = [entry(0, 38)];
  const pending = new PendingEntries(entries);
  pending.claim(38);
  assert.equal(entries.length, 1);
});
