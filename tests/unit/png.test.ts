import assert from 'node:assert/strict';
import { test } from 'node:test';
import { decodePngWithSharp, PngMagic1, PngMagic2, readPngChunks, readPngResource } from '../../src/models/png';
import { fromBuffer } from '../../src/source';
import { createTruncatedPng } from '../fixtures/ico-fixtures';

function chunk(type: string, data: number[]): number[] {
  const head = Buffer.alloc(8);
  head.writeUInt32BE(data.length, 0);
  head.write(type, 4, 'ascii');
  return [...head, ...data, 0, 0, 0, 0];
}

void test('the PNG signature reads as two little-endian words', () => {
  const signature = createTruncatedPng();
  assert.equal(signature.readUInt32LE(0), PngMagic1);
  assert.equal(signature.readUInt32LE(4), PngMagic2);
});

void test('readPngResource restores the consumed signature', async () => {
  const source = fromBuffer(Buffer.from([1, 2, 3, 4, 5]));
  const png = await readPngResource(source, 12);
  assert.deepEqual([...png], [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3, 4]);
  assert.equal(source.position, 4);
});

void test('readPngChunks stops after the IEND chunk', async () => {
  const body = [...chunk('IHDR', [1, 2, 3]), ...chunk('IEND', [])];
  const source = fromBuffer(Buffer.from([...body, 0xff, 0xff]));
  const png = await readPngChunks(source);
  assert.equal(png.length, 8 + body.length);
  assert.deepEqual([...png.subarray(8)], body);
  assert.equal(source.position, body.length);
});

void test('decodePngWithSharp rejects a truncated PNG', async () => {
  await assert.rejects(decodePngWithSharp(createTruncatedPng()));
});
