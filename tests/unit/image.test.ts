import assert from 'node:assert/strict';
import { test } from 'node:test';
import { argb, IconImage } from '../../src/models/image';
import { decodePngWithSharp } from '../../src/models/png';

void test('argb packs channels into an unsigned 32-bit value', () => {
  assert.equal(argb(0xff, 0x12, 0x34, 0x56), 0xff123456);
  assert.equal(argb(0, 0xff, 0xff, 0xff), 0x00ffffff);
  assert.equal(argb(0x80, 0, 0, 0), 0x80000000);
});

void test('IconImage converts between ARGB pixels and RGBA bytes', () => {
  const image = IconImage.fromRGBA(2, 1, Buffer.from([0x11, 0x22, 0x33, 0x44, 0xaa, 0xbb, 0xcc, 0xdd]));
  assert.deepEqual([...image.pixels], [0x44112233, 0xddaabbcc]);
  assert.deepEqual([...IconImage.toRGBA(image)], [0x11, 0x22, 0x33, 0x44, 0xaa, 0xbb, 0xcc, 0xdd]);
});

void test('IconImage.fromRGBA rejects a buffer of the wrong size', () => {
  assert.throws(() => IconImage.fromRGBA(2, 2, Buffer.alloc(15)), { message: 'expected 16 bytes of RGBA data, got 15' });
});

void test('IconImage.toPNG writes a PNG that decodes to the same pixels', async () => {
  const image = IconImage.create(2, 2);
  image.pixels.set([0xffff0000, 0xff00ff00, 0xff0000ff, 0xffffffff]);
  const png = await IconImage.toPNG(image);
  assert.deepEqual([...png.subarray(0, 8)], [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  const decoded = await decodePngWithSharp(png);
  assert.equal(decoded.width, 2);
  assert.equal(decoded.height, 2);
  assert.deepEqual([...decoded.pixels], [0xffff0000, 0xff00ff00, 0xff0000ff, 0xffffffff]);
});
