import assert from 'node:assert/strict';
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, test } from 'node:test';
import { inputName, main, outputName } from '../../src/actions/extract';
import { IconImage } from '../../src/models/image';
import { createIco, createMonochrome2x2, createTrueColor1x1 } from '../fixtures/ico-fixtures';

const tempDirs: string[] = [];
after(() => {
  for (const dir of tempDirs) rmSync(dir, { recursive: true, force: true });
});

void test('outputName numbers images and records their size', () => {
  assert.equal(outputName('app', 3, IconImage.create(16, 16)), 'app_03_16x16.png');
  assert.equal(outputName('app', 12, IconImage.create(256, 128)), 'app_12_256x128.png');
});

void test('inputName takes the base name of paths and URLs', () => {
  assert.equal(inputName('/tmp/icons/cursor.cur'), 'cursor');
  assert.equal(inputName('https://example.com/icons/favicon.ico?v=2'), 'favicon');
  assert.equal(inputName('https://example.com/'), 'icon');
});

void test('extract writes one PNG per decoded image of every icon in a directory', async () => {
  const root = mkdtempSync(join(tmpdir(), 'ico-resources-'));
  tempDirs.push(root);
  const input = join(root, 'in');
  const out = join(root, 'out', 'nested');
  mkdirSync(input);
  writeFileSync(join(input, 'app.ico'), createIco([
    { width: 2, height: 2, bitCount: 1, data: createMonochrome2x2() },
    { width: 1, height: 1, bitCount: 24, data: createTrueColor1x1([0, 0, 255]) },
  ]));
  writeFileSync(join(input, 'notes.txt'), 'not an icon');

  assert.equal(await main([input, out, '--quiet']), true);
  assert.deepEqual(readdirSync(out).sort(), ['app_00_2x2.png', 'app_01_1x1.png']);
});

void test('extract reports failure for a file that is not an icon', async () => {
  const root = mkdtempSync(join(tmpdir(), 'ico-resources-'));
  tempDirs.push(root);
  const path = join(root, 'broken.ico');
  writeFileSync(path, Buffer.from([1, 0, 1, 0, 1, 0]));
  const out = join(root, 'out');

  assert.equal(await main([path, out, '--quiet']), false);
  assert.equal(existsSync(out), true);
  assert.deepEqual(readdirSync(out), []);
});

void test('extract prints usage without two arguments', async () => {
  assert.equal(await main([]), false);
  assert.equal(await main(['--help']), true);
});
