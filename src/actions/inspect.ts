import minimist from 'minimist';
import { sum } from 'lodash';
import { ICO } from '../models/ico';
import type { IconDirectory, IconIssue } from '../models/ico';
import { IconDirEntry, IconType } from '../models/ico-dir';
import { formatJson } from '../utils';

export function describe(dir: IconDirectory): string[] {
  const lines = [
    `${dir.type === IconType.CURSOR ? 'cursor' : 'icon'}: ${dir.count} declared, ${dir.entries.length} usable, ` +
    `${sum(dir.entries.map((entry) => entry.bytesInResource))} bytes of image data`,
  ];
  for (let index = 0; index < dir.count; index++) {
    const entry = dir.entries.find((e) => e.index === index);
    if (!entry) {
      lines.push(`#${index}: dropped`);
      continue;
    }
    const hotspot = IconDirEntry.hotspot(dir, entry);
    const layout = hotspot
      ? `hotspot ${hotspot.x},${hotspot.y}`
      : `${entry.bitCount} bpp`;
    const image = dir.images[index];
    const status = !image
      ? 'empty'
      : `${entry.bitmap ? 'bitmap' : 'png'} ${image.width}x${image.height}`;
    lines.push(
      `#${index}: ${IconDirEntry.pixelWidth(entry)}x${IconDirEntry.pixelHeight(entry)}, ${layout}, ` +
      `${entry.bytesInResource} bytes @ ${entry.imageOffset}: ${status}`,
    );
  }
  return lines;
}

function summarize(dir: IconDirectory) {
  return {
    type: dir.type === IconType.CURSOR ? 'cursor' : 'icon',
    count: dir.count,
    entries: dir.entries.map((entry) => ({
      index: entry.index,
      width: IconDirEntry.pixelWidth(entry),
      height: IconDirEntry.pixelHeight(entry),
      colorCount: entry.colorCount,
      planes: entry.planes,
      bitCount: entry.bitCount,
      bytesInResource: entry.bytesInResource,
      imageOffset: entry.imageOffset,
      header: entry.bitmap?.header,
      colors: entry.bitmap?.colorTable.length,
      decoded: entry.image ? { width: entry.image.width, height: entry.image.height } : null,
    })),
  };
}

export async function main(args: string[]) {
  const parsedArgs = minimist(args, {
    boolean: ['help', 'json', 'stored-order-32'],
  });

  if (parsedArgs._.length !== 1 || parsedArgs.help) {
    console.log('usage: ico-resources inspect <file|url> [--json] [--stored-order-32]');
    return Boolean(parsedArgs.help);
  }

  const issues: IconIssue[] = [];
  const dir = await ICO.parse(String(parsedArgs._[0]), {
    storedOrder32: Boolean(parsedArgs['stored-order-32']),
    onIssue: (issue) => issues.push(issue),
  });

  if (parsedArgs.json) {
    console.log(formatJson({ ...summarize(dir), issues: issues.map((issue) => issue.message) }));
  } else {
    for (const line of describe(dir)) {
      console.log(line);
    }
    for (const issue of issues) {
      console.warn(`warning: ${issue.message}`);
    }
  }
  return true;
}
