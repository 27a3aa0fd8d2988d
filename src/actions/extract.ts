import cliProgress from 'cli-progress';
import fs from 'fs';
import { glob } from 'glob';
import { padStart } from 'lodash';
import minimist from 'minimist';
import { basename, extname, join } from 'path';
import { ICO } from '../models/ico';
import { IconImage } from '../models/image';
import { isUrl } from '../source';
import { errorMessage, mkdir } from '../utils';

export function outputName(name: string, index: number, image: IconImage): string {
  return `${name}_${padStart(index.toString(), 2, '0')}_${image.width}x${image.height}.png`;
}

export function inputName(input: string): string {
  const path = isUrl(input) ? new URL(input).pathname : input;
  return basename(path, extname(path)) || 'icon';
}

function collectInputs(pattern: string): string[] {
  if (isUrl(pattern)) {
    return [pattern];
  }
  if (fs.existsSync(pattern) && fs.lstatSync(pattern).isDirectory()) {
    return fs.readdirSync(pattern)
      .filter((file) => /\.(ico|cur)$/i.test(file))
      .sort()
      .map((file) => join(pattern, file));
  }
  return glob.sync(pattern).sort();
}

async function extract(input: string, out: string, storedOrder32: boolean, quiet: boolean) {
  const name = inputName(input);
  const dir = await ICO.parse(input, {
    storedOrder32,
    onIssue: (issue) => {
      if (!quiet) console.warn(`${name}: ${issue.message}`);
    },
  });

  let written = 0;
  for (const [index, image] of dir.images.entries()) {
    if (!image) continue;
    const fileName = outputName(name, index, image);
    fs.writeFileSync(join(out, fileName), await IconImage.toPNG(image));
    written++;
  }
  return written;
}

export async function main(args: string[]) {
  const parsedArgs = minimist(args, {
    boolean: ['help', 'quiet', 'stored-order-32'],
  });

  if (parsedArgs._.length !== 2 || parsedArgs.help) {
    console.log('usage: ico-resources extract <file|directory|glob|url> <output directory> [--stored-order-32] [--quiet]');
    return Boolean(parsedArgs.help);
  }

  const quiet = Boolean(parsedArgs.quiet);
  const files = collectInputs(String(parsedArgs._[0]));
  if (files.length === 0) {
    console.error(`no icon files found: ${parsedArgs._[0]}`);
    return false;
  }
  const out = mkdir(String(parsedArgs._[1]));

  const pbar = new cliProgress.SingleBar({}, cliProgress.Presets.shades_classic);
  if (!quiet) pbar.start(files.length, 0);
  let ok = true;
  let written = 0;
  for (const file of files) {
    try {
      written += await extract(file, out, Boolean(parsedArgs['stored-order-32']), quiet);
    } catch (err) {
      ok = false;
      console.error(`\n${file}: ${errorMessage(err)}`);
    }
    if (!quiet) pbar.increment();
  }
  if (!quiet) pbar.stop();

  console.log(`${written} image(s) written to ${out}`);
  return ok;
}
