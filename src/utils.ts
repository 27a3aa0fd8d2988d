import { existsSync } from 'fs';
import { mkdirpSync } from 'mkdirp';
import { join } from 'path';

export function formatJson(value: unknown): string {
  return JSON.stringify(value, undefined, 4);
}

export function mkdir(...parts: string[]) {
  const dir = join(...parts);
  if (!existsSync(dir))
    mkdirpSync(dir);
  return dir;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
