import {mkdtempSync, rmSync} from 'fs';
import {tmpdir} from 'os';
import {join} from 'path';

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), 'encoding-repair-'));
}

export function removeTmpDir(dir: string): void {
  rmSync(dir, {recursive: true, force: true});
}
