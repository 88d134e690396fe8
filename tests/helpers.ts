import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const HOST_A_LOG = [
  'VIOS hostname:',
  'vios-a',
  '',
  'SEA : ent10',
  'State: PRIMARY',
  'REAL ADAPTERS',
  'ent0 x P1',
  '',
].join('\n');

export const HOST_B_LOG = [
  'VIOS hostname:',
  'vios-b',
  '',
  'SEA : ent20',
  'SEA : ent21',
  '',
].join('\n');

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'lssea-topology-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeLogs(dir: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content, 'utf-8');
  }
}
