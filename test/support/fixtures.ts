import * as path from 'path';

export const FIXTURES_DIR = path.join(__dirname, '..', 'fixtures');

export function fixturePath(...segments: string[]): string {
  return path.join(FIXTURES_DIR, ...segments);
}
