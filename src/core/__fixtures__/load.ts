import fs from 'fs';
import { fileURLToPath } from 'url';

export function loadFixture(name: string): string {
  return fs.readFileSync(fileURLToPath(new URL(`./${name}.html`, import.meta.url)), 'utf-8');
}
