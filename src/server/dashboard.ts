import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const DASHBOARD_PATH = fileURLToPath(new URL('../../public/index.html', import.meta.url));

let cached: string | null = null;

/**
 * The bundled single-page dashboard, read once per process.
 */
export function loadDashboard(): string {
  if (cached === null) {
    cached = readFileSync(DASHBOARD_PATH, 'utf-8');
  }
  return cached;
}
