import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Sources run from server/src, the build from dist/server/src; both sit below the package root.
function findProjectRoot(startDir: string): string {
  let dir = startDir;
  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return startDir;
    dir = parent;
  }
}

export const PROJECT_ROOT = findProjectRoot(__dirname);
export const SERVER_DATA_DIR = path.join(PROJECT_ROOT, 'server', 'data');
export const WEB_DIST_DIR = path.join(PROJECT_ROOT, 'web', 'dist');
