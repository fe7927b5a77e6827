import * as fs from 'fs';
import * as path from 'path';

/**
 * Create the directory a file will be written into, if it doesn't exist yet
 */
export function ensureParentDirectory(filePath: string): void {
  const dir = path.dirname(path.resolve(filePath));
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
