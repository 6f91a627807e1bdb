import fs from 'fs';
import path from 'path';

export interface RotateFileOptions {
  /** Directory where the file resides */
  dir: string;
  /** Base file name to rotate (e.g., app.log) */
  filename: string;
  /** Retention period in days (default: 7) */
  retentionDays?: number;
  /** Date used for the rotated name and the retention cutoff (default: now) */
  now?: Date;
}

export interface RotateFileResult {
  /** Path the live file was moved to, if it was rotated */
  rotatedPath?: string;
  /** Rotated files deleted for being past retention */
  removed: string[];
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Renames `filename` to `<base>-<YYYY-MM-DD><ext>` and deletes rotated copies older than the retention period.
 */
export function rotateFile({
  dir,
  filename,
  retentionDays = 7,
  now = new Date(),
}: RotateFileOptions): RotateFileResult {
  const today = now.toISOString().split('T')[0];
  const ext = path.extname(filename);
  const base = path.basename(filename, ext);
  const result: RotateFileResult = { removed: [] };

  const sourcePath = path.join(dir, filename);
  const rotatedPath = path.join(dir, `${base}-${today}${ext}`);

  // At most one rotation per day
  if (fs.existsSync(sourcePath) && !fs.existsSync(rotatedPath)) {
    fs.renameSync(sourcePath, rotatedPath);
    result.rotatedPath = rotatedPath;
  }

  const pattern = new RegExp(`^${escapeRegExp(base)}-(\\d{4}-\\d{2}-\\d{2})${escapeRegExp(ext)}$`);
  const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;

  for (const file of fs.readdirSync(dir)) {
    const match = file.match(pattern);
    if (!match) continue;

    const date = new Date(match[1]);
    if (!isNaN(date.getTime()) && date.getTime() < cutoff) {
      fs.unlinkSync(path.join(dir, file));
      result.removed.push(file);
    }
  }

  return result;
}
