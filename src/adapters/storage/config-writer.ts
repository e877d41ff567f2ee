import fs from 'fs';
import path from 'path';

/**
 * Replace a config file with new content. The text is written to a sibling
 * temp file first and renamed into place, so readers never see a partial file.
 */
export function writeConfigFile(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tempPath, content, { encoding: 'utf-8', mode: 0o644 });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}
