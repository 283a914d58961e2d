import * as fs from 'fs/promises';
import * as fss from 'fs';
import * as path from 'path';
import archiver from 'archiver';
import { FlatRecord } from './types';

export async function saveResults(results: FlatRecord[], outDir: string, jsonName: string): Promise<string> {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, jsonName);
  await fs.writeFile(file, JSON.stringify(results, null, 2), 'utf8');
  return file;
}

export async function zipFile(filePath: string, outDir: string, zipName: string): Promise<string> {
  const zipPath = path.join(outDir, zipName);
  const output = fss.createWriteStream(zipPath);
  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve());
    output.on('error', reject);
  });
  const archive = archiver('zip', { zlib: { level: 9 } });
  archive.on('error', (err) => output.destroy(err));
  archive.pipe(output);
  archive.file(filePath, { name: path.basename(filePath) });
  await archive.finalize();
  await closed;
  return zipPath;
}
