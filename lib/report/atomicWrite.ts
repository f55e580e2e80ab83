import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';
import logger from '../logger';

/**
 * Write via a temp file and rename, so readers see either nothing or the complete file.
 */
export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupErr: unknown) => {
      logger.debug({ tempPath, err: cleanupErr }, 'temp report cleanup failed');
    });
    throw error;
  }
}

export async function atomicWriteJSON(filePath: string, data: unknown, space: number = 4): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space));
}
