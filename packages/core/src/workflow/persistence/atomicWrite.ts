/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Write `<file>.tmp`, fsync it, rename over the target, then fsync the
 * directory so the rename itself is durable.
 */
export async function atomicWriteFile(filePath: string, data: string | Buffer): Promise<void> {
  const directory = path.dirname(filePath);
  await fs.mkdir(directory, { recursive: true });

  const tmpPath = `${filePath}.tmp`;
  const handle = await fs.open(tmpPath, 'w');
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }

  await fs.rename(tmpPath, filePath);
  await syncDirectory(directory);
}

async function syncDirectory(directory: string): Promise<void> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(directory, 'r');
  } catch (error) {
    // Windows cannot open directories for fsync
    if (process.platform === 'win32') {
      return;
    }
    throw error;
  }
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}
