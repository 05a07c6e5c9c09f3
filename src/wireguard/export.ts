/**
 * Peer Export
 *
 * Writes client configurations for transfer to the peer device, and renders
 * them as terminal QR codes for the mobile apps.
 */

import { chmod, mkdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import qrcode from 'qrcode-terminal';

import { IOError, hasErrnoCode } from '../core/errors.js';
import { safePeerFilename } from './sanitize.js';

const EXPORT_DIR_MODE = 0o700;
const EXPORT_FILE_MODE = 0o600;

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (hasErrnoCode(error, 'ENOENT')) {
      return false;
    }
    throw new IOError('Failed to inspect export path', path, error);
  }
}

/**
 * Write a client configuration into the export directory.
 *
 * The file is named after the peer; if that name is taken a `-<unix time>`
 * suffix is added so earlier exports are never overwritten.
 *
 * @param exportDir - Directory to write into (created with mode 0700)
 * @param peerName - Peer name, reduced to a safe file stem
 * @param content - Client configuration text
 * @param now - Clock for the collision suffix
 * @returns Path of the written file
 */
export async function writeClientExport(
  exportDir: string,
  peerName: string,
  content: string,
  now: Date = new Date()
): Promise<string> {
  try {
    await mkdir(exportDir, { recursive: true, mode: EXPORT_DIR_MODE });
    await chmod(exportDir, EXPORT_DIR_MODE);
  } catch (error) {
    throw new IOError('Failed to prepare export directory', exportDir, error);
  }

  const stem = safePeerFilename(peerName);
  let exportPath = join(exportDir, `${stem}.conf`);
  if (await pathExists(exportPath)) {
    exportPath = join(exportDir, `${stem}-${Math.floor(now.getTime() / 1000)}.conf`);
  }

  try {
    await writeFile(exportPath, content, { mode: EXPORT_FILE_MODE, flag: 'wx' });
  } catch (error) {
    throw new IOError('Failed to write client config', exportPath, error);
  }
  return exportPath;
}

/**
 * Render text as a QR code made of terminal block characters.
 */
export function renderQrCode(text: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    try {
      qrcode.generate(text, { small: true }, (code: string) => {
        resolve(code);
      });
    } catch (error) {
      reject(error);
    }
  });
}
