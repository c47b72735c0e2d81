import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger, SeverityNumber } from './logger';

// File name of AddressBook.sqlitedb inside an iTunes / Finder device backup
export const ADDRESS_BOOK_BACKUP_FILE = '31bb7ba8914766d4ba40d6dfb6113c8b614be442';

export interface BackupLocatorOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Directory holding one sub-directory per device backup, or undefined on platforms
 * without iTunes / Finder backups.
 */
export function backupRoot(options: BackupLocatorOptions = {}): string | undefined {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  if (platform === 'darwin') {
    const home = options.homeDir ?? env.HOME ?? os.homedir();
    return path.join(home, 'Library', 'Application Support', 'MobileSync', 'Backup');
  }
  if (platform === 'win32') {
    return env.APPDATA ? path.join(env.APPDATA, 'Apple Computer', 'MobileSync', 'Backup') : undefined;
  }
  return undefined;
}

function modifiedAt(file: string): number | undefined {
  try {
    const stats = fs.statSync(file);
    return stats.isFile() ? stats.mtimeMs : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Finds the AddressBook database of the most recently modified device backup.
 * Older backups keep it at `<backup>/<hash>`, newer ones at `<backup>/31/<hash>`.
 */
export function findAddressBookBackup(options: BackupLocatorOptions = {}): string | undefined {
  const root = backupRoot(options);
  if (root === undefined || !fs.existsSync(root)) {
    return undefined;
  }

  let best: { file: string; mtime: number } | undefined;
  for (const entry of fs.readdirSync(root, { withFileTypes: true })) {
    if (!entry.isDirectory()) {
      continue;
    }
    const candidates = [
      path.join(root, entry.name, ADDRESS_BOOK_BACKUP_FILE),
      path.join(root, entry.name, ADDRESS_BOOK_BACKUP_FILE.slice(0, 2), ADDRESS_BOOK_BACKUP_FILE),
    ];
    for (const file of candidates) {
      const mtime = modifiedAt(file);
      if (mtime === undefined) {
        continue;
      }
      // Newest wins; equal times fall back to the path order
      if (!best || mtime > best.mtime || (mtime === best.mtime && file > best.file)) {
        best = { file, mtime };
      }
    }
  }

  if (best) {
    logger.emit({ severityNumber: SeverityNumber.INFO, body: 'Using AddressBook from device backup', attributes: { file: best.file } });
  }
  return best?.file;
}
