import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import path from 'path';

const SAVES_BEFORE_BACKUP = 10;
const MAX_BACKUPS = 10;
const saveCounter: Record<string, number> = {};

/**
 * Loads and parses JSON data from a file
 * @template T - The expected type of the loaded data
 * @param dataDir - Directory holding the data files
 * @param fn - Filename relative to the data directory
 * @returns Parsed data object of type T
 * @throws Error if file cannot be read or parsed
 */
export function load<T>(dataDir: string, fn: string): T {
  const data = readFileSync(path.join(dataDir, fn), 'utf8');
  return JSON.parse(data) as T;
}

/**
 * Creates a backup copy of a file with timestamp
 * Automatically manages backup rotation to keep only MAX_BACKUPS files
 * @param dataDir - Directory holding the data files
 * @param fn - Filename to backup
 */
export const backup = (dataDir: string, fn: string) => {
  const backupDir = path.join(dataDir, 'backup');
  if (!existsSync(backupDir)) {
    mkdirSync(backupDir, { recursive: true });
  }
  const backups = readdirSync(backupDir).filter((f) => f.startsWith(fn));
  if (backups.length >= MAX_BACKUPS) {
    const oldest = backups.sort((a, b) => a.localeCompare(b))[0];
    unlinkSync(path.join(backupDir, oldest));
  }
  copyFileSync(path.join(dataDir, fn), path.join(backupDir, `${fn}.${Date.now()}`));
};

/**
 * Determines if a file should be backed up based on save counter
 * @param dataDir - Directory holding the data files
 * @param fn - Filename to check
 * @returns True if backup should be created, false otherwise
 */
export const shouldBackup = (dataDir: string, fn: string) => {
  const key = path.join(dataDir, fn);
  saveCounter[key] = (saveCounter[key] ?? 0) + 1;
  if (saveCounter[key] >= SAVES_BEFORE_BACKUP) {
    saveCounter[key] = 0;
    return true;
  }
  return false;
};

/**
 * Saves data to a JSON file with automatic backup rotation
 * @template T - Type of data being saved
 * @param dataDir - Directory holding the data files
 * @param data - Data object to save
 * @param fn - Filename relative to data directory
 */
export function save<T>(dataDir: string, data: T, fn: string) {
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
  if (checkExists(dataDir, fn) && shouldBackup(dataDir, fn)) {
    backup(dataDir, fn);
  }
  writeFileSync(path.join(dataDir, fn), JSON.stringify(data, null, 2));
}

/**
 * Checks if a file exists in the data directory
 * @param dataDir - Directory holding the data files
 * @param fn - Filename to check
 * @returns True if file exists, false otherwise
 */
export function checkExists(dataDir: string, fn: string) {
  return existsSync(path.join(dataDir, fn));
}
