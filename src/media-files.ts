import { readdirSync, type Dirent } from 'fs';
import { basename, extname, join } from 'path';
import type { SorterConfig } from './config.js';

export function extensionOf(filePath: string): string {
  return extname(filePath).toLowerCase();
}

export function stemOf(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export function isSidecarName(name: string, config: SorterConfig): boolean {
  const lower = name.toLowerCase();
  return (
    config.sidecarNames.has(lower) ||
    config.sidecarExtensions.has(extensionOf(lower)) ||
    config.sidecarPrefixes.some(prefix => name.startsWith(prefix))
  );
}

export function isImageFile(filePath: string, config: SorterConfig): boolean {
  return config.imageExtensions.has(extensionOf(filePath));
}

export function isVideoFile(filePath: string, config: SorterConfig): boolean {
  return config.videoExtensions.has(extensionOf(filePath));
}

/**
 * A recognized photo or video. AppleDouble companions (`._IMG_1.jpg`) carry a
 * media extension but are sidecars.
 */
export function isMediaFile(filePath: string, config: SorterConfig): boolean {
  if (isSidecarName(basename(filePath), config)) {
    return false;
  }
  return isImageFile(filePath, config) || isVideoFile(filePath, config);
}

function readEntries(dirPath: string): Dirent[] {
  try {
    return readdirSync(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }
}

export interface DirectoryListing {
  files: string[];
  directories: string[];
}

/**
 * Direct children sorted by name. Symlinks are neither followed nor listed.
 * An unreadable or vanished directory lists as empty.
 */
export function listDirectory(dirPath: string): DirectoryListing {
  const listing: DirectoryListing = { files: [], directories: [] };

  const entries = readEntries(dirPath);

  entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));
  for (const entry of entries) {
    if (entry.isDirectory()) {
      listing.directories.push(join(dirPath, entry.name));
    } else if (entry.isFile()) {
      listing.files.push(join(dirPath, entry.name));
    }
  }

  return listing;
}

export function listMediaFiles(dirPath: string, config: SorterConfig): string[] {
  return listDirectory(dirPath).files.filter(file => isMediaFile(file, config));
}
