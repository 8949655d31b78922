// ============================================================
// Doc Analyzer - Temporary Image Files
// Persists bitmaps as WEBP so the CLI can read them by path
// Uses @napi-rs/canvas for encoding
// ============================================================

import { promises as fs } from 'fs';
import path from 'path';
import { createCanvas } from '@napi-rs/canvas';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../agent/errors';
import { createLogger } from '../shared/logger';
import type { Logger } from '../shared/logger';
import type { Bitmap } from '../shared/types';

const defaultLog = createLogger('temp-images');

/** Writes one bitmap to a file path */
export type ImageWriter = (image: Bitmap, filePath: string) => Promise<void>;

/** Saves and removes request-scoped temporary images */
export interface TempImageStore {
  save(images: Bitmap[]): Promise<string[]>;
  cleanup(paths: string[]): Promise<void>;
}

/**
 * Encodes a bitmap as lossy WEBP and writes it to disk.
 */
export function createWebpWriter(quality: number = 80): ImageWriter {
  return async (image, filePath) => {
    const data = await encodeWebp(image, quality);
    await fs.writeFile(filePath, data);
  };
}

async function encodeWebp(image: Bitmap, quality: number): Promise<Buffer> {
  if ('getContext' in image) {
    return image.encode('webp', quality);
  }

  const canvas = createCanvas(image.width, image.height);
  canvas.getContext('2d').drawImage(image, 0, 0);
  return canvas.encode('webp', quality);
}

/** Builds a unique path like `<dir>/claude_img_<hex>.webp` */
export function tempImagePath(dir: string): string {
  return path.join(dir, `claude_img_${uuidv4().replace(/-/g, '')}.webp`);
}

/**
 * Temp image store backed by the filesystem.
 */
export function createTempImageStore(
  tempDir: string,
  writer: ImageWriter = createWebpWriter(),
  log: Logger = defaultLog,
): TempImageStore {
  return {
    async save(images) {
      const paths: string[] = [];
      try {
        // Sequential so paths keep the caller's order
        for (const image of images) {
          const filePath = tempImagePath(tempDir);
          // Tracked before writing so a half-written file is rolled back too
          paths.push(filePath);
          await writer(image, filePath);
          log.debug(`Saved temp image: ${filePath}`);
        }
      } catch (err) {
        await cleanupTempFiles(paths, log);
        throw err;
      }
      return paths;
    },

    cleanup: (paths) => cleanupTempFiles(paths, log),
  };
}

/**
 * Deletes each file. Failures are logged, never thrown.
 */
export async function cleanupTempFiles(
  paths: string[],
  log: Logger = defaultLog,
): Promise<void> {
  for (const filePath of paths) {
    try {
      await fs.unlink(filePath);
      log.debug(`Cleaned up temp file: ${filePath}`);
    } catch (err) {
      log.debug(`Failed to clean up ${filePath}: ${errorMessage(err)}`);
    }
  }
}

/**
 * Saves the images, runs `fn` with their paths, and removes the files
 * on every exit path.
 */
export async function withTempImages<T>(
  store: TempImageStore,
  images: Bitmap[],
  fn: (paths: string[]) => Promise<T>,
): Promise<T> {
  const paths = images.length > 0 ? await store.save(images) : [];
  try {
    return await fn(paths);
  } finally {
    await store.cleanup(paths);
  }
}
