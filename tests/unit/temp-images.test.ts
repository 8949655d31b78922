// ============================================================
// Tests for src/images/temp-images.ts
// Covers: WEBP writer, unique paths, save/cleanup, scoped release
// ============================================================

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createCanvas, loadImage } from '@napi-rs/canvas';
import {
  createWebpWriter,
  createTempImageStore,
  cleanupTempFiles,
  tempImagePath,
  withTempImages,
} from '../../src/images/temp-images';
import type { Bitmap } from '../../src/shared/types';

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'doc-analyzer-images-'));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

function expectWebp(data: Buffer): void {
  expect(data.subarray(0, 4).toString('ascii')).toBe('RIFF');
  expect(data.subarray(8, 12).toString('ascii')).toBe('WEBP');
}

function redSquare() {
  const canvas = createCanvas(16, 16);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = '#FF0040';
  ctx.fillRect(0, 0, 16, 16);
  return canvas;
}

// ------------------------------------------------------------------
// WEBP writer
// ------------------------------------------------------------------

describe('createWebpWriter', () => {
  it('should encode a canvas as WEBP', async () => {
    const filePath = path.join(tempDir, 'canvas.webp');

    await createWebpWriter()(redSquare(), filePath);

    expectWebp(await fs.readFile(filePath));
  });

  it('should encode a decoded image as WEBP', async () => {
    const image = await loadImage(await redSquare().encode('png'));
    const filePath = path.join(tempDir, 'image.webp');

    await createWebpWriter(50)(image, filePath);

    expectWebp(await fs.readFile(filePath));
  });
});

// ------------------------------------------------------------------
// Paths
// ------------------------------------------------------------------

describe('tempImagePath', () => {
  it('should place a uniquely named webp file in the directory', () => {
    const first = tempImagePath('/scratch');
    const second = tempImagePath('/scratch');

    expect(path.dirname(first)).toBe('/scratch');
    expect(path.basename(first)).toMatch(/^claude_img_[0-9a-f]{32}\.webp$/);
    expect(first).not.toBe(second);
  });
});

// ------------------------------------------------------------------
// Store
// ------------------------------------------------------------------

describe('createTempImageStore', () => {
  it('should save images sequentially and return their paths in order', async () => {
    const order: number[] = [];
    const writer = vi.fn(async (image: Bitmap, filePath: string) => {
      order.push(image.width);
      await fs.writeFile(filePath, 'x');
    });
    const store = createTempImageStore(tempDir, writer);

    const paths = await store.save([createCanvas(1, 1), createCanvas(2, 2), createCanvas(3, 3)]);

    expect(order).toEqual([1, 2, 3]);
    expect(paths).toHaveLength(3);
    expect(paths.every((p) => path.dirname(p) === tempDir)).toBe(true);
    expect((await fs.readdir(tempDir)).sort()).toEqual(paths.map((p) => path.basename(p)).sort());
  });

  it('should remove already written files when a later image fails', async () => {
    let calls = 0;
    const store = createTempImageStore(tempDir, async (_image, filePath) => {
      calls++;
      if (calls === 2) throw new Error('encode failed');
      await fs.writeFile(filePath, 'x');
    });

    await expect(store.save([createCanvas(1, 1), createCanvas(1, 1)])).rejects.toThrow(
      'encode failed',
    );
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('should remove a partially written file when the write fails', async () => {
    const store = createTempImageStore(tempDir, async (_image, filePath) => {
      await fs.writeFile(filePath, 'partial');
      throw new Error('ENOSPC: no space left on device');
    });

    await expect(store.save([createCanvas(1, 1)])).rejects.toThrow('ENOSPC');
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('should delete files on cleanup', async () => {
    const store = createTempImageStore(tempDir, async (_image, filePath) => {
      await fs.writeFile(filePath, 'x');
    });
    const paths = await store.save([createCanvas(1, 1)]);

    await store.cleanup(paths);

    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});

describe('cleanupTempFiles', () => {
  it('should not throw for files that do not exist', async () => {
    await expect(
      cleanupTempFiles([path.join(tempDir, 'missing.webp')]),
    ).resolves.toBeUndefined();
  });

  it('should keep deleting after one failure', async () => {
    const kept = path.join(tempDir, 'second.webp');
    await fs.writeFile(kept, 'x');

    await cleanupTempFiles([path.join(tempDir, 'missing.webp'), kept]);

    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('should log failures at debug level', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const missing = path.join(tempDir, 'missing.webp');

    await cleanupTempFiles([missing], logger);

    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug.mock.calls[0][0]).toMatch(`Failed to clean up ${missing}: `);
    expect(logger.error).not.toHaveBeenCalled();
  });
});

// ------------------------------------------------------------------
// Scoped release
// ------------------------------------------------------------------

describe('withTempImages', () => {
  function fakeStore() {
    return {
      save: vi.fn(async (images: Bitmap[]) => images.map((_img, i) => `/tmp/img${i}.webp`)),
      cleanup: vi.fn(async (_paths: string[]) => {}),
    };
  }

  it('should pass saved paths to the callback and clean up afterwards', async () => {
    const store = fakeStore();

    const result = await withTempImages(store, [createCanvas(1, 1)], async (paths) => paths.length);

    expect(result).toBe(1);
    expect(store.cleanup).toHaveBeenCalledWith(['/tmp/img0.webp']);
  });

  it('should clean up when the callback throws', async () => {
    const store = fakeStore();

    await expect(
      withTempImages(store, [createCanvas(1, 1)], async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(store.cleanup).toHaveBeenCalledWith(['/tmp/img0.webp']);
  });

  it('should skip saving when there are no images', async () => {
    const store = fakeStore();

    await withTempImages(store, [], async (paths) => paths);

    expect(store.save).not.toHaveBeenCalled();
    expect(store.cleanup).toHaveBeenCalledWith([]);
  });
});
