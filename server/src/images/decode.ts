// ============================================================
// Doc Analyzer - Request Image Decoding
// Turns base64 request payloads into @napi-rs/canvas images
// ============================================================

import { loadImage } from '@napi-rs/canvas';
import type { Bitmap } from '@shared/types';

export type ImageDecoder = (imageBase64: string) => Promise<Bitmap>;

/**
 * Decodes a Base64 PNG/JPEG/WEBP/GIF, with or without a data-URL prefix.
 */
export const decodeBase64Image: ImageDecoder = (imageBase64) => {
  const cleanBase64 = stripDataUrlPrefix(imageBase64);
  return loadImage(Buffer.from(cleanBase64, 'base64'));
};

export function stripDataUrlPrefix(imageBase64: string): string {
  return imageBase64.replace(/^data:image\/(png|jpeg|webp|gif);base64,/, '');
}
