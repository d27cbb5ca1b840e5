// ============================================================
// Tests for src/utils/media-type.ts and src/utils/base64.ts
// ============================================================

import { describe, it, expect } from 'vitest';
import { isAllowedImageFile, mediaTypeFromFilename } from '../../src/utils/media-type';
import { encodeImage, toDataURL } from '../../src/utils/base64';

describe('mediaTypeFromFilename', () => {
  it.each([
    ['photo.jpg', 'image/jpeg'],
    ['photo.jpeg', 'image/jpeg'],
    ['photo.png', 'image/png'],
    ['photo.gif', 'image/gif'],
    ['photo.webp', 'image/webp'],
  ])('should map %s to %s', (filename, expected) => {
    expect(mediaTypeFromFilename(filename)).toBe(expected);
  });

  it('should ignore extension case', () => {
    expect(mediaTypeFromFilename('SHOT.PNG')).toBe('image/png');
    expect(mediaTypeFromFilename('/tmp/uploads/Cat.WebP')).toBe('image/webp');
  });

  it('should default to image/jpeg for other extensions', () => {
    expect(mediaTypeFromFilename('scan.bmp')).toBe('image/jpeg');
    expect(mediaTypeFromFilename('cat.xyz')).toBe('image/jpeg');
    expect(mediaTypeFromFilename('README')).toBe('image/jpeg');
  });
});

describe('isAllowedImageFile', () => {
  it('should accept the upload extensions in any case', () => {
    expect(isAllowedImageFile('cat.png')).toBe(true);
    expect(isAllowedImageFile('cat.JPG')).toBe(true);
    expect(isAllowedImageFile('cat.jpeg')).toBe(true);
    expect(isAllowedImageFile('cat.gif')).toBe(true);
    expect(isAllowedImageFile('archive.tar.webp')).toBe(true);
  });

  it('should reject other or missing extensions', () => {
    expect(isAllowedImageFile('cat.xyz')).toBe(false);
    expect(isAllowedImageFile('cat.png.exe')).toBe(false);
    expect(isAllowedImageFile('cat')).toBe(false);
    expect(isAllowedImageFile('')).toBe(false);
  });
});

describe('base64 helpers', () => {
  it('should encode bytes without a data: prefix', () => {
    expect(encodeImage(Buffer.from('hello'))).toBe('aGVsbG8=');
  });

  it('should encode only the viewed bytes of a subarray', () => {
    const bytes = Buffer.from('xxhelloxx').subarray(2, 7);
    expect(encodeImage(bytes)).toBe('aGVsbG8=');
  });

  it('should build a data URL with the given media type', () => {
    expect(toDataURL('aGVsbG8=', 'image/png')).toBe('data:image/png;base64,aGVsbG8=');
  });
});
