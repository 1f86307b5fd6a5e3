/**
 * 프로필 사진 정규화: 디코드 → 크기 제한 → JPEG 재인코딩 (메타데이터 제거).
 * IMPLEMENTATION STATUS: OK (sharp, 업스케일 없음, 인코더 옵션 고정)
 */

import sharp from 'sharp';

export type ImageConstraints = {
  maxBytes: number;
  maxWidth: number;
  maxHeight: number;
  outputQuality: number;
};

export type NormalizedImage = {
  data: Buffer;
  width: number;
  height: number;
  format: 'jpeg';
  contentType: 'image/jpeg';
  originalSize: number;
  outputSize: number;
  /** One decimal; negative when the output grew. */
  reductionPercent: number;
};

export type ImageErrorCode = 'too_large' | 'unsupported_format';

export class ImageError extends Error {
  readonly code: ImageErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ImageErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ImageError';
    this.code = code;
    this.details = details;
  }
}

const SUPPORTED_FORMATS = new Set(['jpeg', 'png', 'gif', 'webp']);

export interface ImageNormalizer {
  normalize(bytes: Buffer, constraints: ImageConstraints): Promise<NormalizedImage>;
}

export function reductionPercent(originalSize: number, outputSize: number): number {
  if (originalSize <= 0) return 0;
  return Math.round((1 - outputSize / originalSize) * 1000) / 10;
}

export class SharpImageNormalizer implements ImageNormalizer {
  async normalize(bytes: Buffer, constraints: ImageConstraints): Promise<NormalizedImage> {
    if (bytes.length > constraints.maxBytes) {
      throw new ImageError('too_large', 'Image too large', {
        size: bytes.length,
        max_size_bytes: constraints.maxBytes,
        max_size_mb: Math.round((constraints.maxBytes / 1024 / 1024) * 100) / 100,
      });
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(bytes).metadata();
    } catch (error) {
      throw new ImageError('unsupported_format', 'Failed to decode image', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (!metadata.format || !SUPPORTED_FORMATS.has(metadata.format) || !metadata.width || !metadata.height) {
      throw new ImageError('unsupported_format', 'Unsupported image format', {
        format: metadata.format ?? 'unknown',
        supported: [...SUPPORTED_FORMATS],
      });
    }

    try {
      // rotate() applies EXIF orientation; output carries no metadata unless withMetadata() is called
      const { data, info } = await sharp(bytes, { failOn: 'error' })
        .rotate()
        .flatten({ background: '#ffffff' })
        .resize({
          width: constraints.maxWidth,
          height: constraints.maxHeight,
          fit: 'inside',
          withoutEnlargement: true,
        })
        .jpeg({
          quality: constraints.outputQuality,
          progressive: true,
          chromaSubsampling: '4:2:0',
          mozjpeg: false,
        })
        .toBuffer({ resolveWithObject: true });

      return {
        data,
        width: info.width,
        height: info.height,
        format: 'jpeg',
        contentType: 'image/jpeg',
        originalSize: bytes.length,
        outputSize: data.length,
        reductionPercent: reductionPercent(bytes.length, data.length),
      };
    } catch (error) {
      throw new ImageError('unsupported_format', 'Failed to process image', {
        format: metadata.format,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
