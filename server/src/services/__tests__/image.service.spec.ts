import sharp from 'sharp';
import { ImageError, reductionPercent, SharpImageNormalizer, type ImageConstraints } from '../image.service';

const constraints: ImageConstraints = {
  maxBytes: 5 * 1024 * 1024,
  maxWidth: 1920,
  maxHeight: 1080,
  outputQuality: 85,
};

function solid(width: number, height: number) {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 80, b: 40 } } });
}

describe('SharpImageNormalizer', () => {
  const normalizer = new SharpImageNormalizer();

  it('re-encodes a small PNG as JPEG without enlarging it', async () => {
    const png = await solid(400, 300).png().toBuffer();

    const result = await normalizer.normalize(png, constraints);

    expect(result.width).toBe(400);
    expect(result.height).toBe(300);
    expect(result.contentType).toBe('image/jpeg');
    expect(result.originalSize).toBe(png.length);
    expect(result.outputSize).toBe(result.data.length);
    expect(result.data.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
    expect((await sharp(result.data).metadata()).format).toBe('jpeg');
  });

  it('fits large images inside the bounding box keeping the aspect ratio', async () => {
    const png = await solid(4000, 3000).png().toBuffer();

    const result = await normalizer.normalize(png, constraints);

    expect(result.width).toBe(1440);
    expect(result.height).toBe(1080);
  });

  it('applies EXIF orientation and drops metadata', async () => {
    const jpeg = await solid(200, 100).jpeg().withMetadata({ orientation: 6 }).toBuffer();

    const result = await normalizer.normalize(jpeg, constraints);
    const metadata = await sharp(result.data).metadata();

    expect(result.width).toBe(100);
    expect(result.height).toBe(200);
    expect(metadata.orientation).toBeUndefined();
    expect(metadata.exif).toBeUndefined();
  });

  it('flattens transparency onto white', async () => {
    const png = await sharp({
      create: { width: 16, height: 16, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } },
    })
      .png()
      .toBuffer();

    const result = await normalizer.normalize(png, constraints);
    const stats = await sharp(result.data).stats();

    expect(stats.channels[0]?.mean).toBeGreaterThan(250);
  });

  it('rejects input above the size limit before decoding', async () => {
    const png = await solid(50, 50).png().toBuffer();

    await expect(normalizer.normalize(png, { ...constraints, maxBytes: 10 })).rejects.toMatchObject({
      code: 'too_large',
      details: { size: png.length, max_size_bytes: 10 },
    });
  });

  it('rejects bytes that are not an image', async () => {
    const pending = normalizer.normalize(Buffer.from('definitely not an image'), constraints);

    await expect(pending).rejects.toBeInstanceOf(ImageError);
    await expect(pending).rejects.toMatchObject({ code: 'unsupported_format', message: 'Failed to decode image' });
  });

  it('rejects decodable formats outside the accepted set', async () => {
    const tiff = await solid(20, 20).tiff().toBuffer();

    await expect(normalizer.normalize(tiff, constraints)).rejects.toMatchObject({
      code: 'unsupported_format',
      message: 'Unsupported image format',
      details: { format: 'tiff' },
    });
  });
});

describe('reductionPercent', () => {
  it('rounds to one decimal', () => {
    expect(reductionPercent(1000, 250)).toBe(75);
    expect(reductionPercent(3, 2)).toBe(33.3);
  });

  it('is negative when the output grew', () => {
    expect(reductionPercent(100, 150)).toBe(-50);
  });

  it('is zero for empty input', () => {
    expect(reductionPercent(0, 10)).toBe(0);
  });
});
