/**
 * Case Study Builder — Image Normalization
 *
 * Uses `sharp` to validate, filter and re-encode images pulled out of
 * documents.
 */

import sharp from "sharp";

/** Below this in either dimension an image is treated as an icon or bullet */
export const MIN_IMAGE_DIMENSION = 50;
export const MAX_IMAGE_DIMENSION = 1000;

const JPEG_QUALITY = 75;
const FALLBACK_JPEG_QUALITY = 70;
const WHITE = { r: 255, g: 255, b: 255 };

export interface ImageInfo {
    format: string;
    width: number;
    height: number;
    hasAlpha: boolean;
}

export interface NormalizedImage {
    bytes: Buffer;
    mimeSubtype: "jpeg" | "png";
    width: number;
    height: number;
}

export interface NormalizeOptions {
    /** Images smaller than this (either side) are dropped; 0 keeps everything */
    minDimension?: number;
    maxDimension?: number;
}

type Kernel = "lanczos3" | "cubic";

/**
 * Decode just enough of the image to read its format and size.
 * @throws when `sharp` cannot identify the bytes as an image
 */
export async function inspectImage(bytes: Buffer): Promise<ImageInfo> {
    const metadata = await sharp(bytes).metadata();
    if (!metadata.format || !metadata.width || !metadata.height) {
        throw new Error("Unrecognized image data");
    }
    return {
        format: metadata.format === "jpg" ? "jpeg" : metadata.format,
        width: metadata.width,
        height: metadata.height,
        hasAlpha: metadata.hasAlpha ?? false,
    };
}

/**
 * Re-encode an image as JPEG or PNG:
 * 1. Drop images under `minDimension` (returns `null`)
 * 2. Formats other than JPEG/PNG become JPEG, flattened onto white
 * 3. Downscale to fit `maxDimension` (Lanczos, cubic if that fails)
 * 4. Encode; on failure fall back to a plain quality-70 JPEG
 *
 * @throws when the bytes are not a decodable image
 */
export async function normalizeImage(
    bytes: Buffer,
    options: NormalizeOptions = {}
): Promise<NormalizedImage | null> {
    const minDimension = options.minDimension ?? MIN_IMAGE_DIMENSION;
    const maxDimension = options.maxDimension ?? MAX_IMAGE_DIMENSION;

    const info = await inspectImage(bytes);
    if (info.width < minDimension || info.height < minDimension) {
        return null;
    }

    const target: NormalizedImage["mimeSubtype"] = info.format === "png" ? "png" : "jpeg";
    const oversized = info.width > maxDimension || info.height > maxDimension;

    const build = (kernel: Kernel): sharp.Sharp => {
        let pipeline = sharp(bytes);
        if (target === "jpeg" && info.hasAlpha) {
            pipeline = pipeline.flatten({ background: WHITE });
        }
        if (oversized) {
            pipeline = pipeline.resize({
                width: maxDimension,
                height: maxDimension,
                fit: "inside",
                kernel,
            });
        }
        return pipeline;
    };

    const encode = async (kernel: Kernel): Promise<NormalizedImage> => {
        const pipeline = build(kernel);
        const encoded = target === "jpeg"
            ? pipeline.jpeg({ quality: JPEG_QUALITY })
            : pipeline.png();
        const { data, info: out } = await encoded.toBuffer({ resolveWithObject: true });
        return { bytes: data, mimeSubtype: target, width: out.width, height: out.height };
    };

    try {
        return await encode("lanczos3");
    } catch (error) {
        console.warn(`[ImageNormalizer] Encoding failed, retrying: ${errorMessage(error)}`);
    }

    if (oversized) {
        try {
            return await encode("cubic");
        } catch (error) {
            console.warn(`[ImageNormalizer] Cubic resize failed: ${errorMessage(error)}`);
        }
    }

    const { data, info: out } = await build("cubic")
        .flatten({ background: WHITE })
        .jpeg({ quality: FALLBACK_JPEG_QUALITY })
        .toBuffer({ resolveWithObject: true });
    return { bytes: data, mimeSubtype: "jpeg", width: out.width, height: out.height };
}

/**
 * Wrap decoded PDF sample data (8 bits per component) as PNG.
 * CMYK samples are converted to RGB first; `alpha` (one sample per pixel)
 * is composited onto white.
 */
export async function rawSamplesToPng(
    samples: Uint8Array,
    width: number,
    height: number,
    channels: 1 | 3 | 4,
    alpha?: Uint8Array
): Promise<Buffer> {
    const expected = width * height * channels;
    if (samples.length < expected) {
        throw new Error(`Sample data too short: ${samples.length} < ${expected}`);
    }

    const pixels = width * height;
    const colour = channels === 4 ? cmykToRgb(samples, pixels) : Buffer.from(samples.subarray(0, expected));
    const colourChannels: 1 | 3 = channels === 1 ? 1 : 3;

    if (alpha && alpha.length >= pixels) {
        const withAlpha: 2 | 4 = colourChannels === 1 ? 2 : 4;
        return sharp(addAlphaChannel(colour, colourChannels, alpha, pixels), {
            raw: { width, height, channels: withAlpha },
        })
            .flatten({ background: WHITE })
            .toColourspace("srgb")
            .png()
            .toBuffer();
    }

    return sharp(colour, { raw: { width, height, channels: colourChannels } })
        .toColourspace("srgb")
        .png()
        .toBuffer();
}

function addAlphaChannel(colour: Buffer, channels: number, alpha: Uint8Array, pixels: number): Buffer {
    const out = Buffer.alloc(pixels * (channels + 1));
    for (let i = 0; i < pixels; i++) {
        colour.copy(out, i * (channels + 1), i * channels, (i + 1) * channels);
        out[i * (channels + 1) + channels] = alpha[i];
    }
    return out;
}

function cmykToRgb(samples: Uint8Array, pixels: number): Buffer {
    const rgb = Buffer.alloc(pixels * 3);
    for (let i = 0; i < pixels; i++) {
        const k = 1 - samples[i * 4 + 3] / 255;
        rgb[i * 3] = Math.round(255 * (1 - samples[i * 4] / 255) * k);
        rgb[i * 3 + 1] = Math.round(255 * (1 - samples[i * 4 + 1] / 255) * k);
        rgb[i * 3 + 2] = Math.round(255 * (1 - samples[i * 4 + 2] / 255) * k);
    }
    return rgb;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
