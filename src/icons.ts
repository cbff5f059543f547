import sharp from "sharp";
import * as fs from "fs";
import { promises as fsp } from "fs";
import * as path from "path";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { GeneratedIcon, IconRunResult, IconSpec } from "./types.js";

export const DEFAULT_ICONS_DIR = path.join("static", "icons");
export const SOURCE_ICON = "icon-512x512.png";
export const MIN_SOURCE_SIZE = 512;

/** Fraction of the maskable canvas that survives platform shape masks. */
export const MASKABLE_SAFE_ZONE = 0.8;
export const MASKABLE_BACKGROUND = { r: 0, g: 219, b: 222, alpha: 1 } as const;

const LIMIT_INPUT_PIXELS = 100_000_000;

export const ICON_SPECS: readonly IconSpec[] = [
  { name: "favicon-16x16.png", size: 16, maskable: false },
  { name: "favicon-32x32.png", size: 32, maskable: false },
  { name: "favicon-48x48.png", size: 48, maskable: false },
  { name: "apple-touch-icon.png", size: 180, maskable: false },
  { name: "icon-72x72.png", size: 72, maskable: false },
  { name: "icon-96x96.png", size: 96, maskable: false },
  { name: "icon-128x128.png", size: 128, maskable: false },
  { name: "icon-144x144.png", size: 144, maskable: false },
  { name: "icon-152x152.png", size: 152, maskable: false },
  { name: "icon-192x192.png", size: 192, maskable: false },
  { name: "icon-384x384.png", size: 384, maskable: false },
  { name: "icon-512x512.png", size: 512, maskable: false },
  { name: "maskable-icon.png", size: 512, maskable: true },
];

export interface MaskableLayout {
  visibleSize: number;
  padding: number;
}

export interface IconRunOptions {
  cwd?: string;
  iconsDir?: string;
  logger?: Logger;
}

export function maskableLayout(size: number): MaskableLayout {
  const visibleSize = Math.trunc(size * MASKABLE_SAFE_ZONE);
  return {
    visibleSize,
    padding: Math.floor((size - visibleSize) / 2),
  };
}

function resizeSquare(source: Buffer, size: number): sharp.Sharp {
  return sharp(source, { limitInputPixels: LIMIT_INPUT_PIXELS }).resize(size, size, {
    fit: "fill",
    kernel: sharp.kernel.lanczos3,
  });
}

async function renderMaskable(source: Buffer, size: number): Promise<Buffer> {
  const { visibleSize, padding } = maskableLayout(size);
  // Composite blends through the input's alpha when present, opaque otherwise.
  const visible = await resizeSquare(source, visibleSize).png().toBuffer();

  return sharp({
    create: {
      width: size,
      height: size,
      channels: 4,
      background: MASKABLE_BACKGROUND,
    },
  })
    .composite([{ input: visible, top: padding, left: padding }])
    .png()
    .toBuffer();
}

export async function renderIcon(source: Buffer, spec: IconSpec): Promise<Buffer> {
  if (spec.maskable) {
    return renderMaskable(source, spec.size);
  }
  return resizeSquare(source, spec.size).png().toBuffer();
}

export async function runIconGenerator(options: IconRunOptions = {}): Promise<IconRunResult> {
  const logger = options.logger ?? createConsoleLogger();
  const iconsDir = path.resolve(options.cwd ?? process.cwd(), options.iconsDir ?? DEFAULT_ICONS_DIR);
  const sourcePath = path.join(iconsDir, SOURCE_ICON);

  fs.mkdirSync(iconsDir, { recursive: true });

  if (!fs.existsSync(sourcePath)) {
    logger.info(`Source icon not found at ${sourcePath}`);
    logger.info("Please place a 512x512 PNG icon at this location and try again.");
    return { exitCode: 1, sourcePath, generated: [] };
  }

  // Held in memory: the 512px entry overwrites the source file.
  const source = await fsp.readFile(sourcePath);
  const metadata = await sharp(source, { limitInputPixels: LIMIT_INPUT_PIXELS }).metadata();
  const width = metadata.width ?? 0;
  const height = metadata.height ?? 0;
  if (width !== height || width < MIN_SOURCE_SIZE) {
    logger.warn(
      `Source icon is ${width.toString()}x${height.toString()}; expected a square image of at least ${MIN_SOURCE_SIZE.toString()}x${MIN_SOURCE_SIZE.toString()}.`
    );
  }

  logger.progress("Generating PWA icons...");
  const generated: GeneratedIcon[] = [];
  for (const spec of ICON_SPECS) {
    const outputPath = path.join(iconsDir, spec.name);
    const rendered = await renderIcon(source, spec);
    await fsp.writeFile(outputPath, rendered);
    generated.push({ name: spec.name, path: outputPath, size: spec.size });
    logger.progress(`Created ${spec.name} (${spec.size.toString()}x${spec.size.toString()})`);
  }

  logger.progress("PWA icon generation complete!");
  return { exitCode: 0, sourcePath, generated };
}
