import type { FfmpegRunner } from '../infra/ffmpeg.js';
import { logger } from '../logger.js';
import { GRAVITIES, type Gravity } from '../operations/schema/builders.js';
import { RESIZE_MODES } from '../operations/schema/image.js';
import type { StageParams } from '../operations/types.js';
import { booleanParam, enumParam, numberParam, requireNumber, requireString, stringParam } from '../pipeline/params.js';
import type { HandlerTable, MediaContext } from '../pipeline/types.js';
import {
  horizontalPlacement,
  isQuarterTurn,
  planCrop,
  planResize,
  verticalPlacement,
  type Size,
} from './image-geometry.js';

export interface ImageHandlerDeps {
  ffmpeg: FfmpegRunner;
  /** Font for watermarks; ffmpeg's fontconfig default when unset. */
  fontFile?: string;
}

const LOSSY_FORMATS = new Set(['jpg', 'jpeg', 'webp']);
// Formats written by the image2 muxer, which needs to be told it is writing one file.
const IMAGE2_FORMATS = new Set(['jpg', 'jpeg', 'png', 'bmp', 'tiff']);

/** Map 1–100 quality onto mjpeg's 31–2 qscale. */
export const jpegQscale = (quality: number) => Math.round(31 - ((quality - 1) * 29) / 99);

export const encoderOptions = (format: string, quality?: number): string[] => {
  const options = ['-frames:v 1'];
  if (IMAGE2_FORMATS.has(format)) options.push('-update 1');
  if (quality === undefined) return options;
  if (format === 'jpg' || format === 'jpeg') options.push(`-q:v ${jpegQscale(quality)}`);
  if (format === 'webp') options.push(`-quality ${quality}`);
  return options;
};

// A straight quote cannot be escaped inside a quoted drawtext value.
export const escapeDrawtext = (text: string) =>
  text
    .replace(/\\/g, '\\\\')
    .replace(/'/g, '’')
    .replace(/:/g, '\\:')
    .replace(/%/g, '\\%')
    .replace(/,/g, '\\,');

export interface WatermarkOptions {
  color: string;
  opacity: number;
  gravity: Gravity;
  x: number;
  y: number;
  voffset: number;
  size: number;
  shadow: number;
  fontFile?: string;
}

export const watermarkFilter = (text: string, options: WatermarkOptions): string => {
  const horizontal = horizontalPlacement(options.gravity);
  const vertical = verticalPlacement(options.gravity);
  const x = horizontal === 'start' ? `${options.x}` : horizontal === 'end' ? `w-tw-${options.x}` : '(w-tw)/2';
  const y =
    vertical === 'start' ? `${options.y}` : vertical === 'end' ? `h-th-${options.y}` : `(h-th)/2+${options.voffset}`;

  const parts = [
    `text='${escapeDrawtext(text)}'`,
    `fontsize=${options.size}`,
    `fontcolor=0x${options.color}@${options.opacity / 100}`,
    `x=${x}`,
    `y=${y}`,
  ];
  if (options.shadow > 0) parts.push(`shadowcolor=black@${options.shadow / 100}`, 'shadowx=2', 'shadowy=2');
  if (options.fontFile) parts.unshift(`fontfile=${options.fontFile}`);
  return `drawtext=${parts.join(':')}`;
};

const dimensions = (context: MediaContext): Size => {
  const { width, height } = context.metadata;
  if (!width || !height) throw new Error('Image dimensions are unknown');
  return { width, height };
};

export const createImageHandlers = ({ ffmpeg, fontFile }: ImageHandlerDeps): HandlerTable<'image'> => {
  const reencode = async (
    context: MediaContext,
    filters: string[],
    next: { format?: string; quality?: number; size?: Size } = {},
  ): Promise<MediaContext> => {
    const format = next.format ?? context.metadata.format;
    const quality = LOSSY_FORMATS.has(format) ? next.quality ?? context.metadata.quality : undefined;
    const artifact = await ffmpeg.transcode({
      input: context.artifact,
      inputFormat: context.metadata.format,
      outputFormat: format,
      videoFilters: filters,
      outputOptions: encoderOptions(format, quality),
    });
    return { artifact, metadata: { ...context.metadata, ...next.size, format, quality } };
  };

  const resize = async (context: MediaContext, params: StageParams) => {
    const source = dimensions(context);
    const plan = planResize(source, {
      percent: numberParam(params, 'p'),
      width: numberParam(params, 'w'),
      height: numberParam(params, 'h'),
      longest: numberParam(params, 'l'),
      shortest: numberParam(params, 's'),
      mode: enumParam(params, 'm', RESIZE_MODES, 'lfit'),
      limit: booleanParam(params, 'limit') ?? true,
      padColor: stringParam(params, 'color') ?? 'FFFFFF',
    });
    if (!plan) {
      logger.debug({ source }, 'Resize would enlarge the image, keeping source size');
      return context;
    }
    return reencode(context, plan.filters, { size: { width: plan.width, height: plan.height } });
  };

  const crop = async (context: MediaContext, params: StageParams) => {
    const region = planCrop(dimensions(context), {
      width: numberParam(params, 'w'),
      height: numberParam(params, 'h'),
      percent: numberParam(params, 'p'),
      x: numberParam(params, 'x') ?? 0,
      y: numberParam(params, 'y') ?? 0,
      gravity: enumParam(params, 'g', GRAVITIES, 'nw'),
    });
    return reencode(context, [`crop=${region.width}:${region.height}:${region.x}:${region.y}`], {
      size: { width: region.width, height: region.height },
    });
  };

  const rotate = async (context: MediaContext, params: StageParams) => {
    const degrees = requireNumber(params, 'd');
    const source = dimensions(context);
    const filters = degrees === 90 ? ['transpose=1'] : degrees === 270 ? ['transpose=2'] : ['hflip', 'vflip'];
    const size = isQuarterTurn(degrees) ? { width: source.height, height: source.width } : source;
    return reencode(context, filters, { size });
  };

  const watermark = async (context: MediaContext, params: StageParams) =>
    reencode(context, [
      watermarkFilter(requireString(params, 'text'), {
        color: stringParam(params, 'color') ?? '000000',
        opacity: numberParam(params, 't') ?? 100,
        gravity: enumParam(params, 'g', GRAVITIES, 'se'),
        x: numberParam(params, 'x') ?? 10,
        y: numberParam(params, 'y') ?? 10,
        voffset: numberParam(params, 'voffset') ?? 0,
        size: numberParam(params, 'size') ?? 40,
        shadow: numberParam(params, 'shadow') ?? 0,
        fontFile,
      }),
    ]);

  const quality = async (context: MediaContext, params: StageParams) => {
    const { format } = context.metadata;
    if (!LOSSY_FORMATS.has(format)) {
      throw new Error(`Quality adjustment needs a lossy format, got ${format}`);
    }
    const absolute = numberParam(params, 'Q');
    const relative = numberParam(params, 'q') ?? 100;
    const current = context.metadata.quality ?? 100;
    const target = absolute ?? Math.max(1, Math.round((current * relative) / 100));
    return reencode(context, [], { quality: target });
  };

  const autoOrient = async (context: MediaContext, params: StageParams) => {
    if (!booleanParam(params, 'a')) return context;
    // ffmpeg applies display rotation while decoding; only the bookkeeping changes here.
    const rotation = context.metadata.rotation ?? 0;
    const source = dimensions(context);
    const size = isQuarterTurn(rotation) ? { width: source.height, height: source.width } : source;
    const oriented = await reencode(context, [], { size });
    return { ...oriented, metadata: { ...oriented.metadata, rotation: 0 } };
  };

  return {
    resize,
    crop,
    rotate,
    blur: async (context, params) => reencode(context, [`gblur=sigma=${requireNumber(params, 'r')}`]),
    grayscale: async (context) => reencode(context, ['format=gray']),
    watermark,
    format: async (context, params) =>
      reencode(context, [], { format: requireString(params, 'f'), quality: numberParam(params, 'q') }),
    quality,
    'auto-orient': autoOrient,
  };
};
