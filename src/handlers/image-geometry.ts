import type { Gravity } from '../operations/schema/builders.js';

export interface Size {
  width: number;
  height: number;
}

export type ResizeMode = 'lfit' | 'mfit' | 'fill' | 'pad' | 'fixed';

export interface ResizeRequest {
  percent?: number;
  width?: number;
  height?: number;
  longest?: number;
  shortest?: number;
  mode: ResizeMode;
  /** Skip the stage when the result would be larger than the source. */
  limit: boolean;
  padColor: string;
}

export interface ResizePlan extends Size {
  filters: string[];
}

export interface CropRegion extends Size {
  x: number;
  y: number;
}

const scaleBy = (size: Size, ratio: number): Size => ({
  width: Math.max(1, Math.floor(size.width * ratio)),
  height: Math.max(1, Math.floor(size.height * ratio)),
});

const scaleFilter = ({ width, height }: Size) => `scale=${width}:${height}`;

const ratioFor = (source: Size, request: ResizeRequest, fit: 'contain' | 'cover'): number => {
  if (request.longest !== undefined) return request.longest / Math.max(source.width, source.height);
  if (request.shortest !== undefined) return request.shortest / Math.min(source.width, source.height);

  const ratios: number[] = [];
  if (request.width !== undefined) ratios.push(request.width / source.width);
  if (request.height !== undefined) ratios.push(request.height / source.height);
  return fit === 'contain' ? Math.min(...ratios) : Math.max(...ratios);
};

const planBox = (source: Size, request: ResizeRequest): { scaled: Size; plan: ResizePlan } => {
  const box: Size = { width: request.width ?? 0, height: request.height ?? 0 };
  switch (request.mode) {
    case 'lfit': {
      const scaled = scaleBy(source, ratioFor(source, request, 'contain'));
      return { scaled, plan: { ...scaled, filters: [scaleFilter(scaled)] } };
    }
    case 'mfit': {
      const scaled = scaleBy(source, ratioFor(source, request, 'cover'));
      return { scaled, plan: { ...scaled, filters: [scaleFilter(scaled)] } };
    }
    case 'fill': {
      const scaled = scaleBy(source, ratioFor(source, request, 'cover'));
      return { scaled, plan: { ...box, filters: [scaleFilter(scaled), `crop=${box.width}:${box.height}`] } };
    }
    case 'pad': {
      const scaled = scaleBy(source, ratioFor(source, request, 'contain'));
      const pad = `pad=${box.width}:${box.height}:(ow-iw)/2:(oh-ih)/2:color=0x${request.padColor}`;
      return { scaled, plan: { ...box, filters: [scaleFilter(scaled), pad] } };
    }
    case 'fixed':
      return { scaled: box, plan: { ...box, filters: [scaleFilter(box)] } };
  }
};

/**
 * Work out output dimensions and ffmpeg filters for a resize.
 * Returns null when `limit` is set and the result would upscale.
 */
export const planResize = (source: Size, request: ResizeRequest): ResizePlan | null => {
  let scaled: Size;
  let plan: ResizePlan;

  if (request.percent !== undefined || request.longest !== undefined || request.shortest !== undefined) {
    scaled =
      request.percent !== undefined
        ? scaleBy(source, request.percent / 100)
        : scaleBy(source, ratioFor(source, request, 'contain'));
    plan = { ...scaled, filters: [scaleFilter(scaled)] };
  } else {
    ({ scaled, plan } = planBox(source, request));
  }

  // `scaled` is the size before any crop or pad.
  if (request.limit && (scaled.width > source.width || scaled.height > source.height)) {
    return null;
  }
  return plan;
};

export type Placement = 'start' | 'middle' | 'end';

export const horizontalPlacement = (gravity: Gravity): Placement => {
  if (gravity === 'nw' || gravity === 'west' || gravity === 'sw') return 'start';
  if (gravity === 'ne' || gravity === 'east' || gravity === 'se') return 'end';
  return 'middle';
};

export const verticalPlacement = (gravity: Gravity): Placement => {
  if (gravity === 'nw' || gravity === 'north' || gravity === 'ne') return 'start';
  if (gravity === 'sw' || gravity === 'south' || gravity === 'se') return 'end';
  return 'middle';
};

const anchor = (placement: Placement, total: number, extent: number, offset: number) => {
  if (placement === 'start') return offset;
  if (placement === 'end') return total - extent - offset;
  return Math.floor((total - extent) / 2) + offset;
};

/**
 * Region for a crop anchored at `gravity`. Offsets push the region away from
 * the anchored edge; the region is clipped to the image.
 */
export const planCrop = (
  source: Size,
  request: { width?: number; height?: number; percent?: number; x: number; y: number; gravity: Gravity },
): CropRegion => {
  const requestedWidth =
    request.percent !== undefined ? Math.floor((source.width * request.percent) / 100) : request.width ?? source.width;
  const requestedHeight =
    request.percent !== undefined ? Math.floor((source.height * request.percent) / 100) : request.height ?? source.height;

  const width = Math.max(1, Math.min(requestedWidth, source.width));
  const height = Math.max(1, Math.min(requestedHeight, source.height));
  const x = anchor(horizontalPlacement(request.gravity), source.width, width, request.x);
  const y = anchor(verticalPlacement(request.gravity), source.height, height, request.y);

  if (x < 0 || y < 0 || x >= source.width || y >= source.height) {
    throw new Error(`Crop origin ${x},${y} lies outside the ${source.width}x${source.height} image`);
  }

  return {
    x,
    y,
    width: Math.min(width, source.width - x),
    height: Math.min(height, source.height - y),
  };
};

export const isQuarterTurn = (degrees: number) => Math.abs(degrees) % 180 === 90;
