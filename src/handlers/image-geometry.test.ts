import { describe, it, expect } from 'vitest';
import { isQuarterTurn, planCrop, planResize, type ResizeRequest } from './image-geometry.js';

const source = { width: 1600, height: 1200 };

const request = (overrides: Partial<ResizeRequest>): ResizeRequest => ({
  mode: 'lfit',
  limit: true,
  padColor: 'FFFFFF',
  ...overrides,
});

describe('planResize', () => {
  it('should fit a width into the source aspect ratio', () => {
    expect(planResize(source, request({ width: 800 }))).toEqual({
      width: 800,
      height: 600,
      filters: ['scale=800:600'],
    });
  });

  it('should scale by percent and by longest side', () => {
    expect(planResize(source, request({ percent: 50 }))).toMatchObject({ width: 800, height: 600 });
    expect(planResize(source, request({ longest: 400 }))).toMatchObject({ width: 400, height: 300 });
  });

  it('should cover then crop in fill mode', () => {
    expect(planResize(source, request({ width: 400, height: 200, mode: 'fill' }))).toEqual({
      width: 400,
      height: 200,
      filters: ['scale=400:300', 'crop=400:200'],
    });
  });

  it('should contain then pad in pad mode', () => {
    expect(planResize(source, request({ width: 400, height: 400, mode: 'pad', padColor: '00FF00' }))).toEqual({
      width: 400,
      height: 400,
      filters: ['scale=400:300', 'pad=400:400:(ow-iw)/2:(oh-ih)/2:color=0x00FF00'],
    });
  });

  it('should force both dimensions in fixed mode', () => {
    expect(planResize(source, request({ width: 100, height: 50, mode: 'fixed' }))).toEqual({
      width: 100,
      height: 50,
      filters: ['scale=100:50'],
    });
  });

  it('should skip upscaling unless the limit is lifted', () => {
    expect(planResize(source, request({ width: 3200 }))).toBeNull();
    expect(planResize(source, request({ width: 3200, limit: false }))).toMatchObject({ width: 3200, height: 2400 });
  });
});

describe('planCrop', () => {
  const image = { width: 1000, height: 800 };

  it('should offset from the north-west corner', () => {
    expect(planCrop(image, { width: 200, height: 100, x: 10, y: 20, gravity: 'nw' })).toEqual({
      x: 10,
      y: 20,
      width: 200,
      height: 100,
    });
  });

  it('should push offsets away from the south-east corner', () => {
    expect(planCrop(image, { width: 200, height: 100, x: 10, y: 20, gravity: 'se' })).toEqual({
      x: 790,
      y: 680,
      width: 200,
      height: 100,
    });
  });

  it('should center a percentage crop', () => {
    expect(planCrop(image, { percent: 50, x: 0, y: 0, gravity: 'center' })).toEqual({
      x: 250,
      y: 200,
      width: 500,
      height: 400,
    });
  });

  it('should clip the region to the image', () => {
    expect(planCrop(image, { width: 200, height: 100, x: 900, y: 0, gravity: 'nw' })).toEqual({
      x: 900,
      y: 0,
      width: 100,
      height: 100,
    });
  });

  it('should reject an origin outside the image', () => {
    expect(() => planCrop(image, { width: 200, height: 100, x: 1000, y: 0, gravity: 'nw' })).toThrow(
      'Crop origin 1000,0 lies outside the 1000x800 image',
    );
  });
});

describe('isQuarterTurn', () => {
  it('should detect rotations that swap width and height', () => {
    expect(isQuarterTurn(90)).toBe(true);
    expect(isQuarterTurn(-90)).toBe(true);
    expect(isQuarterTurn(180)).toBe(false);
  });
});
