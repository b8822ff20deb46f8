import { PngRasterDecoder } from '../services/RasterDecoder';
import { TileDecodeError } from '../utils/errors';
import { makeTilePng } from './test-helpers';

describe('PngRasterDecoder', () => {
  const decoder = new PngRasterDecoder();

  it('reads RGB pixels at tile offsets', () => {
    const body = makeTilePng([128, 0, 0], [{ x: 232, y: 83, rgb: [0, 0x0f, 0xa0] }]);
    const raster = decoder.decode(body);

    expect(raster.width).toBe(256);
    expect(raster.height).toBe(256);
    expect(raster.getPixel(232, 83)).toEqual([0, 0x0f, 0xa0]);
    expect(raster.getPixel(83, 232)).toEqual([128, 0, 0]);
  });

  it('ignores the alpha channel of RGBA tiles', () => {
    const body = makeTilePng([1, 2, 3], [{ x: 0, y: 255, rgb: [9, 8, 7] }], 6);
    const raster = decoder.decode(body);

    expect(raster.getPixel(0, 255)).toEqual([9, 8, 7]);
    expect(raster.getPixel(255, 0)).toEqual([1, 2, 3]);
  });

  it('rejects a body that is not a PNG', () => {
    expect(() => decoder.decode(Buffer.from('<html>Not Found</html>'))).toThrow(TileDecodeError);
  });

  it('rejects reads outside the raster', () => {
    const raster = decoder.decode(makeTilePng([0, 0, 0]));
    expect(() => raster.getPixel(256, 0)).toThrow('Pixel (256, 0) is outside the 256x256 tile');
    expect(() => raster.getPixel(0, -1)).toThrow(TileDecodeError);
  });
});
