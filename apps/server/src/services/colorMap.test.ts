import { describe, expect, it } from 'vitest';
import { labelMapFrom } from '../testing/fakes';
import { colorMapList, paletteColor, pseudoColorPixels, registryColorMap } from './colorMap';

describe('colorMapList', () => {
  const palette = colorMapList(256);

  it('has one RGB entry per class', () => {
    expect(palette).toHaveLength(256 * 3);
  });

  it('interleaves label bits into the high bits of each channel', () => {
    expect(paletteColor(palette, 0)).toEqual([128, 0, 0]);
    expect(paletteColor(palette, 1)).toEqual([0, 128, 0]);
    expect(paletteColor(palette, 2)).toEqual([128, 128, 0]);
    expect(paletteColor(palette, 6)).toEqual([128, 128, 128]);
    expect(paletteColor(palette, 7)).toEqual([64, 0, 0]);
  });

  it('lets custom colors override the leading entries', () => {
    const custom = colorMapList(256, [1, 2, 3]);
    expect(paletteColor(custom, 0)).toEqual([1, 2, 3]);
    expect(paletteColor(custom, 1)).toEqual([0, 128, 0]);
  });

  it('returns black past the end of the palette', () => {
    expect(paletteColor(colorMapList(4), 10)).toEqual([0, 0, 0]);
  });
});

describe('registryColorMap', () => {
  it('uses category colors for known ids', () => {
    const palette = registryColorMap();
    expect(paletteColor(palette, 0)).toEqual([128, 64, 128]);
    expect(paletteColor(palette, 13)).toEqual([0, 0, 142]);
    expect(paletteColor(palette, 19)).toEqual([0, 64, 128]);
  });
});

describe('pseudoColorPixels', () => {
  it('maps each label to its color', () => {
    const pixels = pseudoColorPixels(labelMapFrom([[0, 1]]), colorMapList(256));
    expect(Array.from(pixels)).toEqual([128, 0, 0, 0, 128, 0]);
  });
});
