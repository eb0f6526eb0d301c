import { colorToHex, isTransparent, packColor, unpackColor } from '../colors';

describe('colors', () => {
  test('packs channels as 0xRRGGBBAA', () => {
    expect(packColor({ r: 0xf0, g: 0xf0, b: 0xf0, a: 0xff })).toBe(0xf0f0f0ff);
    expect(unpackColor(0x12345678)).toEqual({ r: 0x12, g: 0x34, b: 0x56, a: 0x78 });
  });

  test('any alpha below 255 is transparent', () => {
    expect(isTransparent(0x00000000)).toBe(true);
    expect(isTransparent(0xffffffef)).toBe(true);
    expect(isTransparent(0x000000ff)).toBe(false);
  });

  test('formats colors as 8-digit hex', () => {
    expect(colorToHex(0x0a0b0cff)).toBe('#0a0b0cff');
    expect(colorToHex(0x00000000)).toBe('#00000000');
  });
});
