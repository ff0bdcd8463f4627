import {isClean} from '../src/name-validator';

describe('isClean', () => {
  it('Should accept ASCII names', () => {
    expect(isClean('report-2024_final.txt')).toBe(true);
    expect(isClean('#U6d4b.txt')).toBe(true);
    expect(isClean('')).toBe(true);
  });

  it('Should reject names with any non-ASCII character', () => {
    expect(isClean('café.txt')).toBe(false);
    expect(isClean('测试.txt')).toBe(false);
    expect(isClean('a\u0080')).toBe(false);
  });
});
