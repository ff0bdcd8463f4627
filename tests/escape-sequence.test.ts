import {decodeEscapeSequences, hasEscapeSequence} from '../src/escape-sequence';

describe('Escape sequences', () => {
  it('Should decode #U placeholders into characters', () => {
    expect(decodeEscapeSequences('#U6d4b#U8bd5.txt')).toBe('测试.txt');
    expect(decodeEscapeSequences('#U51b2#U950b#U7ebf.txt')).toBe(
      '冲锋线.txt'
    );
  });

  it('Should accept upper-case hex digits', () => {
    expect(decodeEscapeSequences('caf#U00E9')).toBe('café');
  });

  it('Should only consume four hex digits', () => {
    expect(decodeEscapeSequences('#U6d4b5')).toBe('测5');
  });

  it('Should leave incomplete or lower-case markers alone', () => {
    expect(decodeEscapeSequences('#U12.txt')).toBe('#U12.txt');
    expect(decodeEscapeSequences('#u6d4b.txt')).toBe('#u6d4b.txt');
    expect(decodeEscapeSequences('#Uzzzz')).toBe('#Uzzzz');
  });

  it('Should be a no-op on an already decoded name', () => {
    const decoded = decodeEscapeSequences('#U6d4b#U8bd5#U6587#U4ef6#U5939');
    expect(decoded).toBe('测试文件夹');
    expect(decodeEscapeSequences(decoded)).toBe(decoded);
  });

  it('Should detect escape sequences', () => {
    expect(hasEscapeSequence('#U6d4b.txt')).toBe(true);
    expect(hasEscapeSequence('report.txt')).toBe(false);
    expect(hasEscapeSequence('#U6d4')).toBe(false);
  });
});
