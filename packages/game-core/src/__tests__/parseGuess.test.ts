// packages/game-core/src/__tests__/parseGuess.test.ts
//
// Unit tests for parseGuess(): trimming, accepted integer shapes, and the
// GuessParseError returned for everything else.

import { GuessParseError, parseGuess } from '../index.js';

describe('parseGuess', () => {
  it('parses a plain integer', () => {
    expect(parseGuess('42')).toEqual({ ok: true, value: 42 });
  });

  it('strips the trailing newline and surrounding whitespace', () => {
    expect(parseGuess('42\n')).toEqual({ ok: true, value: 42 });
    expect(parseGuess('  7 \r\n')).toEqual({ ok: true, value: 7 });
    expect(parseGuess('\t100\t')).toEqual({ ok: true, value: 100 });
  });

  it('accepts a leading sign and values outside the secret range', () => {
    expect(parseGuess('+5')).toEqual({ ok: true, value: 5 });
    expect(parseGuess('-12')).toEqual({ ok: true, value: -12 });
    expect(parseGuess('0')).toEqual({ ok: true, value: 0 });
    expect(parseGuess('250')).toEqual({ ok: true, value: 250 });
  });

  it.each(['abc', '', '   ', '4 2', '4.5', '1e3', '0x10', '12abc', '--1'])(
    'rejects %j',
    (line) => {
      const parsed = parseGuess(line);
      expect(parsed.ok).toBe(false);
      if (!parsed.ok) {
        expect(parsed.error).toBeInstanceOf(GuessParseError);
        expect(parsed.error.input).toBe(line);
      }
    },
  );

  it('rejects integers beyond the safe integer range', () => {
    const parsed = parseGuess('99999999999999999999');
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.message).toBe(
        'Cannot parse guess "99999999999999999999": integer out of range',
      );
    }
  });

  it('names the reason in the error message', () => {
    const parsed = parseGuess('abc');
    if (parsed.ok) throw new Error('expected a parse failure');
    expect(parsed.error.name).toBe('GuessParseError');
    expect(parsed.error.message).toBe('Cannot parse guess "abc": not a base-10 integer');
  });
});
